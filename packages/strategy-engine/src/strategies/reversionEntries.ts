import type {
	OrderIntent,
	RankedCandidate,
	TimeInForce,
	TradeIntentType,
} from "@signaldesk/core";

export interface LimitSetup {
	symbol: string;
	limitPrice: number;
}

export interface LimitEntryTemplate {
	intent: TradeIntentType;
	notional: number;
	timeInForce: TimeInForce;
	goodTillDate?: string;
	attachMoc: boolean;
}

/**
 * Limit entries for the first `capacity` ranked candidates.
 */
export const buildLimitEntries = (
	ranked: readonly RankedCandidate[],
	setups: readonly LimitSetup[],
	capacity: number,
	template: LimitEntryTemplate
): OrderIntent[] => {
	const bySymbol = new Map(setups.map((setup) => [setup.symbol, setup]));
	const intents: OrderIntent[] = [];
	ranked.slice(0, capacity).forEach((candidate, index) => {
		const setup = bySymbol.get(candidate.symbol);
		if (!setup) {
			return;
		}
		intents.push({
			symbol: candidate.symbol,
			intent: template.intent,
			price: { type: "limit", price: setup.limitPrice },
			sizing: { type: "notional", amount: template.notional },
			timeInForce: template.timeInForce,
			...(template.goodTillDate ? { goodTillDate: template.goodTillDate } : {}),
			attachMoc: template.attachMoc,
			reason: `rank_${index + 1}`,
			score: candidate.score,
			indicators: candidate.indicators,
		});
	});
	return intents;
};
