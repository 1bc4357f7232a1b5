import {
	computeGoodTillDate,
	type IntradayReversionStrategyConfig,
	type SymbolSkip,
} from "@signaldesk/core";

import {
	entrySuppression,
	longHoldings,
	perPositionBudget,
	prepareSeries,
	shortHoldings,
	withWarmupGuard,
} from "../../common";
import { rankCandidates } from "../../selection";
import type {
	SignalStrategy,
	StrategyEvaluation,
	StrategyInput,
} from "../../types";
import { buildLimitEntries } from "../reversionEntries";
import {
	evaluateIntradayReversionSetup,
	type IntradayReversionSetup,
} from "./entryLogic";

export * from "./entryLogic";

/**
 * Next-session limit fades that expire intraday and are flattened by an
 * attached market-on-close order, so no exit orders are produced.
 */
export class IntradayReversionStrategy
	implements SignalStrategy<IntradayReversionStrategyConfig>
{
	constructor(readonly config: IntradayReversionStrategyConfig) {}

	evaluate(input: StrategyInput): StrategyEvaluation {
		const { config } = this;
		const universe = new Set(input.universe.symbols);
		const held = new Set(
			(config.side === "LONG"
				? longHoldings(input.positions, universe)
				: shortHoldings(input.positions, universe)
			).map((position) => position.symbol)
		);

		const prepared = prepareSeries(
			input,
			input.universe.symbols.filter((symbol) => !held.has(symbol)),
			config.minBars
		);
		const skipped: SymbolSkip[] = [...prepared.skipped];
		const setups: IntradayReversionSetup[] = [];
		for (const series of prepared.series) {
			const setup = withWarmupGuard(series.symbol, skipped, () =>
				evaluateIntradayReversionSetup(series, config)
			);
			if (setup?.passed) {
				setups.push(setup);
			}
		}

		const ranked = rankCandidates(
			setups.map((setup) => ({
				symbol: setup.symbol,
				score: setup.score,
				indicators: setup.indicators,
			})),
			config.rankOrder
		);

		// yesterday's fills were flattened at the close, so every slot is free
		const entriesSuppressed = entrySuppression(config, input);
		const intents = entriesSuppressed
			? []
			: buildLimitEntries(ranked, setups, config.maxPositions, {
						intent: config.side === "LONG" ? "OPEN_LONG" : "OPEN_SHORT",
						notional: perPositionBudget(input.budget.capital, config.maxPositions),
						timeInForce: "GTD",
						goodTillDate: computeGoodTillDate(input.now, config.goodTill),
						attachMoc: config.attachMoc,
					});

		return {
			strategyId: config.id,
			kind: config.kind,
			intents,
			ranked,
			skipped,
			entriesSuppressed,
		};
	}
}
