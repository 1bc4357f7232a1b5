import type {
	OrderIntent,
	RankedCandidate,
	RotationStrategyConfig,
	SymbolSkip,
} from "@signaldesk/core";

import {
	entrySuppression,
	longHoldings,
	perPositionBudget,
	prepareSeries,
	withWarmupGuard,
} from "../../common";
import { rankCandidates, selectWithHysteresis } from "../../selection";
import type {
	SignalStrategy,
	StrategyEvaluation,
	StrategyInput,
} from "../../types";
import { evaluateRotationSetup, type RotationSetup } from "./entryLogic";
import { buildRotationExit } from "./exitLogic";

export * from "./entryLogic";
export * from "./exitLogic";

/**
 * Momentum rotation: hold the top-ranked symbols of a universe, keep
 * holdings while they stay within the hysteresis band.
 */
export class RotationStrategy implements SignalStrategy<RotationStrategyConfig> {
	constructor(readonly config: RotationStrategyConfig) {}

	evaluate(input: StrategyInput): StrategyEvaluation {
		const { config } = this;
		const universe = new Set(input.universe.symbols);
		const prepared = prepareSeries(input, input.universe.symbols, config.minBars);
		const skipped: SymbolSkip[] = [...prepared.skipped];

		const setups: RotationSetup[] = [];
		const lastBars = new Map(prepared.series.map((s) => [s.symbol, s.latest]));
		for (const series of prepared.series) {
			const setup = withWarmupGuard(series.symbol, skipped, () =>
				evaluateRotationSetup(series, config)
			);
			if (setup) {
				setups.push(setup);
			}
		}

		const ranked = rankCandidates(
			setups
				.filter((setup) => setup.qualified)
				.map(
					(setup): RankedCandidate => ({
						symbol: setup.symbol,
						score: setup.score,
						indicators: setup.indicators,
					})
				),
			config.rankOrder
		);

		// holdings without usable data produce no order
		const held = longHoldings(input.positions, universe).filter((position) =>
			lastBars.has(position.symbol)
		);
		const selection = selectWithHysteresis(
			ranked,
			new Set(held.map((position) => position.symbol)),
			config.maxPositions,
			config.worstRank
		);

		const intents: OrderIntent[] = [];
		const rankOf = new Map(ranked.map((candidate, i) => [candidate.symbol, i + 1]));
		const heldBySymbol = new Map(held.map((position) => [position.symbol, position]));
		for (const symbol of selection.exit) {
			const position = heldBySymbol.get(symbol);
			const lastBar = lastBars.get(symbol);
			if (position && lastBar) {
				intents.push(
					buildRotationExit(position, lastBar, rankOf.get(symbol) ?? null, config)
				);
			}
		}

		const entriesSuppressed = entrySuppression(config, input);
		if (!entriesSuppressed) {
			const notional = perPositionBudget(input.budget.capital, config.maxPositions);
			for (const candidate of selection.enter) {
				intents.push({
					symbol: candidate.symbol,
					intent: "OPEN_LONG",
					price: { type: "market", reference: candidate.indicators.close },
					sizing: { type: "notional", amount: notional },
					timeInForce: config.timeInForce,
					attachMoc: false,
					reason: `rank_${rankOf.get(candidate.symbol) ?? 0}`,
					score: candidate.score,
					indicators: candidate.indicators,
				});
			}
		}

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
