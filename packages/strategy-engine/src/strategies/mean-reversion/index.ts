import type {
	MeanReversionStrategyConfig,
	OrderIntent,
	SymbolSkip,
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
import {
	evaluateMeanReversionSetup,
	type MeanReversionSetup,
} from "./entryLogic";
import { buildLimitEntries } from "../reversionEntries";
import { buildMeanReversionExit } from "./exitLogic";

export * from "./entryLogic";
export * from "./exitLogic";

export class MeanReversionStrategy
	implements SignalStrategy<MeanReversionStrategyConfig>
{
	constructor(readonly config: MeanReversionStrategyConfig) {}

	evaluate(input: StrategyInput): StrategyEvaluation {
		const { config } = this;
		const universe = new Set(input.universe.symbols);
		const held =
			config.side === "LONG"
				? longHoldings(input.positions, universe)
				: shortHoldings(input.positions, universe);
		const intents: OrderIntent[] = [];

		const exitSeries = prepareSeries(
			input,
			held.map((position) => position.symbol),
			1
		);
		const skipped: SymbolSkip[] = [...exitSeries.skipped];
		const heldBySymbol = new Map(held.map((position) => [position.symbol, position]));
		for (const series of exitSeries.series) {
			const position = heldBySymbol.get(series.symbol);
			if (position) {
				intents.push(buildMeanReversionExit(position, series.latest, config));
			}
		}

		// opposite-side holdings stay eligible
		const candidates = input.universe.symbols.filter(
			(symbol) => !heldBySymbol.has(symbol)
		);
		const prepared = prepareSeries(input, candidates, config.minBars);
		skipped.push(...prepared.skipped);

		const setups: MeanReversionSetup[] = [];
		for (const series of prepared.series) {
			const setup = withWarmupGuard(series.symbol, skipped, () =>
				evaluateMeanReversionSetup(series, config)
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

		const capacity = Math.max(0, config.maxPositions - held.length);
		const entriesSuppressed = entrySuppression(config, input);
		if (!entriesSuppressed && capacity > 0) {
			intents.push(
				...buildLimitEntries(ranked, setups, capacity, {
					intent: config.side === "LONG" ? "OPEN_LONG" : "OPEN_SHORT",
					notional: perPositionBudget(input.budget.capital, config.maxPositions),
					timeInForce: config.timeInForce,
					attachMoc: false,
				})
			);
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
