import {
	IndicatorWarmupError,
	type Bar,
	type Position,
	type StrategyConfig,
	type SymbolSkip,
} from "@signaldesk/core";

import type { EntrySuppression, StrategyInput } from "./types";
import { truncateBars } from "./window";

export interface PreparedSeries {
	symbol: string;
	bars: Bar[];
	latest: Bar;
}

export interface PreparedUniverse {
	series: PreparedSeries[];
	skipped: SymbolSkip[];
}

/**
 * Window, freshness and history checks shared by every variant. Symbols
 * failing any of them are reported and left out. `minBars` of 1 is used for
 * exits, which only read the latest bar.
 */
export const prepareSeries = (
	input: StrategyInput,
	symbols: readonly string[],
	minBars: number
): PreparedUniverse => {
	const series: PreparedSeries[] = [];
	const skipped: SymbolSkip[] = [];
	const { dataEndDate, expectedLastDate } = input.window;

	for (const symbol of symbols) {
		const raw = input.bars.get(symbol);
		const bars = raw ? truncateBars(raw, dataEndDate) : [];
		if (!bars.length) {
			skipped.push({
				symbol,
				reason: "missing_bars",
				detail: `no bars on or before ${dataEndDate}`,
			});
			continue;
		}
		const latest = bars[bars.length - 1];
		if (latest.date < expectedLastDate) {
			skipped.push({
				symbol,
				reason: "stale_data",
				detail: `latest bar ${latest.date}, expected ${expectedLastDate}`,
			});
			continue;
		}
		if (bars.length < minBars) {
			skipped.push({
				symbol,
				reason: "insufficient_history",
				detail: `${bars.length} of ${minBars} bars`,
			});
			continue;
		}
		series.push({ symbol, bars, latest });
	}

	return { series, skipped };
};

/**
 * Reads an indicator value the strategy cannot proceed without.
 * @throws IndicatorWarmupError when the value is still warming up
 */
export const requireValue = (
	value: number | null,
	indicator: string,
	symbol: string
): number => {
	if (value === null || !Number.isFinite(value)) {
		throw new IndicatorWarmupError(`${indicator} unavailable for ${symbol}`, {
			symbol,
			indicator,
		});
	}
	return value;
};

/**
 * Runs a per-symbol evaluation, turning warm-up failures into skips.
 */
export const withWarmupGuard = <T>(
	symbol: string,
	skipped: SymbolSkip[],
	evaluate: () => T
): T | null => {
	try {
		return evaluate();
	} catch (error) {
		if (error instanceof IndicatorWarmupError) {
			skipped.push({
				symbol,
				reason: "indicator_warmup",
				detail: error.message,
			});
			return null;
		}
		throw error;
	}
};

export const longHoldings = (
	positions: readonly Position[],
	universe: ReadonlySet<string>
): Position[] =>
	positions.filter(
		(position) => position.quantity > 0 && universe.has(position.symbol)
	);

export const shortHoldings = (
	positions: readonly Position[],
	universe: ReadonlySet<string>
): Position[] =>
	positions.filter(
		(position) => position.quantity < 0 && universe.has(position.symbol)
	);

export const entrySuppression = (
	config: StrategyConfig,
	input: StrategyInput
): EntrySuppression | null => {
	if (!config.entryEnabled) {
		return "entry_disabled";
	}
	if (config.useMarketFilter && !input.marketGate.bullish) {
		return "market_filter";
	}
	return null;
};

export const perPositionBudget = (
	capital: number,
	maxPositions: number
): number => capital / maxPositions;
