import {
	addDays,
	isWeekend,
	type Bar,
	type MarketGate,
	type Position,
	type StrategyConfig,
} from "@signaldesk/core";

import type { StrategyInput } from "../types";
import { resolveEvaluationWindow } from "../window";

export const RUN_DATE = "2025-11-17";
export const LAST_SESSION = "2025-11-14";

/**
 * `count` weekday dates ending on `lastDate`, oldest first.
 */
export const weekdaysEndingOn = (lastDate: string, count: number): string[] => {
	const dates: string[] = [];
	let cursor = lastDate;
	while (dates.length < count) {
		if (!isWeekend(cursor)) {
			dates.unshift(cursor);
		}
		cursor = addDays(cursor, -1);
	}
	return dates;
};

export interface BarShape {
	close: number;
	high?: number;
	low?: number;
	volume?: number;
}

export const buildBars = (
	symbol: string,
	shapes: readonly BarShape[],
	lastDate = LAST_SESSION
): Bar[] => {
	const dates = weekdaysEndingOn(lastDate, shapes.length);
	return shapes.map((shape, i) => ({
		symbol,
		date: dates[i],
		open: shape.close,
		high: shape.high ?? shape.close + 0.5,
		low: shape.low ?? shape.close - 0.5,
		close: shape.close,
		volume: shape.volume ?? 1_000_000,
	}));
};

export const openGate: MarketGate = {
	available: true,
	bullish: true,
	value: 110,
	average: 100,
	asOf: LAST_SESSION,
};

export const closedGate: MarketGate = {
	available: true,
	bullish: false,
	value: 90,
	average: 100,
	asOf: LAST_SESSION,
};

export const buildInput = (
	config: StrategyConfig,
	bars: readonly Bar[][],
	options: {
		symbols?: string[];
		capital?: number;
		positions?: Position[];
		marketGate?: MarketGate;
		now?: Date;
	} = {}
): StrategyInput => {
	const bySymbol = new Map<string, Bar[]>();
	for (const series of bars) {
		if (series.length) {
			bySymbol.set(series[0].symbol, series);
		}
	}
	return {
		runDate: RUN_DATE,
		now: options.now ?? new Date("2025-11-17T14:00:00Z"),
		window: resolveEvaluationWindow(config, RUN_DATE),
		universe: {
			name: "test",
			symbols: options.symbols ?? [...bySymbol.keys()],
		},
		bars: bySymbol,
		budget: {
			strategyId: config.id,
			allocationPct: config.allocation,
			capital: options.capital ?? 10_000,
		},
		positions: options.positions ?? [],
		marketGate: options.marketGate ?? openGate,
	};
};
