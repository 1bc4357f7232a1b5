import type { Bar, SkipReason } from "@signaldesk/core";

export interface DataProviderLogger {
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	error?: (event: string, payload?: Record<string, unknown>) => void;
}

/**
 * Daily bars for one symbol, chronological, none after `endDate`.
 * Implementations throw DataUnavailableError when the symbol has no data.
 */
export interface BarSource {
	fetchDailyBars(symbol: string, endDate: string): Promise<Bar[]>;
}

export interface WatchlistSource {
	loadWatchlist(name: string): Promise<string[]>;
}

export interface SeriesRequest {
	symbols: readonly string[];
	endDate: string;
}

export interface MissingSeries {
	symbol: string;
	reason: Extract<SkipReason, "missing_bars">;
	detail: string;
}

export interface SeriesLoadResult {
	bars: Map<string, Bar[]>;
	missing: MissingSeries[];
}

export interface DataProviderConfig {
	source: BarSource;
	watchlists: WatchlistSource;
	concurrency?: number;
	logger?: DataProviderLogger;
}

export interface FreshnessReport {
	symbol: string;
	expectedDate: string;
	latestDate: string | null;
	fresh: boolean;
}
