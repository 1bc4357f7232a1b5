import {
	isSignalRunError,
	describeError,
	type Bar,
	type Universe,
	type UniverseSource,
} from "@signaldesk/core";

import { resolveUniverse } from "./watchlistStore";
import type {
	DataProviderConfig,
	MissingSeries,
	SeriesLoadResult,
	SeriesRequest,
} from "./types";

const DEFAULT_CONCURRENCY = 8;

/**
 * Batch loader over a BarSource. Symbols without data are reported in
 * `missing` instead of failing the batch; anything else propagates.
 */
export class MarketDataProvider {
	private readonly concurrency: number;

	constructor(private readonly config: DataProviderConfig) {
		this.concurrency = Math.max(config.concurrency ?? DEFAULT_CONCURRENCY, 1);
	}

	async resolveUniverse(
		source: UniverseSource,
		exclude: readonly string[] = []
	): Promise<Universe> {
		return resolveUniverse(source, exclude, this.config.watchlists);
	}

	async loadSeries(request: SeriesRequest): Promise<SeriesLoadResult> {
		const symbols = [...new Set(request.symbols)];
		const bars = new Map<string, Bar[]>();
		const missing: MissingSeries[] = [];

		for (let start = 0; start < symbols.length; start += this.concurrency) {
			const chunk = symbols.slice(start, start + this.concurrency);
			const settled = await Promise.allSettled(
				chunk.map((symbol) =>
					this.config.source.fetchDailyBars(symbol, request.endDate)
				)
			);
			settled.forEach((outcome, index) => {
				const symbol = chunk[index];
				if (outcome.status === "fulfilled") {
					if (outcome.value.length) {
						bars.set(symbol, outcome.value);
					} else {
						missing.push({
							symbol,
							reason: "missing_bars",
							detail: `no bars on or before ${request.endDate}`,
						});
					}
					return;
				}
				if (!isSignalRunError(outcome.reason)) {
					throw outcome.reason;
				}
				missing.push({
					symbol,
					reason: "missing_bars",
					detail: describeError(outcome.reason),
				});
			});
		}

		if (missing.length) {
			this.config.logger?.warn?.("market_data_missing", {
				endDate: request.endDate,
				count: missing.length,
				symbols: missing.map((entry) => entry.symbol),
			});
		}
		this.config.logger?.info?.("market_data_loaded", {
			endDate: request.endDate,
			requested: symbols.length,
			loaded: bars.size,
		});

		return { bars, missing };
	}
}
