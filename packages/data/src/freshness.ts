import { expectedLastTradingDay, type Bar } from "@signaldesk/core";

import type { FreshnessReport } from "./types";

/**
 * Compares the latest bar against the most recent completed session before
 * `runDate`. A series with no bars is never fresh.
 */
export const assessFreshness = (
	symbol: string,
	bars: readonly Bar[],
	runDate: string,
	holidays: readonly string[] = []
): FreshnessReport => {
	const expectedDate = expectedLastTradingDay(runDate, holidays);
	const latestDate = bars.length ? bars[bars.length - 1].date : null;
	return {
		symbol,
		expectedDate,
		latestDate,
		fresh: latestDate !== null && latestDate >= expectedDate,
	};
};
