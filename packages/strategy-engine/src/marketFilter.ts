import type { Bar, MarketGate } from "@signaldesk/core";
import { sma } from "@signaldesk/indicators";

export const closedGate = (): MarketGate => ({
	available: false,
	bullish: false,
	value: null,
	average: null,
	asOf: null,
});

/**
 * Bullish when the latest value of the regime series is above its simple
 * average over `period` bars, the latest bar included. Too little history
 * yields an unavailable, closed gate.
 */
export const evaluateMarketGate = (
	bars: readonly Bar[],
	period: number
): MarketGate => {
	const closes = bars.map((bar) => bar.close);
	const average = sma(closes, period);
	if (average === null) {
		return closedGate();
	}
	const latest = bars[bars.length - 1];
	return {
		available: true,
		bullish: latest.close > average,
		value: latest.close,
		average,
		asOf: latest.date,
	};
};
