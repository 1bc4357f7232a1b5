import { emptySeries, latest, type IndicatorSeries } from "./series";

export interface PriceBar {
	high: number;
	low: number;
	close: number;
}

export function atr(candles: readonly PriceBar[], period = 14): number | null {
	return latest(atrSeries(candles, period));
}

/**
 * Wilder ATR. The first value is the mean true range of bars 1..period and
 * lands on index `period`.
 */
export function atrSeries(
	candles: readonly PriceBar[],
	period = 14
): IndicatorSeries {
	const series = emptySeries(candles.length);
	if (period <= 0 || candles.length < period + 1) {
		return series;
	}

	const trueRanges = trueRangeSeries(candles);
	let value = 0;
	for (let i = 1; i <= period; i += 1) {
		value += trueRanges[i];
	}
	value /= period;
	series[period] = value;

	for (let i = period + 1; i < candles.length; i += 1) {
		value = (value * (period - 1) + trueRanges[i]) / period;
		series[i] = value;
	}

	return series;
}

/**
 * True range per bar; index 0 has no previous close and uses high - low.
 */
export const trueRangeSeries = (candles: readonly PriceBar[]): number[] =>
	candles.map((current, i) => {
		const highLow = current.high - current.low;
		if (i === 0) {
			return highLow;
		}
		const previousClose = candles[i - 1].close;
		const highClose = Math.abs(current.high - previousClose);
		const lowClose = Math.abs(current.low - previousClose);
		return Math.max(highLow, highClose, lowClose);
	});
