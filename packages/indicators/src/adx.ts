import { trueRangeSeries, type PriceBar } from "./atr";
import { emptySeries, latest, type IndicatorSeries } from "./series";

/**
 * Wilder ADX. Directional movement and true range are smoothed over
 * `period` bars, DX is available from index `period`, and ADX from index
 * `2 * period - 1` as the mean of the first `period` DX values.
 */
export function adxSeries(
	candles: readonly PriceBar[],
	period = 14
): IndicatorSeries {
	const series = emptySeries(candles.length);
	if (period <= 0 || candles.length < period * 2) {
		return series;
	}

	const trueRanges = trueRangeSeries(candles);
	const plusDm: number[] = [0];
	const minusDm: number[] = [0];
	for (let i = 1; i < candles.length; i += 1) {
		const upMove = candles[i].high - candles[i - 1].high;
		const downMove = candles[i - 1].low - candles[i].low;
		plusDm.push(upMove > downMove && upMove > 0 ? upMove : 0);
		minusDm.push(downMove > upMove && downMove > 0 ? downMove : 0);
	}

	let smoothedTr = 0;
	let smoothedPlus = 0;
	let smoothedMinus = 0;
	for (let i = 1; i <= period; i += 1) {
		smoothedTr += trueRanges[i];
		smoothedPlus += plusDm[i];
		smoothedMinus += minusDm[i];
	}

	const dx: number[] = [directionalIndex(smoothedTr, smoothedPlus, smoothedMinus)];
	for (let i = period + 1; i < candles.length; i += 1) {
		smoothedTr = smoothedTr - smoothedTr / period + trueRanges[i];
		smoothedPlus = smoothedPlus - smoothedPlus / period + plusDm[i];
		smoothedMinus = smoothedMinus - smoothedMinus / period + minusDm[i];
		dx.push(directionalIndex(smoothedTr, smoothedPlus, smoothedMinus));
	}

	// dx[k] belongs to candle index period + k
	let adx = dx.slice(0, period).reduce((acc, value) => acc + value, 0) / period;
	series[period * 2 - 1] = adx;
	for (let k = period; k < dx.length; k += 1) {
		adx = (adx * (period - 1) + dx[k]) / period;
		series[period + k] = adx;
	}

	return series;
}

export function adx(candles: readonly PriceBar[], period = 14): number | null {
	return latest(adxSeries(candles, period));
}

const directionalIndex = (
	trueRange: number,
	plusDm: number,
	minusDm: number
): number => {
	if (trueRange === 0) {
		return 0;
	}
	const plusDi = (100 * plusDm) / trueRange;
	const minusDi = (100 * minusDm) / trueRange;
	const total = plusDi + minusDi;
	return total === 0 ? 0 : (100 * Math.abs(plusDi - minusDi)) / total;
};
