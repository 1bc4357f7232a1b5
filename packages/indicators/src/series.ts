/**
 * Indicator output aligned index-for-index with its input. `null` marks
 * slots still inside the warm-up window.
 */
export type IndicatorSeries = (number | null)[];

export function latest(series: IndicatorSeries): number | null {
	if (!series.length) {
		return null;
	}
	return series[series.length - 1] ?? null;
}

/**
 * Value `offset` bars before the latest one, or null when out of range.
 */
export function lookback(series: IndicatorSeries, offset: number): number | null {
	const index = series.length - 1 - offset;
	if (index < 0 || index >= series.length) {
		return null;
	}
	return series[index] ?? null;
}

export const emptySeries = (length: number): IndicatorSeries =>
	new Array<number | null>(length).fill(null);
