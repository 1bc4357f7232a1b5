import { emptySeries, latest, type IndicatorSeries } from "./series";

/**
 * Rate of change as a fraction: close[t] / close[t - period] - 1.
 */
export function rocSeries(
	values: readonly number[],
	period: number
): IndicatorSeries {
	const series = emptySeries(values.length);
	if (period <= 0) {
		return series;
	}
	for (let i = period; i < values.length; i += 1) {
		const base = values[i - period];
		series[i] = base === 0 ? null : values[i] / base - 1;
	}
	return series;
}

export function roc(values: readonly number[], period: number): number | null {
	return latest(rocSeries(values, period));
}
