import { emptySeries, type IndicatorSeries } from "./series";

export function sma(values: readonly number[], period: number): number | null {
	if (period <= 0 || values.length < period) {
		return null;
	}

	const window = values.slice(values.length - period);
	const sum = window.reduce((acc, value) => acc + value, 0);
	return sum / period;
}

export function smaSeries(
	values: readonly number[],
	period: number
): IndicatorSeries {
	const series = emptySeries(values.length);
	if (period <= 0) {
		return series;
	}

	let sum = 0;
	for (let i = 0; i < values.length; i += 1) {
		sum += values[i];
		if (i >= period) {
			sum -= values[i - period];
		}
		if (i >= period - 1) {
			series[i] = sum / period;
		}
	}
	return series;
}
