import { emptySeries, latest, type IndicatorSeries } from "./series";

/**
 * Exponential moving average seeded with the simple average of the first
 * `length` values.
 */
export function emaSeries(
  values: readonly number[],
  length: number
): IndicatorSeries {
  const series = emptySeries(values.length);
  if (length <= 0 || values.length < length) {
    return series;
  }

  const multiplier = 2 / (length + 1);
  let emaValue = average(values.slice(0, length));
  series[length - 1] = emaValue;

  for (let i = length; i < values.length; i += 1) {
    emaValue = (values[i] - emaValue) * multiplier + emaValue;
    series[i] = emaValue;
  }

  return series;
}

export function ema(values: readonly number[], length: number): number | null {
  return latest(emaSeries(values, length));
}

const average = (nums: readonly number[]): number => {
  const sum = nums.reduce((acc, value) => acc + value, 0);
  return sum / nums.length;
};
