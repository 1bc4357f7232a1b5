import type { PriceBar } from "./atr";

/**
 * Internal bar range: where the close sits within the bar, 0 at the low and
 * 1 at the high. A bar with no range reads 0.5.
 */
export function ibr(bar: PriceBar): number {
	const range = bar.high - bar.low;
	if (range === 0) {
		return 0.5;
	}
	return (bar.close - bar.low) / range;
}
