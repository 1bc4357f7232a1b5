/**
 * Minimum price increment for a limit price at `price`.
 */
export function tickSize(price: number): number {
	if (price < 0.1) {
		return 0.001;
	}
	if (price < 2) {
		return 0.005;
	}
	return 0.01;
}

export function roundToTick(price: number): number {
	const tick = tickSize(price);
	return Number((Math.round(price / tick) * tick).toFixed(3));
}

/**
 * Fixed-point rendering: three decimals below $2, two otherwise.
 */
export function formatTickPrice(price: number): string {
	return price < 2 ? price.toFixed(3) : price.toFixed(2);
}

/**
 * ATR as a percentage of the close, the volatility ranking score.
 */
export function volatilityPct(atrValue: number, close: number): number | null {
	if (close <= 0) {
		return null;
	}
	return (atrValue / close) * 100;
}
