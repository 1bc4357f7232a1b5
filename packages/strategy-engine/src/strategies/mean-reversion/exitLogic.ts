import type {
	Bar,
	MeanReversionStrategyConfig,
	OrderIntent,
	Position,
} from "@signaldesk/core";

/**
 * Profit-taking limit at the latest bar's extreme: the high for longs, the
 * low for shorts.
 */
export const buildMeanReversionExit = (
	position: Position,
	lastBar: Bar,
	config: MeanReversionStrategyConfig
): OrderIntent => {
	const long = config.side === "LONG";
	return {
		symbol: position.symbol,
		intent: long ? "CLOSE_LONG" : "CLOSE_SHORT",
		price: { type: "limit", price: long ? lastBar.high : lastBar.low },
		sizing: { type: "shares", quantity: Math.abs(position.quantity) },
		timeInForce: config.timeInForce,
		attachMoc: false,
		reason: long ? "exit_at_prior_high" : "exit_at_prior_low",
	};
};
