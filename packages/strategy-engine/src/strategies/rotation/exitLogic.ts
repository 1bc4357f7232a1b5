import type {
	Bar,
	OrderIntent,
	Position,
	RotationStrategyConfig,
} from "@signaldesk/core";

/**
 * Full liquidation at market for a holding that fell out of the hysteresis
 * band.
 */
export const buildRotationExit = (
	position: Position,
	lastBar: Bar,
	rank: number | null,
	config: RotationStrategyConfig
): OrderIntent => ({
	symbol: position.symbol,
	intent: "CLOSE_LONG",
	price: { type: "market", reference: lastBar.close },
	sizing: { type: "shares", quantity: position.quantity },
	timeInForce: config.timeInForce,
	attachMoc: false,
	reason:
		rank === null
			? "dropped_from_ranking"
			: `rank_${rank}_beyond_${config.worstRank}`,
});
