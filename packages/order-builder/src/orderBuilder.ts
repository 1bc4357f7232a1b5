import {
	createLogger,
	type OrderAction,
	type OrderIntent,
	type OrderRecord,
	type StrategyConfig,
	type StrategyId,
	type TradeIntentType,
} from "@signaldesk/core";
import { roundToTick } from "@signaldesk/indicators";

const builderLogger = createLogger("order-builder");

export type DropReason = "zero_quantity" | "invalid_price";

export interface DroppedIntent {
	strategy: StrategyId;
	symbol: string;
	reason: DropReason;
	detail: string;
}

export interface OrderBuildResult {
	records: OrderRecord[];
	dropped: DroppedIntent[];
}

const ACTIONS: Record<TradeIntentType, OrderAction> = {
	OPEN_LONG: "BUY",
	CLOSE_LONG: "SELL",
	OPEN_SHORT: "SELLSHORT",
	CLOSE_SHORT: "BUYTOCOVER",
};

export const resolveOrderAction = (intent: TradeIntentType): OrderAction =>
	ACTIONS[intent];

/**
 * Turns strategy intents into order records: limit prices snapped to their
 * tick, notional budgets converted to whole shares, routing and provenance
 * stamped from the strategy. Records keep the intent order; nothing is
 * deduplicated across strategies.
 */
export class OrderBuilder {
	build(
		strategy: StrategyConfig,
		intents: readonly OrderIntent[]
	): OrderBuildResult {
		const records: OrderRecord[] = [];
		const dropped: DroppedIntent[] = [];

		for (const intent of intents) {
			const outcome = this.buildRecord(strategy, intent);
			if ("reason" in outcome) {
				dropped.push(outcome);
				builderLogger.warn("order_dropped", { ...outcome });
			} else {
				records.push(outcome);
			}
		}

		return { records, dropped };
	}

	private buildRecord(
		strategy: StrategyConfig,
		intent: OrderIntent
	): OrderRecord | DroppedIntent {
		const drop = (reason: DropReason, detail: string): DroppedIntent => ({
			strategy: strategy.id,
			symbol: intent.symbol,
			reason,
			detail,
		});

		const limitPrice =
			intent.price.type === "limit" ? roundToTick(intent.price.price) : null;
		const sizingPrice =
			intent.price.type === "limit" ? limitPrice : intent.price.reference;
		if (sizingPrice === null || !Number.isFinite(sizingPrice) || sizingPrice <= 0) {
			return drop("invalid_price", `price ${String(sizingPrice)} for ${intent.intent}`);
		}

		const quantity =
			intent.sizing.type === "shares"
				? Math.floor(intent.sizing.quantity)
				: Math.floor(intent.sizing.amount / sizingPrice);
		if (!Number.isFinite(quantity) || quantity < 1) {
			return drop(
				"zero_quantity",
				intent.sizing.type === "notional"
					? `${intent.sizing.amount.toFixed(2)} buys no shares at ${sizingPrice}`
					: `held quantity ${intent.sizing.quantity}`
			);
		}

		return {
			symbol: intent.symbol,
			action: resolveOrderAction(intent.intent),
			quantity,
			orderType: limitPrice === null ? "MARKET" : "LIMIT",
			limitPrice,
			securityType: strategy.routing.securityType,
			exchange: strategy.routing.exchange,
			timeInForce: intent.timeInForce,
			goodTillDate:
				intent.timeInForce === "GTD" ? intent.goodTillDate ?? null : null,
			attachMoc: intent.attachMoc,
			strategy: strategy.id,
		};
	}
}
