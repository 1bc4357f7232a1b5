import type { OrderAction, OrderRecord, StrategyId } from "@signaldesk/core";

export interface OrderSummaryRow {
	strategy: StrategyId;
	BUY: number;
	SELL: number;
	SELLSHORT: number;
	BUYTOCOVER: number;
	total: number;
}

/**
 * Order counts per strategy and action, strategies in first-seen order.
 */
export const summarizeOrders = (
	records: readonly OrderRecord[]
): OrderSummaryRow[] => {
	const rows = new Map<StrategyId, OrderSummaryRow>();
	for (const record of records) {
		let row = rows.get(record.strategy);
		if (!row) {
			row = {
				strategy: record.strategy,
				BUY: 0,
				SELL: 0,
				SELLSHORT: 0,
				BUYTOCOVER: 0,
				total: 0,
			};
			rows.set(record.strategy, row);
		}
		const action: OrderAction = record.action;
		row[action] += 1;
		row.total += 1;
	}
	return [...rows.values()];
};
