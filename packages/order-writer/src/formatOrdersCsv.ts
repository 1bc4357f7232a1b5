import type { OrderRecord } from "@signaldesk/core";
import { formatTickPrice } from "@signaldesk/indicators";

export const ORDER_COLUMNS = [
	"Symbol",
	"Action",
	"Quantity",
	"OrderType",
	"LimitPrice",
	"StopPrice",
	"SecurityType",
	"Exchange",
	"Timezone",
	"TimeInForce",
	"GoodTillDate",
	"AttachMOC",
	"Strategy",
	"OutsideRTH",
	"AllOrNone",
	"Hidden",
	"DisplaySize",
	"DisplaySizeIsPercentage",
] as const;

export type OrderColumn = (typeof ORDER_COLUMNS)[number];

// passed through unchanged on every row
const TEMPLATE: Pick<
	Record<OrderColumn, string>,
	| "StopPrice"
	| "Timezone"
	| "OutsideRTH"
	| "AllOrNone"
	| "Hidden"
	| "DisplaySize"
	| "DisplaySizeIsPercentage"
> = {
	StopPrice: "",
	Timezone: "",
	OutsideRTH: "NO",
	AllOrNone: "NO",
	Hidden: "NO",
	DisplaySize: "0",
	DisplaySizeIsPercentage: "NO",
};

const yesNo = (value: boolean): string => (value ? "YES" : "NO");

export const toCsvRow = (record: OrderRecord): Record<OrderColumn, string> => ({
	...TEMPLATE,
	Symbol: record.symbol,
	Action: record.action,
	Quantity: String(record.quantity),
	OrderType: record.orderType,
	LimitPrice:
		record.orderType === "LIMIT" && record.limitPrice !== null
			? formatTickPrice(record.limitPrice)
			: "",
	SecurityType: record.securityType,
	Exchange: record.exchange,
	TimeInForce: record.timeInForce,
	GoodTillDate:
		record.timeInForce === "GTD" && record.goodTillDate ? record.goodTillDate : "",
	AttachMOC: yesNo(record.attachMoc),
	Strategy: record.strategy,
});

const formatValue = (value: string): string => {
	if (/[",\n]/.test(value)) {
		return `"${value.replace(/"/g, '""')}"`;
	}
	return value;
};

/**
 * Header plus one line per record, in the order given. An empty run still
 * yields the header.
 */
export const formatOrdersCsv = (records: readonly OrderRecord[]): string => {
	const lines: string[] = [ORDER_COLUMNS.join(",")];
	for (const record of records) {
		const row = toCsvRow(record);
		lines.push(ORDER_COLUMNS.map((column) => formatValue(row[column])).join(","));
	}
	return `${lines.join("\n")}\n`;
};
