import type { StrategyId } from "./strategies/ids";

export * from "./time";

/**
 * One daily OHLCV bar. `date` is the exchange calendar day (YYYY-MM-DD);
 * series are chronological with no gaps assumed.
 */
export interface Bar {
	symbol: string;
	date: string;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export interface Universe {
	name: string;
	symbols: string[];
}

export type TradeIntentType =
	| "OPEN_LONG"
	| "CLOSE_LONG"
	| "OPEN_SHORT"
	| "CLOSE_SHORT";

export type OrderAction = "BUY" | "SELL" | "SELLSHORT" | "BUYTOCOVER";
export type OrderType = "MARKET" | "LIMIT";
export type SecurityType = "STK" | "CFD";
export type TimeInForce = "DAY" | "GTC" | "GTD";

/**
 * Aggregate brokerage holding. Positive quantity is long, negative is short.
 * Positions are not attributed to a strategy.
 */
export interface Position {
	symbol: string;
	quantity: number;
	averageCost: number | null;
}

/**
 * Brokerage account state as reported. Capital fields are null when the
 * broker omitted them; validation happens in the allocator.
 */
export interface AccountSnapshot {
	buyingPower: number | null;
	grossPositionValue: number | null;
	netLiquidation: number | null;
	positions: Position[];
}

export type IndicatorSnapshot = Record<string, number>;

export interface RankedCandidate {
	symbol: string;
	score: number;
	indicators: IndicatorSnapshot;
}

export interface StrategyBudget {
	strategyId: StrategyId;
	allocationPct: number;
	capital: number;
}

export interface MarketGate {
	available: boolean;
	bullish: boolean;
	value: number | null;
	average: number | null;
	asOf: string | null;
}

export type PriceBasis =
	| { type: "market"; reference: number }
	| { type: "limit"; price: number };

export type SizingBasis =
	| { type: "notional"; amount: number }
	| { type: "shares"; quantity: number };

export interface OrderIntent {
	symbol: string;
	intent: TradeIntentType;
	price: PriceBasis;
	sizing: SizingBasis;
	timeInForce: TimeInForce;
	goodTillDate?: string;
	attachMoc: boolean;
	reason: string;
	score?: number;
	indicators?: IndicatorSnapshot;
}

export interface OrderRecord {
	symbol: string;
	action: OrderAction;
	quantity: number;
	orderType: OrderType;
	limitPrice: number | null;
	securityType: SecurityType;
	exchange: string;
	timeInForce: TimeInForce;
	goodTillDate: string | null;
	attachMoc: boolean;
	strategy: StrategyId;
}

export type SkipReason =
	| "missing_bars"
	| "stale_data"
	| "insufficient_history"
	| "indicator_warmup";

export interface SymbolSkip {
	symbol: string;
	reason: SkipReason;
	detail?: string;
}
