import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type {
	IntradayReversionStrategyConfig,
	MeanReversionStrategyConfig,
	OrderIntent,
	RotationStrategyConfig,
} from "@signaldesk/core";
import { OrderBuilder, resolveOrderAction } from "./orderBuilder";

const routing = { securityType: "STK", exchange: "SMART" } as const;

const rotation: RotationStrategyConfig = {
	id: "growth",
	kind: "rotation",
	allocation: 0.1,
	universe: { symbols: ["QQQ", "SPY", "IOO"] },
	exclude: [],
	maxPositions: 1,
	worstRank: 2,
	minBars: 250,
	rankOrder: "desc",
	useMarketFilter: false,
	entryEnabled: true,
	routing,
	score: [{ period: 75, weight: 1 }],
	trendFilter: { type: "positiveScore", bars: 5 },
	requirePositiveScore: true,
	rebalance: "daily",
	timeInForce: "DAY",
};

const meanReversion: MeanReversionStrategyConfig = {
	id: "mr-short",
	kind: "meanReversion",
	side: "SHORT",
	allocation: 0.15,
	universe: { watchlist: "SP500" },
	exclude: ["GOOG"],
	maxPositions: 10,
	minBars: 200,
	rankOrder: "desc",
	useMarketFilter: false,
	entryEnabled: true,
	routing,
	minPrice: 5,
	volume: { period: 50, min: 200_000, average: "sma" },
	trendPeriod: 100,
	adx: { period: 10, threshold: 30 },
	rsi: { period: 3, threshold: 90 },
	atrPeriod: 10,
	stretch: 0.8,
	timeInForce: "GTC",
};

const intraday: IntradayReversionStrategyConfig = {
	id: "hft-long",
	kind: "intradayReversion",
	side: "LONG",
	allocation: 0.25,
	universe: { watchlist: "RUSSELL1000" },
	exclude: [],
	maxPositions: 15,
	minBars: 251,
	rankOrder: "desc",
	useMarketFilter: false,
	entryEnabled: true,
	routing: { securityType: "CFD", exchange: "SMART" },
	minPrice: 10,
	maxPrice: 5_000,
	volume: { period: 50, min: 2_000_000, average: "ema" },
	trendPeriod: 250,
	adx: { period: 4, threshold: 35 },
	ibrThreshold: 0.3,
	atrPeriod: 5,
	stretch: 0.6,
	goodTill: { hour: 15, minute: 44, timeZone: "America/New_York" },
	attachMoc: true,
};

const intent = (overrides: Partial<OrderIntent>): OrderIntent => ({
	symbol: "AAA",
	intent: "OPEN_LONG",
	price: { type: "market", reference: 100 },
	sizing: { type: "notional", amount: 1_000 },
	timeInForce: "DAY",
	attachMoc: false,
	reason: "rank_1",
	...overrides,
});

describe("resolveOrderAction", () => {
	it("maps long and short intents onto broker actions", () => {
		expect(resolveOrderAction("OPEN_LONG")).toBe("BUY");
		expect(resolveOrderAction("CLOSE_LONG")).toBe("SELL");
		expect(resolveOrderAction("OPEN_SHORT")).toBe("SELLSHORT");
		expect(resolveOrderAction("CLOSE_SHORT")).toBe("BUYTOCOVER");
	});
});

describe("OrderBuilder", () => {
	beforeEach(() => {
		vi.spyOn(console, "log").mockImplementation(() => undefined);
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	const builder = new OrderBuilder();

	it("sizes market orders on the reference close", () => {
		const { records, dropped } = builder.build(rotation, [
			intent({ symbol: "QQQ", price: { type: "market", reference: 512.3 } }),
			intent({
				symbol: "IOO",
				intent: "CLOSE_LONG",
				sizing: { type: "shares", quantity: 12 },
			}),
		]);

		expect(dropped).toEqual([]);
		expect(records).toEqual([
			{
				symbol: "QQQ",
				action: "BUY",
				quantity: 1,
				orderType: "MARKET",
				limitPrice: null,
				securityType: "STK",
				exchange: "SMART",
				timeInForce: "DAY",
				goodTillDate: null,
				attachMoc: false,
				strategy: "growth",
			},
			expect.objectContaining({ symbol: "IOO", action: "SELL", quantity: 12 }),
		]);
	});

	it("rounds limit prices to the tick and sizes on the rounded price", () => {
		const { records } = builder.build(intraday, [
			intent({
				symbol: "HFA",
				price: { type: "limit", price: 45.244 },
				sizing: { type: "notional", amount: 1_000 },
				timeInForce: "GTD",
				goodTillDate: "2025-11-17T15:44:00",
				attachMoc: true,
			}),
		]);

		expect(records).toEqual([
			{
				symbol: "HFA",
				action: "BUY",
				quantity: 22,
				orderType: "LIMIT",
				limitPrice: 45.24,
				securityType: "CFD",
				exchange: "SMART",
				timeInForce: "GTD",
				goodTillDate: "2025-11-17T15:44:00",
				attachMoc: true,
				strategy: "hft-long",
			},
		]);
	});

	it("uses the sub-dollar tick below two dollars", () => {
		const { records } = builder.build(meanReversion, [
			intent({
				intent: "OPEN_SHORT",
				price: { type: "limit", price: 1.2374 },
				sizing: { type: "notional", amount: 100 },
				timeInForce: "GTC",
			}),
		]);
		expect(records[0].limitPrice).toBe(1.235);
		expect(records[0].quantity).toBe(80);
		expect(records[0].action).toBe("SELLSHORT");
	});

	it("drops intents that size to zero shares", () => {
		const { records, dropped } = builder.build(rotation, [
			intent({ symbol: "SPY", price: { type: "market", reference: 1_200 } }),
		]);
		expect(records).toEqual([]);
		expect(dropped).toEqual([
			{
				strategy: "growth",
				symbol: "SPY",
				reason: "zero_quantity",
				detail: "1000.00 buys no shares at 1200",
			},
		]);
	});

	it("drops intents without a usable price", () => {
		const { dropped } = builder.build(meanReversion, [
			intent({ price: { type: "limit", price: -0.5 } }),
		]);
		expect(dropped.map((entry) => entry.reason)).toEqual(["invalid_price"]);
	});

	it("covers shorts with the absolute held quantity", () => {
		const { records } = builder.build(meanReversion, [
			intent({
				intent: "CLOSE_SHORT",
				price: { type: "limit", price: 33.5 },
				sizing: { type: "shares", quantity: 25 },
				timeInForce: "GTC",
			}),
		]);
		expect(records[0]).toMatchObject({
			action: "BUYTOCOVER",
			quantity: 25,
			orderType: "LIMIT",
			limitPrice: 33.5,
			timeInForce: "GTC",
			goodTillDate: null,
		});
	});
});
