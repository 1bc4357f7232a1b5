import { describe, expect, it } from "vitest";
import type { Bar } from "@signaldesk/core";
import {
	buildBars,
	buildInput,
	closedGate,
	type BarShape,
} from "../../__tests__/builders";
import { intradayReversionConfig } from "../../__tests__/configs";
import { IntradayReversionStrategy } from "./index";

const rising = (symbol: string, lastBar: BarShape): Bar[] =>
	buildBars(symbol, [
		...Array.from({ length: 259 }, (_, i) => ({
			close: 20 + 0.1 * i,
			volume: 3_000_000,
		})),
		{ ...lastBar, volume: 3_000_000 },
	]);

// closes near the low of the last bar
const lastNearLow: BarShape = { close: 45.9, high: 46.85, low: 45.85 };
const nearLow = rising("HFA", lastNearLow);
// closes near the high of the last bar
const nearHigh = rising("HFB", { close: 45.9, high: 45.95, low: 44.95 });

const shortConfig = () =>
	intradayReversionConfig({
		id: "hft-short",
		side: "SHORT",
		minPrice: 20,
		ibrThreshold: 0.7,
		stretch: 0.3,
	});

describe("IntradayReversionStrategy", () => {
	it("fades a close near the low with a day-limited limit order", () => {
		const strategy = new IntradayReversionStrategy(intradayReversionConfig());
		const evaluation = strategy.evaluate(
			buildInput(strategy.config, [nearLow, nearHigh], { capital: 15_000 })
		);

		expect(evaluation.ranked.map((c) => c.symbol)).toEqual(["HFA"]);
		const [setup] = evaluation.ranked;
		expect(setup.indicators.ibr).toBeCloseTo(0.05, 9);
		expect(setup.indicators.atr).toBeCloseTo(1.01, 9);
		expect(setup.indicators.adx).toBeCloseTo(100, 9);

		expect(evaluation.intents).toHaveLength(1);
		const [entry] = evaluation.intents;
		expect(entry).toMatchObject({
			symbol: "HFA",
			intent: "OPEN_LONG",
			sizing: { type: "notional", amount: 1_000 },
			timeInForce: "GTD",
			goodTillDate: "2025-11-17T15:44:00",
			attachMoc: true,
			reason: "rank_1",
		});
		if (entry.price.type === "limit") {
			expect(entry.price.price).toBeCloseTo(45.244, 9);
		} else {
			expect.unreachable("entry should be a limit order");
		}
	});

	it("fades a close near the high on the short side", () => {
		const strategy = new IntradayReversionStrategy(shortConfig());
		const evaluation = strategy.evaluate(
			buildInput(strategy.config, [nearLow, nearHigh])
		);

		expect(evaluation.ranked.map((c) => c.symbol)).toEqual(["HFB"]);
		expect(evaluation.ranked[0].indicators.adx).toBeCloseTo(76.923, 3);
		const [entry] = evaluation.intents;
		expect(entry.intent).toBe("OPEN_SHORT");
		if (entry.price.type === "limit") {
			expect(entry.price.price).toBeCloseTo(46.25, 9);
		} else {
			expect.unreachable("entry should be a limit order");
		}
	});

	it("rolls the expiry to the next day once the cut-off has passed", () => {
		const strategy = new IntradayReversionStrategy(intradayReversionConfig());
		const evaluation = strategy.evaluate(
			buildInput(strategy.config, [nearLow], {
				now: new Date("2025-11-17T21:00:00Z"),
			})
		);
		expect(evaluation.intents[0].goodTillDate).toBe("2025-11-18T15:44:00");
	});

	it("emits no exits and skips symbols already held on its side", () => {
		const strategy = new IntradayReversionStrategy(intradayReversionConfig());
		const evaluation = strategy.evaluate(
			buildInput(strategy.config, [nearLow, rising("HFC", lastNearLow)], {
				positions: [{ symbol: "HFC", quantity: 10, averageCost: 40 }],
			})
		);
		expect(evaluation.ranked.map((c) => c.symbol)).toEqual(["HFA"]);
		expect(evaluation.intents.map((intent) => intent.intent)).toEqual([
			"OPEN_LONG",
		]);
	});

	it("keeps every slot free of holdings from other strategies", () => {
		const strategy = new IntradayReversionStrategy(
			intradayReversionConfig({ maxPositions: 2 })
		);
		const evaluation = strategy.evaluate(
			buildInput(strategy.config, [nearLow, rising("HFC", lastNearLow)], {
				symbols: ["HFA", "HFC", "MOMO1", "MOMO2"],
				positions: [
					{ symbol: "MOMO1", quantity: 50, averageCost: 100 },
					{ symbol: "MOMO2", quantity: 20, averageCost: 80 },
				],
			})
		);
		expect(evaluation.ranked.map((c) => c.symbol)).toEqual(["HFA", "HFC"]);
		expect(evaluation.intents.map((intent) => intent.symbol)).toEqual([
			"HFA",
			"HFC",
		]);
	});

	it("stops at the position count", () => {
		const strategy = new IntradayReversionStrategy(
			intradayReversionConfig({ maxPositions: 1 })
		);
		const evaluation = strategy.evaluate(
			buildInput(strategy.config, [nearLow, rising("HFC", lastNearLow)])
		);
		expect(evaluation.ranked).toHaveLength(2);
		expect(evaluation.intents.map((intent) => intent.symbol)).toEqual(["HFA"]);
	});

	it("suppresses entries behind a closed market filter", () => {
		const strategy = new IntradayReversionStrategy(
			intradayReversionConfig({ useMarketFilter: true })
		);
		const evaluation = strategy.evaluate(
			buildInput(strategy.config, [nearLow], { marketGate: closedGate })
		);
		expect(evaluation.entriesSuppressed).toBe("market_filter");
		expect(evaluation.ranked).toHaveLength(1);
		expect(evaluation.intents).toEqual([]);
	});

	it("treats the price band as inclusive", () => {
		const strategy = new IntradayReversionStrategy(
			intradayReversionConfig({ maxPrice: 45.9 })
		);
		const evaluation = strategy.evaluate(buildInput(strategy.config, [nearLow]));
		expect(evaluation.ranked.map((c) => c.symbol)).toEqual(["HFA"]);
	});
});
