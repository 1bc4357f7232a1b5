import { describe, expect, it } from "vitest";
import type { Bar } from "@signaldesk/core";
import {
	buildBars,
	buildInput,
	closedGate,
} from "../../__tests__/builders";
import { rotationConfig } from "../../__tests__/configs";
import { momentumScoreSeries } from "./entryLogic";
import { RotationStrategy } from "./index";

const geometric = (symbol: string, growth: number, lastDate?: string): Bar[] =>
	buildBars(
		symbol,
		Array.from({ length: 5 }, (_, i) => ({ close: 100 * Math.pow(1 + growth, i) })),
		lastDate
	);

const UNIVERSE = ["S1", "S2", "S3", "S4", "S5", "S6", "S7", "S8", "S9"];

const buildUniverseBars = (): Bar[][] => [
	geometric("S1", 0.06),
	geometric("S2", 0.05),
	geometric("S3", 0.04),
	geometric("S4", 0.03),
	geometric("S5", 0.02),
	geometric("S6", 0.01),
	geometric("S7", -0.02),
	geometric("S8", 0.08, "2025-11-13"),
];

const positions = [
	{ symbol: "S3", quantity: 10, averageCost: 100 },
	{ symbol: "S6", quantity: 7, averageCost: 100 },
	{ symbol: "S9", quantity: 4, averageCost: 100 },
	{ symbol: "S5", quantity: -3, averageCost: 100 },
	{ symbol: "XYZ", quantity: 100, averageCost: 5 },
];

describe("RotationStrategy", () => {
	it("ranks qualified symbols and applies the hysteresis band", () => {
		const bars = buildUniverseBars();
		const strategy = new RotationStrategy(rotationConfig());
		const evaluation = strategy.evaluate(
			buildInput(strategy.config, bars, { symbols: UNIVERSE, positions })
		);

		expect(evaluation.ranked.map((c) => c.symbol)).toEqual([
			"S1",
			"S2",
			"S3",
			"S4",
			"S5",
			"S6",
		]);
		expect(evaluation.skipped.map((s) => [s.symbol, s.reason])).toEqual([
			["S8", "stale_data"],
			["S9", "missing_bars"],
		]);
		expect(evaluation.entriesSuppressed).toBeNull();

		const [exit, ...entries] = evaluation.intents;
		expect(exit).toEqual({
			symbol: "S6",
			intent: "CLOSE_LONG",
			price: { type: "market", reference: bars[5][4].close },
			sizing: { type: "shares", quantity: 7 },
			timeInForce: "DAY",
			attachMoc: false,
			reason: "rank_6_beyond_4",
		});
		expect(
			entries.map((intent) => [intent.symbol, intent.intent, intent.reason])
		).toEqual([
			["S1", "OPEN_LONG", "rank_1"],
			["S2", "OPEN_LONG", "rank_2"],
		]);
		expect(entries[0].sizing).toEqual({ type: "notional", amount: 5_000 });
		expect(entries[0].price).toEqual({
			type: "market",
			reference: bars[0][4].close,
		});
	});

	it("still exits but opens nothing when the market filter is closed", () => {
		const strategy = new RotationStrategy(
			rotationConfig({ useMarketFilter: true })
		);
		const evaluation = strategy.evaluate(
			buildInput(strategy.config, buildUniverseBars(), {
				symbols: UNIVERSE,
				positions,
				marketGate: closedGate,
			})
		);
		expect(evaluation.entriesSuppressed).toBe("market_filter");
		expect(evaluation.ranked).toHaveLength(6);
		expect(evaluation.intents.map((intent) => intent.symbol)).toEqual(["S6"]);
	});

	it("ignores a closed gate when the strategy does not use it", () => {
		const strategy = new RotationStrategy(rotationConfig());
		const evaluation = strategy.evaluate(
			buildInput(strategy.config, buildUniverseBars(), {
				symbols: UNIVERSE,
				marketGate: closedGate,
			})
		);
		expect(evaluation.intents.map((intent) => intent.symbol)).toEqual([
			"S1",
			"S2",
		]);
	});

	it("suppresses entries when disabled", () => {
		const strategy = new RotationStrategy(rotationConfig({ entryEnabled: false }));
		const evaluation = strategy.evaluate(
			buildInput(strategy.config, buildUniverseBars(), { symbols: UNIVERSE })
		);
		expect(evaluation.entriesSuppressed).toBe("entry_disabled");
		expect(evaluation.intents).toEqual([]);
	});

	it("requires a positive score on each recent bar", () => {
		const strategy = new RotationStrategy(
			rotationConfig({
				score: [{ period: 1, weight: 1 }],
				trendFilter: { type: "positiveScore", bars: 3 },
				maxPositions: 1,
				worstRank: 1,
				minBars: 4,
			})
		);
		const dip = buildBars("P", [10, 11, 12, 11.5, 12.5].map((close) => ({ close })));
		const steady = buildBars("Q", [10, 11, 12, 13, 14].map((close) => ({ close })));
		const evaluation = strategy.evaluate(buildInput(strategy.config, [dip, steady]));

		expect(evaluation.ranked.map((c) => c.symbol)).toEqual(["Q"]);
		expect(evaluation.intents).toHaveLength(1);
		expect(evaluation.intents[0].sizing).toEqual({
			type: "notional",
			amount: 10_000,
		});
	});

	it("skips symbols whose indicators are still warming up", () => {
		const strategy = new RotationStrategy(rotationConfig({ minBars: 2 }));
		const evaluation = strategy.evaluate(
			buildInput(strategy.config, [buildBars("W", [{ close: 10 }, { close: 11 }])])
		);
		expect(evaluation.skipped).toEqual([
			{ symbol: "W", reason: "indicator_warmup", detail: "score unavailable for W" },
		]);
		expect(evaluation.intents).toEqual([]);
	});
});

describe("momentumScoreSeries", () => {
	it("weights rate-of-change legs", () => {
		const scores = momentumScoreSeries(
			[10, 11, 12.1],
			[
				{ period: 1, weight: 0.5 },
				{ period: 2, weight: 0.5 },
			]
		);
		expect(scores.slice(0, 2)).toEqual([null, null]);
		expect(scores[2]).toBeCloseTo(0.155, 10);
	});
});
