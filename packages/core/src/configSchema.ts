import { z } from "zod";

import { STRATEGY_IDS } from "./strategies/ids";
import { isIsoDate } from "./time";

const period = z.number().int().positive();
const price = z.number().positive();
const fraction = z.number().min(0).max(1);

const universeSchema = z.union([
	z.object({ watchlist: z.string().min(1) }).strict(),
	z
		.object({
			symbols: z
				.array(z.string().min(1))
				.min(1)
				.refine((symbols) => new Set(symbols).size === symbols.length, {
					message: "Duplicate symbols in universe",
				}),
		})
		.strict(),
]);

const routingSchema = z.object({
	securityType: z.enum(["STK", "CFD"]),
	exchange: z.string().min(1),
});

const thresholdSchema = z.object({
	period,
	threshold: z.number(),
});

const volumeFilterSchema = z.object({
	period,
	min: z.number().nonnegative(),
	average: z.enum(["sma", "ema"]).default("sma"),
});

const baseStrategyShape = {
	id: z.enum(STRATEGY_IDS),
	allocation: fraction,
	universe: universeSchema,
	exclude: z.array(z.string().min(1)).default([]),
	maxPositions: period,
	minBars: period,
	rankOrder: z.enum(["asc", "desc"]).default("desc"),
	useMarketFilter: z.boolean().default(false),
	entryEnabled: z.boolean().default(true),
	routing: routingSchema,
};

const rotationSchema = z.object({
	...baseStrategyShape,
	kind: z.literal("rotation"),
	worstRank: period,
	score: z
		.array(z.object({ period, weight: z.number() }))
		.min(1),
	trendFilter: z.discriminatedUnion("type", [
		z.object({ type: z.literal("sma"), period }),
		z.object({ type: z.literal("positiveScore"), bars: period }),
	]),
	requirePositiveScore: z.boolean().default(true),
	rebalance: z.enum(["daily", "monthly"]).default("daily"),
	timeInForce: z.enum(["DAY", "GTC"]).default("DAY"),
});

const meanReversionSchema = z.object({
	...baseStrategyShape,
	kind: z.literal("meanReversion"),
	side: z.enum(["LONG", "SHORT"]),
	minPrice: price,
	volume: volumeFilterSchema,
	trendPeriod: period,
	adx: thresholdSchema,
	rsi: thresholdSchema,
	atrPeriod: period,
	stretch: z.number().nonnegative(),
	timeInForce: z.enum(["DAY", "GTC"]).default("GTC"),
});

const intradayReversionSchema = z.object({
	...baseStrategyShape,
	kind: z.literal("intradayReversion"),
	side: z.enum(["LONG", "SHORT"]),
	minPrice: price,
	maxPrice: price,
	volume: volumeFilterSchema,
	trendPeriod: period,
	adx: thresholdSchema,
	ibrThreshold: fraction,
	atrPeriod: period,
	stretch: z.number().nonnegative(),
	goodTill: z.object({
		hour: z.number().int().min(0).max(23),
		minute: z.number().int().min(0).max(59),
		timeZone: z.string().min(1),
	}),
	attachMoc: z.boolean().default(true),
});

export const strategyConfigSchema = z.discriminatedUnion("kind", [
	rotationSchema,
	meanReversionSchema,
	intradayReversionSchema,
]);

export type StrategyConfig = z.infer<typeof strategyConfigSchema>;
export type RotationStrategyConfig = z.infer<typeof rotationSchema>;
export type MeanReversionStrategyConfig = z.infer<typeof meanReversionSchema>;
export type IntradayReversionStrategyConfig = z.infer<
	typeof intradayReversionSchema
>;
export type UniverseSource = z.infer<typeof universeSchema>;

/**
 * Bars a strategy needs before every indicator it reads has a value on the
 * latest bar. ROC(n), RSI(n) and ATR(n) need n+1 bars, ADX(n) needs 2n.
 */
export const requiredHistory = (strategy: StrategyConfig): number => {
	switch (strategy.kind) {
		case "rotation": {
			const longest = Math.max(...strategy.score.map((leg) => leg.period));
			return strategy.trendFilter.type === "sma"
				? Math.max(longest + 1, strategy.trendFilter.period)
				: longest + strategy.trendFilter.bars;
		}
		case "meanReversion":
			return Math.max(
				strategy.volume.period,
				strategy.trendPeriod,
				strategy.adx.period * 2,
				strategy.rsi.period + 1,
				strategy.atrPeriod + 1
			);
		case "intradayReversion":
			return Math.max(
				strategy.volume.period,
				strategy.trendPeriod,
				strategy.adx.period * 2,
				strategy.atrPeriod + 1
			);
	}
};

export const engineConfigSchema = z
	.object({
		capital: z
			.object({
				safetyBuffer: z.number().min(0).lt(1).default(0.2),
			})
			.default({}),
		marketFilter: z.object({
			symbol: z.string().min(1),
			period,
		}),
		freshness: z
			.object({
				benchmarkSymbol: z.string().min(1).default("SPY"),
				holidays: z
					.array(
						z.string().refine(isIsoDate, { message: "Expected YYYY-MM-DD" })
					)
					.default([]),
			})
			.default({}),
		output: z
			.object({
				filePrefix: z
					.string()
					.regex(/^[A-Za-z0-9_-]+$/)
					.default("daily_orders"),
			})
			.default({}),
		strategies: z.array(strategyConfigSchema).min(1),
	})
	.superRefine((config, ctx) => {
		const seen = new Set<string>();
		let totalAllocation = 0;
		config.strategies.forEach((strategy, index) => {
			if (seen.has(strategy.id)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["strategies", index, "id"],
					message: `Duplicate strategy id "${strategy.id}"`,
				});
			}
			seen.add(strategy.id);
			totalAllocation += strategy.allocation;

			if (
				strategy.kind === "rotation" &&
				strategy.worstRank < strategy.maxPositions
			) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["strategies", index, "worstRank"],
					message: `worstRank ${strategy.worstRank} is tighter than maxPositions ${strategy.maxPositions}`,
				});
			}
			if (
				strategy.kind === "intradayReversion" &&
				strategy.maxPrice < strategy.minPrice
			) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["strategies", index, "maxPrice"],
					message: "maxPrice must not be below minPrice",
				});
			}
			const needed = requiredHistory(strategy);
			if (strategy.minBars < needed) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["strategies", index, "minBars"],
					message: `minBars ${strategy.minBars} is shorter than the ${needed} bars the indicators need`,
				});
			}
		});
		// float tolerance
		if (totalAllocation > 1 + 1e-9) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["strategies"],
				message: `Allocations sum to ${totalAllocation.toFixed(4)}, above 1`,
			});
		}
	});

export type EngineConfig = z.infer<typeof engineConfigSchema>;
