export const STRATEGY_IDS = [
	"momo",
	"growth",
	"def",
	"btc",
	"mr-long",
	"mr-short",
	"hft-long",
	"hft-short",
] as const;

export type StrategyId = (typeof STRATEGY_IDS)[number];

export const STRATEGY_KINDS = [
	"rotation",
	"meanReversion",
	"intradayReversion",
] as const;

export type StrategyKind = (typeof STRATEGY_KINDS)[number];

export const isStrategyId = (value: unknown): value is StrategyId => {
	return STRATEGY_IDS.some((id) => id === value);
};
