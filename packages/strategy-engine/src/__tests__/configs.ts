import type {
	IntradayReversionStrategyConfig,
	MeanReversionStrategyConfig,
	RotationStrategyConfig,
} from "@signaldesk/core";

export const rotationConfig = (
	overrides: Partial<RotationStrategyConfig> = {}
): RotationStrategyConfig => ({
	id: "momo",
	kind: "rotation",
	allocation: 0.05,
	universe: { watchlist: "TEST" },
	exclude: [],
	maxPositions: 2,
	worstRank: 4,
	minBars: 3,
	rankOrder: "desc",
	useMarketFilter: false,
	entryEnabled: true,
	routing: { securityType: "STK", exchange: "SMART" },
	score: [{ period: 2, weight: 1 }],
	trendFilter: { type: "sma", period: 3 },
	requirePositiveScore: true,
	rebalance: "daily",
	timeInForce: "DAY",
	...overrides,
});

export const meanReversionConfig = (
	overrides: Partial<MeanReversionStrategyConfig> = {}
): MeanReversionStrategyConfig => ({
	id: "mr-long",
	kind: "meanReversion",
	side: "LONG",
	allocation: 0.15,
	universe: { watchlist: "SP500" },
	exclude: [],
	maxPositions: 10,
	minBars: 200,
	rankOrder: "desc",
	useMarketFilter: false,
	entryEnabled: true,
	routing: { securityType: "STK", exchange: "SMART" },
	minPrice: 5,
	volume: { period: 50, min: 200_000, average: "sma" },
	trendPeriod: 100,
	adx: { period: 10, threshold: 30 },
	rsi: { period: 2, threshold: 30 },
	atrPeriod: 10,
	stretch: 0.5,
	timeInForce: "GTC",
	...overrides,
});

export const intradayReversionConfig = (
	overrides: Partial<IntradayReversionStrategyConfig> = {}
): IntradayReversionStrategyConfig => ({
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
	...overrides,
});
