import path from "node:path";
import { describe, expect, it } from "vitest";
import {
	loadEngineConfig,
	loadEnvConfig,
	parseEngineConfig,
	requiredHistory,
	selectStrategies,
} from "./config";
import { ConfigurationError } from "./errors";

const FIXTURE_DIR = path.join(__dirname, "__tests__", "fixtures");
const REPO_CONFIG = path.join(__dirname, "..", "..", "..", "configs", "engine.json");

const meanReversion = (overrides: Record<string, unknown> = {}) => ({
	id: "mr-long",
	kind: "meanReversion",
	side: "LONG",
	allocation: 0.15,
	universe: { watchlist: "SP500" },
	maxPositions: 10,
	minBars: 200,
	minPrice: 5,
	volume: { period: 50, min: 200_000 },
	trendPeriod: 100,
	adx: { period: 10, threshold: 30 },
	rsi: { period: 2, threshold: 30 },
	atrPeriod: 10,
	stretch: 0.5,
	routing: { securityType: "STK", exchange: "SMART" },
	...overrides,
});

const engine = (strategies: unknown[]) => ({
	marketFilter: { symbol: "#NYSEHL", period: 13 },
	strategies,
});

describe("loadEngineConfig", () => {
	it("applies defaults to a minimal file", () => {
		const config = loadEngineConfig(
			path.join(FIXTURE_DIR, "engine.minimal.json")
		);
		expect(config.capital.safetyBuffer).toBe(0.2);
		expect(config.freshness).toEqual({ benchmarkSymbol: "SPY", holidays: [] });
		expect(config.output.filePrefix).toBe("daily_orders");
		const [growth] = config.strategies;
		expect(growth.kind).toBe("rotation");
		expect(growth.exclude).toEqual([]);
		expect(growth.rankOrder).toBe("desc");
		expect(growth.entryEnabled).toBe(true);
		expect(growth.useMarketFilter).toBe(false);
	});

	it("freezes the validated structure", () => {
		const config = loadEngineConfig(
			path.join(FIXTURE_DIR, "engine.minimal.json")
		);
		expect(Object.isFrozen(config)).toBe(true);
		expect(Object.isFrozen(config.strategies[0].universe)).toBe(true);
	});

	it("loads the repository configuration in order", () => {
		const config = loadEngineConfig(REPO_CONFIG);
		expect(config.strategies.map((strategy) => strategy.id)).toEqual([
			"momo",
			"growth",
			"def",
			"btc",
			"mr-long",
			"mr-short",
			"hft-long",
			"hft-short",
		]);
		expect(config.strategies.map(requiredHistory)).toEqual([
			241, 155, 155, 44, 100, 100, 250, 250,
		]);
	});

	it("reports missing and malformed files as configuration errors", () => {
		expect(() =>
			loadEngineConfig(path.join(FIXTURE_DIR, "absent.json"))
		).toThrowError(ConfigurationError);
		expect(() =>
			loadEngineConfig(path.join(FIXTURE_DIR, "engine.broken.json"))
		).toThrowError(/is not JSON/);
	});
});

describe("parseEngineConfig", () => {
	it("rejects duplicate strategy ids", () => {
		expect(() =>
			parseEngineConfig(
				engine([meanReversion(), meanReversion({ allocation: 0.1 })])
			)
		).toThrowError(/strategies\.1\.id: Duplicate strategy id "mr-long"/);
	});

	it("rejects allocations above the whole account", () => {
		expect(() =>
			parseEngineConfig(
				engine([
					meanReversion({ allocation: 0.6 }),
					meanReversion({ id: "mr-short", side: "SHORT", allocation: 0.5 }),
				])
			)
		).toThrowError(/Allocations sum to 1\.1000, above 1/);
	});

	it("rejects a history window shorter than the indicators need", () => {
		expect(() =>
			parseEngineConfig(engine([meanReversion({ minBars: 50 })]))
		).toThrowError(/minBars 50 is shorter than the 100 bars/);
	});

	it("rejects a hysteresis band tighter than the position count", () => {
		const rotation = {
			id: "momo",
			kind: "rotation",
			allocation: 0.05,
			universe: { watchlist: "NASDAQ100" },
			maxPositions: 3,
			worstRank: 2,
			minBars: 250,
			score: [{ period: 120, weight: 1 }],
			trendFilter: { type: "sma", period: 100 },
			routing: { securityType: "STK", exchange: "SMART" },
		};
		expect(() => parseEngineConfig(engine([rotation]))).toThrowError(
			/worstRank 2 is tighter than maxPositions 3/
		);
	});

	it("rejects an inline universe that repeats a symbol", () => {
		expect(() =>
			parseEngineConfig(
				engine([meanReversion({ universe: { symbols: ["QQQ", "SPY", "QQQ"] } })])
			)
		).toThrowError(/Duplicate symbols in universe/);
	});

	it("rejects unknown strategy ids", () => {
		expect(() =>
			parseEngineConfig(engine([meanReversion({ id: "scalper" })]))
		).toThrowError(ConfigurationError);
	});
});

describe("selectStrategies", () => {
	const config = parseEngineConfig(
		engine([
			meanReversion(),
			meanReversion({ id: "mr-short", side: "SHORT" }),
		])
	);

	it("keeps configuration order", () => {
		const subset = selectStrategies(config, ["mr-short"]);
		expect(subset.strategies.map((strategy) => strategy.id)).toEqual([
			"mr-short",
		]);
	});

	it("returns the full config when no ids are given", () => {
		expect(selectStrategies(config, [])).toBe(config);
	});

	it("rejects ids that are not configured", () => {
		expect(() => selectStrategies(config, ["momo", "nope"])).toThrowError(
			/Unknown or unconfigured strategies: momo, nope/
		);
	});
});

describe("loadEnvConfig", () => {
	it("resolves defaults against the given root", () => {
		const env = loadEnvConfig({}, "/srv/signals");
		expect(env).toEqual({
			brokerApiUrl: "http://localhost:8000",
			brokerUsername: undefined,
			brokerPassword: undefined,
			brokerAccount: undefined,
			marketDataDir: path.join("/srv/signals", "data"),
			outputDir: path.join("/srv/signals", "output"),
			configPath: path.join("/srv/signals", "configs", "engine.json"),
		});
	});

	it("reads credentials and absolute overrides", () => {
		const env = loadEnvConfig(
			{
				BROKER_API_URL: "http://broker.test",
				BROKER_USERNAME: "trader",
				BROKER_PASSWORD: "test-secret",
				MARKET_DATA_DIR: "/mnt/bars",
				SIGNALS_OUTPUT_DIR: " ",
			},
			"/srv/signals"
		);
		expect(env.brokerApiUrl).toBe("http://broker.test");
		expect(env.brokerPassword).toBe("test-secret");
		expect(env.marketDataDir).toBe("/mnt/bars");
		expect(env.outputDir).toBe(path.join("/srv/signals", "output"));
	});
});
