import { CapitalAllocator } from "@signaldesk/capital-engine";
import {
	DEFAULT_EXCHANGE_TIME_ZONE,
	addDays,
	createLogger,
	describeError,
	isSignalRunError,
	toExchangeDate,
	type Bar,
	type EngineConfig,
	type MarketGate,
	type OrderRecord,
	type StrategyConfig,
	type Universe,
} from "@signaldesk/core";
import {
	MarketDataProvider,
	assessFreshness,
	type SeriesLoadResult,
} from "@signaldesk/data";
import { OrderBuilder, type DroppedIntent } from "@signaldesk/order-builder";
import { summarizeOrders, writeOrdersFile } from "@signaldesk/order-writer";
import {
	closedGate,
	createStrategy,
	evaluateMarketGate,
	evaluateStrategy,
	resolveEvaluationWindow,
	truncateBars,
	type EvaluationWindow,
} from "@signaldesk/strategy-engine";

import type {
	DailySignalsReport,
	RunDailySignalsOptions,
	StrategyRunSummary,
} from "./types";

export const runtimeLogger = createLogger("signal-runtime");

interface ResolvedUniverse {
	strategy: StrategyConfig;
	universe: Universe | null;
	failure: string | null;
}

const resolveUniverses = async (
	config: EngineConfig,
	provider: MarketDataProvider
): Promise<ResolvedUniverse[]> => {
	const resolved: ResolvedUniverse[] = [];
	for (const strategy of config.strategies) {
		try {
			const universe = await provider.resolveUniverse(
				strategy.universe,
				strategy.exclude
			);
			resolved.push({ strategy, universe, failure: null });
		} catch (error) {
			if (!isSignalRunError(error)) {
				throw error;
			}
			runtimeLogger.error("universe_unavailable", {
				strategy: strategy.id,
				reason: error.message,
			});
			resolved.push({ strategy, universe: null, failure: error.message });
		}
	}
	return resolved;
};

/**
 * Gate per data end date: monthly rotations read the regime series at the
 * same date their bars end.
 */
const createGateResolver = (
	config: EngineConfig,
	series: SeriesLoadResult
): ((window: EvaluationWindow) => MarketGate) => {
	const regimeBars: Bar[] = series.bars.get(config.marketFilter.symbol) ?? [];
	const cache = new Map<string, MarketGate>();
	return (window) => {
		const cached = cache.get(window.dataEndDate);
		if (cached) {
			return cached;
		}
		const gate = regimeBars.length
			? evaluateMarketGate(
					truncateBars(regimeBars, window.dataEndDate),
					config.marketFilter.period
				)
			: closedGate();
		if (!gate.available) {
			runtimeLogger.warn("market_filter_unavailable", {
				symbol: config.marketFilter.symbol,
				period: config.marketFilter.period,
				dataEndDate: window.dataEndDate,
			});
		} else {
			runtimeLogger.info("market_filter_evaluated", {
				symbol: config.marketFilter.symbol,
				dataEndDate: window.dataEndDate,
				...gate,
			});
		}
		cache.set(window.dataEndDate, gate);
		return gate;
	};
};

/**
 * One daily run: account state, capital split, market data, every
 * configured strategy in order, then the consolidated order file.
 * Configuration, authentication and capital failures abort the run; a
 * failing strategy is reported and the rest still produce orders.
 */
export const runDailySignals = async (
	options: RunDailySignalsOptions
): Promise<DailySignalsReport> => {
	const { config } = options;
	const now = options.now ?? new Date();
	const runDate = options.runDate ?? toExchangeDate(now, DEFAULT_EXCHANGE_TIME_ZONE);
	const dryRun = options.dryRun ?? false;
	const holidays = config.freshness.holidays;

	runtimeLogger.info("run_started", {
		runDate,
		dryRun,
		strategies: config.strategies.map((strategy) => strategy.id),
	});

	await options.broker.authenticate();
	const account = await options.broker.fetchAccountSnapshot();
	runtimeLogger.info("account_loaded", {
		buyingPower: account.buyingPower,
		grossPositionValue: account.grossPositionValue,
		positions: account.positions.length,
	});

	const capital = new CapitalAllocator({
		safetyBuffer: config.capital.safetyBuffer,
	}).allocate(account, config.strategies);
	runtimeLogger.info("capital_allocated", {
		usableCapital: capital.usableCapital,
		safetyBuffer: capital.safetyBuffer,
		budgets: capital.budgets,
	});

	const provider = new MarketDataProvider({
		source: options.bars,
		watchlists: options.watchlists,
		concurrency: options.concurrency,
		logger: runtimeLogger,
	});
	const universes = await resolveUniverses(config, provider);
	const symbols = new Set<string>([
		config.marketFilter.symbol,
		config.freshness.benchmarkSymbol,
	]);
	for (const { universe } of universes) {
		universe?.symbols.forEach((symbol) => symbols.add(symbol));
	}
	const series = await provider.loadSeries({
		symbols: [...symbols],
		endDate: addDays(runDate, -1),
	});

	const freshness = assessFreshness(
		config.freshness.benchmarkSymbol,
		series.bars.get(config.freshness.benchmarkSymbol) ?? [],
		runDate,
		holidays
	);
	if (freshness.fresh) {
		runtimeLogger.info("market_data_freshness", { ...freshness });
	} else {
		runtimeLogger.warn("market_data_freshness", { ...freshness });
	}

	const gateFor = createGateResolver(config, series);
	const builder = new OrderBuilder();
	const records: OrderRecord[] = [];
	const dropped: DroppedIntent[] = [];
	const strategies: StrategyRunSummary[] = [];

	for (const { strategy, universe, failure } of universes) {
		const budget = capital.budgets.find(
			(entry) => entry.strategyId === strategy.id
		);
		if (!universe || !budget) {
			strategies.push({
				strategyId: strategy.id,
				kind: strategy.kind,
				ok: false,
				reason: failure ?? "no capital budget",
			});
			continue;
		}

		const window = resolveEvaluationWindow(strategy, runDate, holidays);
		const result = evaluateStrategy(createStrategy(strategy), {
			runDate,
			now,
			window,
			universe,
			bars: series.bars,
			budget,
			positions: account.positions,
			marketGate: gateFor(window),
		});
		if (!result.ok) {
			strategies.push({
				strategyId: strategy.id,
				kind: strategy.kind,
				ok: false,
				reason: result.reason,
			});
			continue;
		}

		const built = builder.build(strategy, result.evaluation.intents);
		records.push(...built.records);
		dropped.push(...built.dropped);
		strategies.push({
			strategyId: strategy.id,
			kind: strategy.kind,
			ok: true,
			universe: universe.name,
			ranked: result.evaluation.ranked.length,
			orders: built.records.length,
			skipped: result.evaluation.skipped,
			entriesSuppressed: result.evaluation.entriesSuppressed,
		});
	}

	const summary = summarizeOrders(records);
	let outputPath: string | null = null;
	if (dryRun) {
		runtimeLogger.info("orders_preview", {
			runDate,
			count: records.length,
			summary,
			orders: records,
		});
	} else {
		outputPath = await writeOrdersFile(records, {
			outputDir: options.outputDir,
			filePrefix: config.output.filePrefix,
			runDate,
		});
		runtimeLogger.info("orders_written", {
			runDate,
			path: outputPath,
			count: records.length,
			summary,
		});
	}

	const failed = strategies.filter((entry) => !entry.ok);
	if (failed.length) {
		runtimeLogger.warn("strategies_failed", {
			strategies: failed.map((entry) => entry.strategyId),
		});
	}

	return {
		runDate,
		dryRun,
		outputPath,
		capital,
		freshness,
		strategies,
		dropped,
		records,
		summary,
	};
};

export const describeRunFailure = (
	error: unknown
): { stage: string; code: string; message: string } =>
	isSignalRunError(error)
		? { stage: error.stage, code: error.code, message: error.message }
		: { stage: "unknown", code: "UNEXPECTED", message: describeError(error) };
