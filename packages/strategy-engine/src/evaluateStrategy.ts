import { createLogger, describeError } from "@signaldesk/core";

import type { SignalStrategy, StrategyInput, StrategyResult } from "./types";

const strategyLogger = createLogger("strategy-engine");

/**
 * Runs one strategy and folds any throw into a failure result so the
 * remaining strategies still run.
 */
export const evaluateStrategy = (
	strategy: SignalStrategy,
	input: StrategyInput
): StrategyResult => {
	const strategyId = strategy.config.id;
	try {
		const evaluation = strategy.evaluate(input);
		for (const skip of evaluation.skipped) {
			strategyLogger.debug("symbol_skipped", { strategy: strategyId, ...skip });
		}
		strategyLogger.info("strategy_evaluated", {
			strategy: strategyId,
			kind: evaluation.kind,
			ok: true,
			ranked: evaluation.ranked.length,
			entries: evaluation.intents.filter((intent) => intent.intent.startsWith("OPEN")).length,
			exits: evaluation.intents.filter((intent) => intent.intent.startsWith("CLOSE")).length,
			skipped: evaluation.skipped.length,
			entriesSuppressed: evaluation.entriesSuppressed,
		});
		return { ok: true, strategyId, evaluation };
	} catch (caught) {
		const error = caught instanceof Error ? caught : new Error(describeError(caught));
		strategyLogger.error("strategy_evaluated", {
			strategy: strategyId,
			kind: strategy.config.kind,
			ok: false,
			reason: error.message,
			error,
		});
		return { ok: false, strategyId, error, reason: error.message };
	}
};
