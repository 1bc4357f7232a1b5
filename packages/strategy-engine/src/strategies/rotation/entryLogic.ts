import type {
	IndicatorSnapshot,
	RotationStrategyConfig,
} from "@signaldesk/core";
import {
	emptySeries,
	latest,
	lookback,
	rocSeries,
	sma,
	type IndicatorSeries,
} from "@signaldesk/indicators";

import { requireValue, type PreparedSeries } from "../../common";

export interface RotationChecks {
	trend: boolean;
	positiveScore: boolean;
}

export interface RotationSetup {
	symbol: string;
	close: number;
	score: number;
	checks: RotationChecks;
	qualified: boolean;
	indicators: IndicatorSnapshot;
}

/**
 * Weighted sum of rate-of-change legs; null wherever any leg is warming up.
 */
export const momentumScoreSeries = (
	closes: readonly number[],
	legs: RotationStrategyConfig["score"]
): IndicatorSeries => {
	const legSeries = legs.map((leg) => ({
		weight: leg.weight,
		series: rocSeries(closes, leg.period),
	}));
	const scores = emptySeries(closes.length);
	for (let i = 0; i < closes.length; i += 1) {
		let total = 0;
		let complete = true;
		for (const leg of legSeries) {
			const value = leg.series[i];
			if (value === null) {
				complete = false;
				break;
			}
			total += leg.weight * value;
		}
		scores[i] = complete ? total : null;
	}
	return scores;
};

export const evaluateRotationSetup = (
	series: PreparedSeries,
	config: RotationStrategyConfig
): RotationSetup => {
	const { symbol, bars, latest: lastBar } = series;
	const closes = bars.map((bar) => bar.close);
	const scores = momentumScoreSeries(closes, config.score);
	const score = requireValue(latest(scores), "score", symbol);
	const indicators: IndicatorSnapshot = { close: lastBar.close, score };

	let trend: boolean;
	if (config.trendFilter.type === "sma") {
		const average = requireValue(
			sma(closes, config.trendFilter.period),
			"trend_sma",
			symbol
		);
		indicators.trendAverage = average;
		trend = lastBar.close > average;
	} else {
		trend = true;
		for (let offset = 0; offset < config.trendFilter.bars; offset += 1) {
			const past = requireValue(lookback(scores, offset), "score", symbol);
			if (past <= 0) {
				trend = false;
			}
		}
	}

	const checks: RotationChecks = {
		trend,
		positiveScore: !config.requirePositiveScore || score > 0,
	};
	return {
		symbol,
		close: lastBar.close,
		score,
		checks,
		qualified: checks.trend && checks.positiveScore,
		indicators,
	};
};
