import type {
	IndicatorSnapshot,
	MeanReversionStrategyConfig,
} from "@signaldesk/core";
import { rsi } from "@signaldesk/indicators";

import { requireValue, type PreparedSeries } from "../../common";
import {
	computeReversionIndicators,
	stretchedLimit,
	toSnapshot,
} from "../reversionIndicators";

export interface MeanReversionChecks {
	price: boolean;
	volume: boolean;
	trend: boolean;
	adx: boolean;
	rsi: boolean;
}

export interface MeanReversionSetup {
	symbol: string;
	checks: MeanReversionChecks;
	passed: boolean;
	score: number;
	limitPrice: number;
	indicators: IndicatorSnapshot;
}

/**
 * Oversold (long) or overbought (short) pullback within an established,
 * liquid uptrend.
 */
export const evaluateMeanReversionSetup = (
	series: PreparedSeries,
	config: MeanReversionStrategyConfig
): MeanReversionSetup => {
	const base = computeReversionIndicators(series, config);
	const closes = series.bars.map((bar) => bar.close);
	const rsiValue = requireValue(
		rsi(closes, config.rsi.period),
		"rsi",
		series.symbol
	);

	const checks: MeanReversionChecks = {
		price: base.close > config.minPrice,
		volume: base.volumeAverage > config.volume.min,
		trend: base.close > base.trendAverage,
		adx: base.adx > config.adx.threshold,
		rsi:
			config.side === "LONG"
				? rsiValue < config.rsi.threshold
				: rsiValue > config.rsi.threshold,
	};

	return {
		symbol: series.symbol,
		checks,
		passed: Object.values(checks).every(Boolean),
		score: base.volatility,
		limitPrice: stretchedLimit(base, config),
		indicators: toSnapshot(base, { rsi: rsiValue }),
	};
};
