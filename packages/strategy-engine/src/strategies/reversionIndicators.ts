import type {
	IntradayReversionStrategyConfig,
	MeanReversionStrategyConfig,
} from "@signaldesk/core";
import {
	adx,
	atr,
	ema,
	sma,
	volatilityPct,
} from "@signaldesk/indicators";

import { requireValue, type PreparedSeries } from "../common";

export type ReversionConfig =
	| MeanReversionStrategyConfig
	| IntradayReversionStrategyConfig;

export interface ReversionIndicators {
	close: number;
	high: number;
	low: number;
	volumeAverage: number;
	trendAverage: number;
	adx: number;
	atr: number;
	volatility: number;
}

/**
 * Indicators both reversion variants filter and rank on, read at the latest
 * bar.
 */
export const computeReversionIndicators = (
	series: PreparedSeries,
	config: ReversionConfig
): ReversionIndicators => {
	const { symbol, bars, latest } = series;
	const closes = bars.map((bar) => bar.close);
	const volumes = bars.map((bar) => bar.volume);
	const volumeAverage =
		config.volume.average === "ema"
			? ema(volumes, config.volume.period)
			: sma(volumes, config.volume.period);
	const atrValue = requireValue(atr(bars, config.atrPeriod), "atr", symbol);

	return {
		close: latest.close,
		high: latest.high,
		low: latest.low,
		volumeAverage: requireValue(volumeAverage, "volume_average", symbol),
		trendAverage: requireValue(sma(closes, config.trendPeriod), "trend_sma", symbol),
		adx: requireValue(adx(bars, config.adx.period), "adx", symbol),
		atr: atrValue,
		volatility: requireValue(volatilityPct(atrValue, latest.close), "volatility", symbol),
	};
};

/**
 * Limit entry stretched away from the latest bar: below the low for longs,
 * above the high for shorts.
 */
export const stretchedLimit = (
	indicators: ReversionIndicators,
	config: ReversionConfig
): number =>
	config.side === "LONG"
		? indicators.low - config.stretch * indicators.atr
		: indicators.high + config.stretch * indicators.atr;

export const toSnapshot = (
	indicators: ReversionIndicators,
	extra: Record<string, number> = {}
): Record<string, number> => ({
	close: indicators.close,
	volumeAverage: indicators.volumeAverage,
	trendAverage: indicators.trendAverage,
	adx: indicators.adx,
	atr: indicators.atr,
	volatility: indicators.volatility,
	...extra,
});
