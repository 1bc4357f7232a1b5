import type {
	IndicatorSnapshot,
	IntradayReversionStrategyConfig,
} from "@signaldesk/core";
import { ibr } from "@signaldesk/indicators";

import type { PreparedSeries } from "../../common";
import {
	computeReversionIndicators,
	stretchedLimit,
	toSnapshot,
} from "../reversionIndicators";

export interface IntradayReversionChecks {
	price: boolean;
	volume: boolean;
	trend: boolean;
	adx: boolean;
	ibr: boolean;
}

export interface IntradayReversionSetup {
	symbol: string;
	checks: IntradayReversionChecks;
	passed: boolean;
	score: number;
	limitPrice: number;
	indicators: IndicatorSnapshot;
}

/**
 * Close near the low (long) or high (short) of a trending, liquid name,
 * faded with a limit the next session.
 */
export const evaluateIntradayReversionSetup = (
	series: PreparedSeries,
	config: IntradayReversionStrategyConfig
): IntradayReversionSetup => {
	const base = computeReversionIndicators(series, config);
	const barRange = ibr(series.latest);

	const checks: IntradayReversionChecks = {
		price: base.close >= config.minPrice && base.close <= config.maxPrice,
		volume: base.volumeAverage > config.volume.min,
		trend: base.close > base.trendAverage,
		adx: base.adx > config.adx.threshold,
		ibr:
			config.side === "LONG"
				? barRange < config.ibrThreshold
				: barRange > config.ibrThreshold,
	};

	return {
		symbol: series.symbol,
		checks,
		passed: Object.values(checks).every(Boolean),
		score: base.volatility,
		limitPrice: stretchedLimit(base, config),
		indicators: toSnapshot(base, { ibr: barRange }),
	};
};
