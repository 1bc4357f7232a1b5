import type { StrategyConfig } from "@signaldesk/core";

import { IntradayReversionStrategy } from "./strategies/intraday-reversion";
import { MeanReversionStrategy } from "./strategies/mean-reversion";
import { RotationStrategy } from "./strategies/rotation";
import type { SignalStrategy } from "./types";

export const createStrategy = (config: StrategyConfig): SignalStrategy => {
	switch (config.kind) {
		case "rotation":
			return new RotationStrategy(config);
		case "meanReversion":
			return new MeanReversionStrategy(config);
		case "intradayReversion":
			return new IntradayReversionStrategy(config);
		default: {
			const unreachable: never = config;
			throw new Error(`Unsupported strategy kind: ${JSON.stringify(unreachable)}`);
		}
	}
};
