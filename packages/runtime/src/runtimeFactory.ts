import { TradingAppClient } from "@signaldesk/broker";
import type { EnvConfig } from "@signaldesk/core";
import { CsvBarSource, WatchlistStore } from "@signaldesk/data";

import type { RuntimeCollaborators } from "./types";

/**
 * Production collaborators: the trading app's REST API and the CSV market
 * data directory.
 */
export const createRuntimeCollaborators = (
	env: EnvConfig
): RuntimeCollaborators => ({
	broker: new TradingAppClient({
		baseUrl: env.brokerApiUrl,
		username: env.brokerUsername,
		password: env.brokerPassword,
		account: env.brokerAccount,
	}),
	bars: new CsvBarSource(env.marketDataDir),
	watchlists: new WatchlistStore(env.marketDataDir),
});
