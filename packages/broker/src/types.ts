import type { AccountSnapshot } from "@signaldesk/core";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Read-only view of the brokerage platform used by the signal run.
 */
export interface BrokerageClient {
	authenticate(): Promise<void>;
	fetchAccountSnapshot(): Promise<AccountSnapshot>;
}

export interface TradingAppClientOptions {
	baseUrl: string;
	username?: string;
	password?: string;
	account?: string;
	timeoutMs?: number;
	fetch?: FetchLike;
}
