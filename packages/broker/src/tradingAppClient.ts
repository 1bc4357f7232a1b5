import crossFetch from "cross-fetch";
import type { z } from "zod";
import {
	AuthenticationFailureError,
	CapitalStateInvalidError,
	createLogger,
	describeError,
	type AccountSnapshot,
	type Position,
} from "@signaldesk/core";

import {
	accountSummarySchema,
	loginResponseSchema,
	positionsSchema,
} from "./schemas";
import type {
	BrokerageClient,
	FetchLike,
	TradingAppClientOptions,
} from "./types";

const brokerLogger = createLogger("broker");

const DEFAULT_TIMEOUT_MS = 15_000;

/**
 * HTTP client for the trading app REST API: bearer-token login, account
 * summary and aggregate positions.
 */
export class TradingAppClient implements BrokerageClient {
	private readonly fetchImpl: FetchLike;
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private token: string | null = null;

	constructor(private readonly options: TradingAppClientOptions) {
		this.fetchImpl = options.fetch ?? crossFetch;
		this.baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
	}

	get authenticated(): boolean {
		return this.token !== null;
	}

	async authenticate(): Promise<void> {
		const { username, password } = this.options;
		if (!username || !password) {
			throw new AuthenticationFailureError(
				"Broker credentials are not configured"
			);
		}

		let response: Response;
		try {
			response = await this.request("/api/auth/login", {
				method: "POST",
				headers: { "Content-Type": "application/json" },
				body: JSON.stringify({ username, password }),
			});
		} catch (error) {
			throw new AuthenticationFailureError(
				`Broker login request failed: ${describeError(error)}`,
				{ baseUrl: this.baseUrl }
			);
		}

		if (!response.ok) {
			throw new AuthenticationFailureError(
				`Broker login rejected with HTTP ${response.status}`,
				{ status: response.status }
			);
		}

		const body = loginResponseSchema.safeParse(await readJson(response));
		if (!body.success) {
			throw new AuthenticationFailureError(
				"Broker login response carried no access token"
			);
		}
		this.token = body.data.access_token;
		brokerLogger.info("broker_authenticated", { baseUrl: this.baseUrl });
	}

	async fetchAccountSnapshot(): Promise<AccountSnapshot> {
		const [summary, holdings] = await Promise.all([
			this.getJson("/api/account-summary", accountSummarySchema),
			this.getJson("/api/positions", positionsSchema),
		]);

		const positions = aggregatePositions(
			holdings.positions.map((row) => ({
				symbol: row.symbol.toUpperCase(),
				quantity: row.position,
				averageCost: row.avgCost ?? null,
			}))
		);

		const snapshot: AccountSnapshot = {
			buyingPower: summary.account.buyingPower ?? null,
			grossPositionValue: summary.account.grossPositionValue ?? null,
			netLiquidation: summary.account.netLiquidation ?? null,
			positions,
		};
		brokerLogger.info("account_snapshot", {
			buyingPower: snapshot.buyingPower,
			grossPositionValue: snapshot.grossPositionValue,
			positions: positions.length,
		});
		return snapshot;
	}

	private async getJson<T extends z.ZodTypeAny>(
		pathname: string,
		schema: T
	): Promise<z.infer<T>> {
		if (!this.token) {
			throw new AuthenticationFailureError(
				"Broker session is not authenticated"
			);
		}

		const query = this.options.account
			? `?account=${encodeURIComponent(this.options.account)}`
			: "";
		let response: Response;
		try {
			response = await this.request(`${pathname}${query}`, {
				method: "GET",
				headers: { Authorization: `Bearer ${this.token}` },
			});
		} catch (error) {
			throw new CapitalStateInvalidError(
				`Broker request ${pathname} failed: ${describeError(error)}`
			);
		}

		if (response.status === 401 || response.status === 403) {
			this.token = null;
			throw new AuthenticationFailureError(
				`Broker rejected session on ${pathname}`,
				{ status: response.status }
			);
		}
		if (!response.ok) {
			throw new CapitalStateInvalidError(
				`Broker request ${pathname} returned HTTP ${response.status}`,
				{ status: response.status }
			);
		}

		const parsed = schema.safeParse(await readJson(response));
		if (!parsed.success) {
			throw new CapitalStateInvalidError(
				`Unexpected broker payload from ${pathname}`,
				{ issues: parsed.error.issues.map((issue) => issue.message) }
			);
		}
		return parsed.data;
	}

	private async request(pathname: string, init: RequestInit): Promise<Response> {
		const controller = new AbortController();
		const timer = setTimeout(() => controller.abort(), this.timeoutMs);
		try {
			return await this.fetchImpl(`${this.baseUrl}${pathname}`, {
				...init,
				signal: controller.signal,
			});
		} finally {
			clearTimeout(timer);
		}
	}
}

const readJson = async (response: Response): Promise<unknown> => {
	try {
		const body: unknown = await response.json();
		return body;
	} catch {
		return null;
	}
};

/**
 * Sums rows per symbol and drops flat holdings.
 */
export const aggregatePositions = (rows: readonly Position[]): Position[] => {
	const bySymbol = new Map<string, Position>();
	for (const row of rows) {
		const existing = bySymbol.get(row.symbol);
		if (existing) {
			existing.quantity += row.quantity;
			existing.averageCost = existing.averageCost ?? row.averageCost;
		} else {
			bySymbol.set(row.symbol, { ...row });
		}
	}
	return [...bySymbol.values()].filter((position) => position.quantity !== 0);
};
