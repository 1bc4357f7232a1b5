import type { BrokerageClient } from "@signaldesk/broker";
import type { CapitalPlan } from "@signaldesk/capital-engine";
import type {
	EngineConfig,
	OrderRecord,
	StrategyId,
	StrategyKind,
	SymbolSkip,
} from "@signaldesk/core";
import type { BarSource, FreshnessReport, WatchlistSource } from "@signaldesk/data";
import type { DroppedIntent } from "@signaldesk/order-builder";
import type { OrderSummaryRow } from "@signaldesk/order-writer";
import type { EntrySuppression } from "@signaldesk/strategy-engine";

/**
 * Everything a run touches outside its own process.
 */
export interface RuntimeCollaborators {
	broker: BrokerageClient;
	bars: BarSource;
	watchlists: WatchlistSource;
}

export interface RunDailySignalsOptions extends RuntimeCollaborators {
	config: EngineConfig;
	outputDir: string;
	/** Exchange date the orders are for; derived from `now` when omitted. */
	runDate?: string;
	now?: Date;
	dryRun?: boolean;
	concurrency?: number;
}

export type StrategyRunSummary =
	| {
			strategyId: StrategyId;
			kind: StrategyKind;
			ok: true;
			universe: string;
			ranked: number;
			orders: number;
			skipped: SymbolSkip[];
			entriesSuppressed: EntrySuppression | null;
	  }
	| {
			strategyId: StrategyId;
			kind: StrategyKind;
			ok: false;
			reason: string;
	  };

export interface DailySignalsReport {
	runDate: string;
	dryRun: boolean;
	outputPath: string | null;
	capital: CapitalPlan;
	freshness: FreshnessReport;
	strategies: StrategyRunSummary[];
	dropped: DroppedIntent[];
	records: OrderRecord[];
	summary: OrderSummaryRow[];
}
