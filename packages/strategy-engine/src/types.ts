import type {
	Bar,
	MarketGate,
	OrderIntent,
	Position,
	RankedCandidate,
	StrategyBudget,
	StrategyConfig,
	StrategyId,
	StrategyKind,
	SymbolSkip,
	Universe,
} from "@signaldesk/core";

/**
 * Data end date a strategy evaluates at and the latest bar date it expects
 * to find there.
 */
export interface EvaluationWindow {
	dataEndDate: string;
	expectedLastDate: string;
}

export interface StrategyInput {
	runDate: string;
	now: Date;
	window: EvaluationWindow;
	universe: Universe;
	bars: ReadonlyMap<string, readonly Bar[]>;
	budget: StrategyBudget;
	positions: readonly Position[];
	marketGate: MarketGate;
}

export type EntrySuppression = "market_filter" | "entry_disabled";

export interface StrategyEvaluation {
	strategyId: StrategyId;
	kind: StrategyKind;
	intents: OrderIntent[];
	ranked: RankedCandidate[];
	skipped: SymbolSkip[];
	entriesSuppressed: EntrySuppression | null;
}

export interface SignalStrategy<TConfig extends StrategyConfig = StrategyConfig> {
	readonly config: TConfig;
	evaluate(input: StrategyInput): StrategyEvaluation;
}

export type StrategyResult =
	| { ok: true; strategyId: StrategyId; evaluation: StrategyEvaluation }
	| { ok: false; strategyId: StrategyId; error: Error; reason: string };
