/**
 * Strategy engine turns windowed daily bars, budgets and holdings into order
 * intents, one evaluator per configured strategy.
 */
export * from "./types";
export * from "./marketFilter";
export * from "./selection";
export * from "./window";
export * from "./common";
export * from "./createStrategy";
export * from "./evaluateStrategy";
export * from "./strategies/rotation";
export * from "./strategies/mean-reversion";
export * from "./strategies/intraday-reversion";
export * from "./strategies/reversionIndicators";
export * from "./strategies/reversionEntries";
