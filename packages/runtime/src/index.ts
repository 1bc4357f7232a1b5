export * from "./types";
export * from "./runDailySignals";
export * from "./runtimeFactory";
