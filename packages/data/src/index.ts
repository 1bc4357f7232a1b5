export * from "./types";
export * from "./csvBarSource";
export * from "./watchlistStore";
export * from "./freshness";
export * from "./provider";
