export * from "./series";
export * from "./sma";
export * from "./ema";
export * from "./roc";
export * from "./rsi";
export * from "./atr";
export * from "./adx";
export * from "./ibr";
export * from "./tick";
