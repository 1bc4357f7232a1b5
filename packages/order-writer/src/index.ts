export * from "./formatOrdersCsv";
export * from "./summarizeOrders";
export * from "./writeOrdersFile";
