export * from "./runBacktest";
export * from "./batch";
export * from "./optimize";
