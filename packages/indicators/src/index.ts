export * from "./rolling";
export * from "./midpoint";
export * from "./ema";
export * from "./atr";
export * from "./cloud";
