export * from "./trendFilter";
export * from "./cloudSignal";
