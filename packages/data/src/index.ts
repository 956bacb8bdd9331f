export * from "./bars";
export * from "./csv";
export * from "./loadBars";
