export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./time";
export * from "./utils/logger";
export * from "./utils/fingerprint";
