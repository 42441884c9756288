export * from "./types";
export * from "./errors";
export * from "./terms";
export * from "./config";
export * from "./blocks";
export * from "./header";
export * from "./sections";
export * from "./record";
export * from "./extract";
export * from "./scan";
export * from "./csv";
export * from "./batch";
export * from "./ingest/index";
export { getLogger, silentLogger } from "./logger";
export type { Level, LogContext, LogOptions, Logger } from "./logger";
