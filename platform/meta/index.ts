export * from "./codec";
export * from "./store";
export * from "./history";
export * from "./overlay";
export * from "./core";
export * from "./errors";
export { loadMetaConfig, type MetaConfig, type MetaHistoryMode } from "./config";
export { createDatabase, withClient, type DatabaseHandle, type MetaDatabase } from "./db";
export { log, silentLogger, type MetaLogger } from "./logging";
