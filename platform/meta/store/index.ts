export type { CompanionStore } from "./CompanionStore";
export { InMemoryCompanionStore } from "./InMemoryCompanionStore";
export { PgCompanionStore, type PgCompanionStoreOptions, type SqlExecutor } from "./PgCompanionStore";
export * from "./types";
