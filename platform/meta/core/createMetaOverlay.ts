import type { MetaConfig } from "../config";
import type { MetaDatabase } from "../db";
import { MetaConfigError } from "../errors";
import {
  ChangeHistoryRecorder,
  InMemoryChangeHistorySink,
  JournalChangeHistorySink,
  NoopChangeHistorySink,
  type ChangeHistoryRecorderOptions,
  type ChangeHistorySink,
} from "../history";
import { log, silentLogger } from "../logging";
import { MetaOverlay, type HostRecord, type MetaOverlayOptions } from "../overlay";
import { InMemoryCompanionStore, PgCompanionStore, type CompanionStore } from "../store";

export type MetaStack<TStore extends CompanionStore = CompanionStore, TSink extends ChangeHistorySink = ChangeHistorySink> = {
  store: TStore;
  sink: TSink;
  history: ChangeHistoryRecorder;
  overlayFor(host: HostRecord, overrides?: MetaOverlayOptions): MetaOverlay;
};

function stack<TStore extends CompanionStore, TSink extends ChangeHistorySink>(
  store: TStore,
  sink: TSink,
  defaults: MetaOverlayOptions,
  historyOptions?: ChangeHistoryRecorderOptions,
): MetaStack<TStore, TSink> {
  const history = new ChangeHistoryRecorder(sink, historyOptions);
  return {
    store,
    sink,
    history,
    overlayFor: (host, overrides) => new MetaOverlay(host, store, history, { ...defaults, ...overrides }),
  };
}

/** In-memory store and journal, for tests and local experiments. */
export function createDevMetaOverlay(
  defaults: MetaOverlayOptions = {},
  historyOptions?: ChangeHistoryRecorderOptions,
): MetaStack<InMemoryCompanionStore, InMemoryChangeHistorySink> {
  return stack(new InMemoryCompanionStore(), new InMemoryChangeHistorySink(), defaults, historyOptions);
}

function historySink(config: MetaConfig, db?: MetaDatabase): ChangeHistorySink {
  switch (config.history) {
    case "journal":
      if (!db) throw new MetaConfigError(["META_HISTORY: journal history requires DATABASE_URL"]);
      return new JournalChangeHistorySink(db);
    case "memory":
      return new InMemoryChangeHistorySink();
    case "off":
      return new NoopChangeHistorySink();
  }
}

/**
 * Wires the overlay from configuration. With a database the companion store is
 * Postgres; without one everything stays in memory.
 */
export function createMetaStack(
  config: MetaConfig,
  db?: MetaDatabase,
  historyOptions?: ChangeHistoryRecorderOptions,
): MetaStack {
  const logger = config.logging ? log : silentLogger;
  const store: CompanionStore = db
    ? new PgCompanionStore(db, { schema: config.schema, logger })
    : new InMemoryCompanionStore();

  return stack(
    store,
    historySink(config, db),
    { autoLoad: config.autoLoad, eagerWrite: config.eagerWrite, logger },
    historyOptions,
  );
}
