import { decodeMetaValue, encodeMetaValue, toMetaValue, type MetaValue } from "../codec";
import { MetaFlushError, MetaInvariantViolation, type FlushFailure } from "../errors";
import type { ChangeHistoryRecorder, ChangeRecord } from "../history";
import { silentLogger, type MetaLogger } from "../logging";
import { companionTableName, type CompanionStore, type MetaEntry, type OwnerId } from "../store";
import type { HostRecord } from "./HostRecord";
import type {
  BulkAssignOptions,
  DispatchOutcome,
  FlushResult,
  MetaOverlayOptions,
  MetaWriteOptions,
  OverlayState,
  PendingMetaWrite,
} from "./types";

function decodeEntry(entry: MetaEntry): MetaValue | null {
  if (entry.value === null) return null;
  return decodeMetaValue(entry.value, entry.valueType ?? "string");
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** A store write that has committed, and the change it still has to journal. */
type Dispatched = {
  outcome: DispatchOutcome;
  change?: ChangeRecord;
};

/**
 * Meta attribute overlay for one host record instance.
 *
 * Two tiers: `getAttribute`/`setAttribute` route known columns to the host and
 * everything else here; `get`/`set` address meta attributes only.
 *
 * - The cache is replaced wholesale by `load()`, never patched per key
 * - Writes are queued until the host is durable, or always when eager write is off
 * - Queued keys have not reached the store; reads do not see them
 * - Flush keeps entries that failed to dispatch and reports them in MetaFlushError
 * - A change whose store write committed but whose journal append failed is
 *   appended again on the next flush, with its original timestamp
 */
export class MetaOverlay {
  private cache = new Map<string, MetaEntry>();
  private readonly queue = new Map<string, PendingMetaWrite>();
  private readonly unjournaled: ChangeRecord[] = [];
  private currentState: OverlayState = "unloaded";

  private readonly autoLoad: boolean;
  private readonly eagerWrite: boolean;
  private readonly exceptAttributes: readonly string[];
  private readonly unsafeAttributes: readonly string[];
  private readonly logger: MetaLogger;

  constructor(
    private readonly host: HostRecord,
    private readonly store: CompanionStore,
    private readonly history: ChangeHistoryRecorder,
    options: MetaOverlayOptions = {},
  ) {
    this.autoLoad = options.autoLoad ?? true;
    this.eagerWrite = options.eagerWrite ?? false;
    this.exceptAttributes = options.exceptAttributes ?? [];
    this.unsafeAttributes = options.unsafeAttributes ?? [];
    this.logger = options.logger ?? silentLogger;
  }

  get state(): OverlayState {
    return this.currentState;
  }

  metaTableName(): string {
    return companionTableName(this.host.ownerTableBaseName());
  }

  pendingWrites(): ReadonlyMap<string, PendingMetaWrite> {
    return new Map(this.queue);
  }

  // ---- Host tier ----

  async getAttribute(name: string): Promise<unknown> {
    if (this.host.isRecognizedColumn(name)) {
      return this.host.getColumn(name);
    }
    return this.get(name);
  }

  async setAttribute(name: string, value: unknown, options?: MetaWriteOptions): Promise<void> {
    if (this.host.isRecognizedColumn(name)) {
      this.host.setColumn(name, value);
      return;
    }
    await this.set(name, value == null ? null : toMetaValue(value), options);
  }

  /** Bulk assignment. Returns the names that were refused. */
  async setAttributes(values: Record<string, unknown>, options: BulkAssignOptions = {}): Promise<string[]> {
    const safeColumns = new Set(
      options.safeOnly ? (this.host.safeColumnNames?.() ?? this.host.columnNames()) : this.host.columnNames(),
    );
    const skipped: string[] = [];

    for (const [name, value] of Object.entries(values)) {
      if (this.host.isRecognizedColumn(name)) {
        if (safeColumns.has(name)) {
          this.host.setColumn(name, value);
        } else {
          skipped.push(name);
        }
        continue;
      }
      if (this.unsafeAttributes.includes(name)) {
        skipped.push(name);
        continue;
      }
      await this.setAttribute(name, value);
    }

    return skipped;
  }

  // ---- Meta tier ----

  /** Cached value, else a single-key lookup. Null when the key (or the table) does not exist. */
  async get(name: string): Promise<MetaValue | null> {
    const cached = this.cache.get(name);
    if (cached) return decodeEntry(cached);

    const ownerId = this.host.primaryKeyValue();
    if (ownerId === null) return null;

    const ownerTable = this.host.ownerTableBaseName();
    if (!(await this.store.tableExists(ownerTable))) return null;

    const entry = await this.store.find(ownerTable, ownerId, name);
    return entry ? decodeEntry(entry) : null;
  }

  async set(name: string, value: MetaValue | null, options: MetaWriteOptions = {}): Promise<void> {
    const write: PendingMetaWrite = { value, type: options.type };

    if (this.eagerWrite && this.host.isDurable()) {
      const { change } = await this.dispatch(name, write);
      this.queue.delete(name);
      if (this.currentState === "loaded") await this.load();
      await this.journal(change);
      return;
    }

    if (value !== null) encodeMetaValue(value, options.type);
    this.queue.set(name, write);
  }

  // ---- Lifecycle ----

  async load(): Promise<void> {
    const next = new Map<string, MetaEntry>();
    const ownerId = this.host.primaryKeyValue();

    if (ownerId !== null) {
      const ownerTable = this.host.ownerTableBaseName();
      if (await this.store.tableExists(ownerTable)) {
        for (const entry of await this.store.loadAll(ownerTable, ownerId)) {
          next.set(entry.key, entry);
        }
      }
      this.logger(`loaded ${next.size} meta attribute(s) for ${ownerTable}#${ownerId}`, "meta-overlay");
    }

    this.cache = next;
    this.currentState = "loaded";
  }

  async afterFetch(): Promise<void> {
    if (this.autoLoad) await this.load();
  }

  async afterSave(): Promise<FlushResult> {
    return this.flush();
  }

  /**
   * Appends changes left unjournaled by an earlier failure, dispatches every
   * queued write in queue order, then reloads the cache. Entries whose store
   * write fails stay queued; all failures are thrown together as MetaFlushError.
   */
  async flush(): Promise<FlushResult> {
    if (!this.host.isDurable()) {
      throw new MetaInvariantViolation(
        `Cannot flush meta attributes of ${this.host.ownerTableBaseName()} before it has a durable identity.`,
      );
    }

    const dispatched: DispatchOutcome[] = [];
    const failures: FlushFailure[] = [];
    const fail = (key: string, err: unknown) => {
      const error = toError(err);
      failures.push({ key, error });
      this.logger(`failed to flush ${key}: ${error.message}`, "meta-overlay");
    };

    for (const record of this.unjournaled.splice(0)) {
      try {
        await this.journal(record);
      } catch (err) {
        fail(record.fieldName, err);
      }
    }

    for (const [key, write] of Array.from(this.queue)) {
      let result: Dispatched;
      try {
        result = await this.dispatch(key, write);
      } catch (err) {
        fail(key, err);
        continue;
      }
      this.queue.delete(key);
      dispatched.push(result.outcome);
      try {
        await this.journal(result.change);
      } catch (err) {
        fail(key, err);
      }
    }

    try {
      await this.load();
    } catch (err) {
      if (failures.length === 0) throw err;
      this.logger(`reload after partial flush failed: ${toError(err).message}`, "meta-overlay");
    }

    if (failures.length > 0) {
      throw new MetaFlushError(failures);
    }

    this.logger(`flushed ${dispatched.length} queued meta write(s)`, "meta-overlay");
    return { dispatched };
  }

  // ---- Merged views ----

  getMetaAttributes(): Record<string, MetaValue | null> {
    const values = new Map<string, MetaValue | null>();
    for (const [key, entry] of this.cache) {
      values.set(key, decodeEntry(entry));
    }
    return Object.fromEntries(values);
  }

  /**
   * Named values (all host columns when `names` is omitted), unioned with the
   * cached meta attributes, minus `except` and the overlay's except list.
   * Host columns win over meta keys of the same name.
   */
  getAttributes(names?: readonly string[], except: readonly string[] = [], includeMeta = true): Record<string, unknown> {
    const values = new Map<string, unknown>();

    for (const name of names ?? this.host.columnNames()) {
      values.set(name, this.host.isRecognizedColumn(name) ? this.host.getColumn(name) : this.cachedValue(name));
    }

    if (includeMeta) {
      for (const [key, entry] of this.cache) {
        if (!this.host.isRecognizedColumn(key)) values.set(key, decodeEntry(entry));
      }
    }

    for (const name of [...except, ...this.exceptAttributes]) {
      values.delete(name);
    }

    return Object.fromEntries(values);
  }

  getAllAttributes(): Record<string, unknown> {
    return this.getAttributes(undefined, []);
  }

  // ---- Dispatch ----

  private cachedValue(name: string): MetaValue | null {
    const entry = this.cache.get(name);
    return entry ? decodeEntry(entry) : null;
  }

  private requireOwnerId(): OwnerId {
    const ownerId = this.host.primaryKeyValue();
    if (ownerId === null) {
      throw new MetaInvariantViolation(
        `${this.host.ownerTableBaseName()} has no durable identity; meta writes must be queued.`,
      );
    }
    return ownerId;
  }

  /** Appends a committed change; on failure it is kept for the next flush. */
  private async journal(change: ChangeRecord | undefined): Promise<void> {
    if (!change) return;
    try {
      await this.history.append(change);
    } catch (err) {
      this.unjournaled.push(change);
      throw err;
    }
  }

  /** Writes one entry to the store. The returned change has not been journaled yet. */
  private async dispatch(key: string, write: PendingMetaWrite): Promise<Dispatched> {
    const ownerTable = this.host.ownerTableBaseName();
    const ownerId = this.requireOwnerId();
    const encoded = write.value === null ? null : encodeMetaValue(write.value, write.type);

    await this.store.ensureTable(ownerTable);
    const current = await this.store.find(ownerTable, ownerId, key);

    let outcome: DispatchOutcome;
    let change: ChangeRecord | undefined;
    if (encoded === null) {
      if (!current) {
        outcome = { key, action: "skipped" };
      } else {
        await this.store.delete(ownerTable, ownerId, key);
        outcome = { key, action: "deleted", metaEntryId: current.id };
      }
    } else if (!current) {
      const row = await this.store.upsert(ownerTable, ownerId, key, encoded);
      change = this.history.stamp({
        tableName: ownerTable,
        rowId: String(ownerId),
        metaEntryId: row.id,
        eventKind: "created",
        fieldName: key,
        oldValue: null,
        newValue: encoded.text,
      });
      outcome = { key, action: "created", metaEntryId: row.id };
    } else if (current.value === encoded.text && current.valueType === encoded.type) {
      outcome = { key, action: "unchanged", metaEntryId: current.id };
    } else {
      const row = await this.store.upsert(ownerTable, ownerId, key, encoded);
      change = this.history.stamp({
        tableName: ownerTable,
        rowId: String(ownerId),
        metaEntryId: row.id,
        eventKind: "updated",
        fieldName: key,
        oldValue: current.value,
        newValue: encoded.text,
      });
      outcome = { key, action: "updated", metaEntryId: row.id };
    }

    this.logger(`${outcome.action} ${key} on ${ownerTable}#${ownerId}`, "meta-overlay");
    return { outcome, change };
  }
}
