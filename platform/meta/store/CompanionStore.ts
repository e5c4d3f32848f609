import type { EncodedMetaValue } from "../codec";
import type { MetaEntry, OwnerId } from "./types";

/**
 * CompanionStore is a storage-only abstraction over `<owner>_meta` tables.
 *
 * Rules:
 * - Owner table is explicit on every operation
 * - At most one entry per (ownerId, key); enforced by the table itself
 * - Exact key lookup only, no query language
 * - Every failure surfaces as StoreFailure
 */
export interface CompanionStore {
  tableExists(ownerTable: string): Promise<boolean>;

  /** Creates the companion table and its (ownerId, key) constraint. No-op when present. */
  ensureTable(ownerTable: string): Promise<void>;

  find(ownerTable: string, ownerId: OwnerId, key: string): Promise<MetaEntry | null>;

  loadAll(ownerTable: string, ownerId: OwnerId): Promise<MetaEntry[]>;

  /** Inserts or replaces value and type in place. Returns the row as stored. */
  upsert(ownerTable: string, ownerId: OwnerId, key: string, value: EncodedMetaValue): Promise<MetaEntry>;

  /** Returns whether a row was removed. Absent rows are not an error. */
  delete(ownerTable: string, ownerId: OwnerId, key: string): Promise<boolean>;
}
