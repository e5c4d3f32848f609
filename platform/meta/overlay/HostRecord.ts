import type { OwnerId } from "../store";

/**
 * Boundary the overlay needs from the record system that owns the primary row.
 *
 * The adopter is also responsible for calling `MetaOverlay.afterFetch()` once a
 * row is read and `MetaOverlay.afterSave()` once it is persisted.
 */
export interface HostRecord {
  /** Durable identity used as the companion table's owner id. Null before the first save. */
  primaryKeyValue(): OwnerId | null;

  /** Base name for `<base>_meta` and `<base>_id`. */
  ownerTableBaseName(): string;

  isRecognizedColumn(name: string): boolean;

  /** Whether the record has been persisted at least once. */
  isDurable(): boolean;

  columnNames(): readonly string[];

  getColumn(name: string): unknown;

  setColumn(name: string, value: unknown): void;

  /** Columns bulk assignment may touch when `safeOnly` is set. Defaults to every column. */
  safeColumnNames?(): readonly string[];
}
