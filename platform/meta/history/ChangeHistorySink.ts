import type { ChangeRecord } from "./ChangeRecord";

/**
 * ChangeHistorySink is an append-only journal interface.
 * Implementations may persist, buffer, or drop records.
 */
export interface ChangeHistorySink {
  append(record: ChangeRecord): Promise<void>;
}
