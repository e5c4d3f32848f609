export type ChangeEventKind = "created" | "updated";

/** Immutable journal entry for one meta attribute transition. */
export type ChangeRecord = Readonly<{
  tableName: string;
  rowId: string;
  metaEntryId: string;
  eventKind: ChangeEventKind;
  fieldName: string;
  oldValue: string | null;
  newValue: string;
  timestamp: Date;
  actor: string | null;
}>;

export type ChangeRecordInput = Omit<ChangeRecord, "timestamp" | "actor">;
