export type { ChangeEventKind, ChangeRecord, ChangeRecordInput } from "./ChangeRecord";
export type { ChangeHistorySink } from "./ChangeHistorySink";
export { ChangeHistoryRecorder, type ChangeHistoryRecorderOptions } from "./ChangeHistoryRecorder";
export { InMemoryChangeHistorySink } from "./InMemoryChangeHistorySink";
export { JournalChangeHistorySink, type JournalDatabase } from "./JournalChangeHistorySink";
export { NoopChangeHistorySink } from "./NoopChangeHistorySink";
