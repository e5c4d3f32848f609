export type { HostRecord } from "./HostRecord";
export { MetaOverlay } from "./MetaOverlay";
export { TableHostRecord, type TableHostRecordOptions } from "./TableHostRecord";
export type {
  BulkAssignOptions,
  DispatchAction,
  DispatchOutcome,
  FlushResult,
  MetaOverlayOptions,
  MetaWriteOptions,
  OverlayState,
  PendingMetaWrite,
} from "./types";
