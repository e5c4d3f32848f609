import type { MetaValue, MetaValueType } from "../codec";
import type { MetaLogger } from "../logging";

export type MetaOverlayOptions = Readonly<{
  /** Load the cache when the host record is fetched. Default true. */
  autoLoad?: boolean;
  /** Write through to the companion store once the host record is durable. Default false. */
  eagerWrite?: boolean;
  /** Names always dropped from merged attribute views. */
  exceptAttributes?: readonly string[];
  /** Meta names bulk assignment refuses to set. */
  unsafeAttributes?: readonly string[];
  logger?: MetaLogger;
}>;

export type OverlayState = "unloaded" | "loaded";

export type MetaWriteOptions = Readonly<{
  type?: MetaValueType;
}>;

/** A queued write. `null` deletes the key on flush. */
export type PendingMetaWrite = Readonly<{
  value: MetaValue | null;
  type?: MetaValueType;
}>;

export type DispatchAction = "created" | "updated" | "unchanged" | "deleted" | "skipped";

export type DispatchOutcome = Readonly<{
  key: string;
  action: DispatchAction;
  metaEntryId?: string;
}>;

export type FlushResult = Readonly<{
  dispatched: readonly DispatchOutcome[];
}>;

export type BulkAssignOptions = Readonly<{
  safeOnly?: boolean;
}>;
