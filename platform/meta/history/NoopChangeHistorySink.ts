import type { ChangeRecord } from "./ChangeRecord";
import type { ChangeHistorySink } from "./ChangeHistorySink";

/** History disabled. The recorder still calls it at every create and update. */
export class NoopChangeHistorySink implements ChangeHistorySink {
  async append(_record: ChangeRecord): Promise<void> {}
}
