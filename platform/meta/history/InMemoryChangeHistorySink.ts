import type { ChangeRecord } from "./ChangeRecord";
import type { ChangeHistorySink } from "./ChangeHistorySink";

export class InMemoryChangeHistorySink implements ChangeHistorySink {
  public readonly records: ChangeRecord[] = [];

  async append(record: ChangeRecord): Promise<void> {
    this.records.push(record);
  }
}
