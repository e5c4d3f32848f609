import type { ChangeRecord, ChangeRecordInput } from "./ChangeRecord";
import type { ChangeHistorySink } from "./ChangeHistorySink";

export type ChangeHistoryRecorderOptions = Readonly<{
  clock?: () => Date;
  actor?: () => string | null;
}>;

/**
 * Stamps meta transitions with time and actor and appends them to a sink.
 *
 * The overlay calls `record` on every confirmed create and every update that
 * changes the stored value; whether anything is kept is up to the sink.
 */
export class ChangeHistoryRecorder {
  private readonly clock: () => Date;
  private readonly actor: () => string | null;

  constructor(
    private readonly sink: ChangeHistorySink,
    options: ChangeHistoryRecorderOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.actor = options.actor ?? (() => null);
  }

  stamp(input: ChangeRecordInput): ChangeRecord {
    return {
      ...input,
      timestamp: this.clock(),
      actor: this.actor(),
    };
  }

  /** Appends an already stamped record, keeping its original time and actor. */
  async append(record: ChangeRecord): Promise<void> {
    await this.sink.append(record);
  }

  async record(input: ChangeRecordInput): Promise<ChangeRecord> {
    const record = this.stamp(input);
    await this.append(record);
    return record;
  }
}
