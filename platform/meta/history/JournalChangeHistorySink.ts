import { insertMetaJournalSchema, metaJournal } from "@shared/schema";
import { toStoreFailure } from "../errors";
import type { ChangeRecord } from "./ChangeRecord";
import type { ChangeHistorySink } from "./ChangeHistorySink";

/** The slice of a drizzle database the journal needs. `NodePgDatabase` satisfies it. */
export interface JournalDatabase {
  insert(table: typeof metaJournal): {
    values(value: typeof metaJournal.$inferInsert): PromiseLike<unknown>;
  };
}

/** Appends change records to the `meta_journal` table. */
export class JournalChangeHistorySink implements ChangeHistorySink {
  constructor(private readonly db: JournalDatabase) {}

  async append(record: ChangeRecord): Promise<void> {
    try {
      const entry = insertMetaJournalSchema.parse({
        tableName: record.tableName,
        rowId: record.rowId,
        metaId: record.metaEntryId,
        event: record.eventKind,
        fieldName: record.fieldName,
        oldValue: record.oldValue,
        newValue: record.newValue,
        createdAt: record.timestamp,
        createdBy: record.actor,
      });
      await this.db.insert(metaJournal).values(entry);
    } catch (err) {
      throw toStoreFailure("journal", err);
    }
  }
}
