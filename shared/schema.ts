import { pgTable, text, varchar, timestamp, pgEnum, bigserial, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const metaChangeEventEnum = pgEnum("meta_change_event", [
  "created",
  "updated",
]);

// Append-only journal of meta attribute transitions. Rows are never updated or deleted.
export const metaJournal = pgTable(
  "meta_journal",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    tableName: varchar("table_name", { length: 63 }).notNull(),
    rowId: text("row_id").notNull(),
    metaId: text("meta_id").notNull(),
    event: metaChangeEventEnum("event").notNull(),
    fieldName: varchar("field_name", { length: 255 }).notNull(),
    oldValue: text("old_value"),
    newValue: text("new_value"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    createdBy: text("created_by"),
  },
  (table) => ({
    rowIdx: index("meta_journal_row_idx").on(table.tableName, table.rowId),
  }),
);

export const insertMetaJournalSchema = createInsertSchema(metaJournal).omit({
  id: true,
});

export type InsertMetaJournalEntry = z.infer<typeof insertMetaJournalSchema>;
export type MetaJournalEntry = typeof metaJournal.$inferSelect;
