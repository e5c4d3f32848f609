import { getTableColumns, getTableName } from "drizzle-orm";
import type { PgTable } from "drizzle-orm/pg-core";
import { MetaInvariantViolation } from "../errors";
import type { OwnerId } from "../store";
import type { HostRecord } from "./HostRecord";

export type TableHostRecordOptions = Readonly<{
  /** Property key of the primary key column. Defaults to `id`. */
  primaryKey?: string;
  safeColumns?: readonly string[];
}>;

function isOwnerId(value: unknown): value is OwnerId {
  return (typeof value === "number" && Number.isFinite(value)) || (typeof value === "string" && value !== "");
}

/**
 * HostRecord over a drizzle table definition and one row of values.
 *
 * Attribute names are the table's property keys (as in `$inferSelect`), and
 * the record counts as durable once its primary key holds a value.
 */
export class TableHostRecord<TTable extends PgTable> implements HostRecord {
  private readonly values: Record<string, unknown>;
  private readonly columns: readonly string[];
  private readonly primaryKey: string;
  private readonly safeColumns?: readonly string[];

  constructor(
    private readonly table: TTable,
    values: Partial<Record<string, unknown>> = {},
    options: TableHostRecordOptions = {},
  ) {
    this.columns = Object.keys(getTableColumns(table));
    this.primaryKey = options.primaryKey ?? "id";
    this.safeColumns = options.safeColumns;
    this.values = {};
    for (const column of this.columns) {
      if (column in values) this.values[column] = values[column];
    }
  }

  primaryKeyValue(): OwnerId | null {
    const value = this.values[this.primaryKey];
    return isOwnerId(value) ? value : null;
  }

  ownerTableBaseName(): string {
    return getTableName(this.table);
  }

  isRecognizedColumn(name: string): boolean {
    return this.columns.includes(name);
  }

  isDurable(): boolean {
    return this.primaryKeyValue() !== null;
  }

  columnNames(): readonly string[] {
    return this.columns;
  }

  getColumn(name: string): unknown {
    return this.values[name] ?? null;
  }

  setColumn(name: string, value: unknown): void {
    if (!this.isRecognizedColumn(name)) {
      throw new MetaInvariantViolation(`${this.ownerTableBaseName()} has no column "${name}".`);
    }
    this.values[name] = value;
  }

  safeColumnNames(): readonly string[] {
    return this.safeColumns ?? this.columns;
  }

  /** Records the identity assigned by the adopter's insert. */
  markPersisted(id: OwnerId): void {
    this.values[this.primaryKey] = id;
  }

  toRow(): Record<string, unknown> {
    return { ...this.values };
  }
}
