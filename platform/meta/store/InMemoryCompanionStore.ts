import type { EncodedMetaValue } from "../codec";
import { StoreFailure } from "../errors";
import type { CompanionStore } from "./CompanionStore";
import { resolveCompanionNames, type MetaEntry, type OwnerId } from "./types";

type CompanionTable = {
  rows: Map<string, MetaEntry>;
  nextId: number;
};

function rowKey(ownerId: OwnerId, key: string): string {
  return `${ownerId}\u0000${key}`;
}

export class InMemoryCompanionStore implements CompanionStore {
  private readonly tables = new Map<string, CompanionTable>();

  private existing(ownerTable: string, operation: string): CompanionTable {
    const { table } = resolveCompanionNames(ownerTable);
    const t = this.tables.get(table);
    if (!t) {
      throw new StoreFailure(operation, new Error(`relation "${table}" does not exist`));
    }
    return t;
  }

  async tableExists(ownerTable: string): Promise<boolean> {
    return this.tables.has(resolveCompanionNames(ownerTable).table);
  }

  async ensureTable(ownerTable: string): Promise<void> {
    const { table } = resolveCompanionNames(ownerTable);
    if (!this.tables.has(table)) {
      this.tables.set(table, { rows: new Map(), nextId: 1 });
    }
  }

  async find(ownerTable: string, ownerId: OwnerId, key: string): Promise<MetaEntry | null> {
    return this.existing(ownerTable, "find").rows.get(rowKey(ownerId, key)) ?? null;
  }

  async loadAll(ownerTable: string, ownerId: OwnerId): Promise<MetaEntry[]> {
    const owner = String(ownerId);
    return Array.from(this.existing(ownerTable, "loadAll").rows.values()).filter(
      (row) => String(row.ownerId) === owner,
    );
  }

  async upsert(ownerTable: string, ownerId: OwnerId, key: string, value: EncodedMetaValue): Promise<MetaEntry> {
    const t = this.existing(ownerTable, "upsert");
    const k = rowKey(ownerId, key);
    const current = t.rows.get(k);

    const row: MetaEntry = {
      id: current?.id ?? String(t.nextId++),
      ownerId,
      key,
      value: value.text,
      valueType: value.type,
    };
    t.rows.set(k, row);
    return row;
  }

  async delete(ownerTable: string, ownerId: OwnerId, key: string): Promise<boolean> {
    return this.existing(ownerTable, "delete").rows.delete(rowKey(ownerId, key));
  }

  /** Every row of a companion table, in insertion order. Empty when the table is missing. */
  rows(ownerTable: string): readonly MetaEntry[] {
    const t = this.tables.get(resolveCompanionNames(ownerTable).table);
    return t ? Array.from(t.rows.values()) : [];
  }

  tableNames(): string[] {
    return Array.from(this.tables.keys());
  }
}
