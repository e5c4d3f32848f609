import { sql, type Name, type SQL } from "drizzle-orm";
import { z } from "zod";
import type { EncodedMetaValue } from "../codec";
import { toStoreFailure } from "../errors";
import { silentLogger, type MetaLogger } from "../logging";
import type { CompanionStore } from "./CompanionStore";
import { resolveCompanionNames, type MetaEntry, type OwnerId } from "./types";

/** The slice of a drizzle database this store needs. `NodePgDatabase` satisfies it. */
export interface SqlExecutor {
  execute(query: SQL): PromiseLike<{ rows: Record<string, unknown>[] }>;
}

export type PgCompanionStoreOptions = Readonly<{
  schema?: string;
  logger?: MetaLogger;
}>;

const metaRowSchema = z.object({
  id: z.union([z.string(), z.number()]),
  owner_id: z.union([z.string(), z.number()]),
  meta_key: z.string(),
  meta_value: z.string().nullable(),
  meta_type: z.string().nullable(),
});

function toEntry(row: Record<string, unknown>): MetaEntry {
  const r = metaRowSchema.parse(row);
  return {
    id: String(r.id),
    ownerId: r.owner_id,
    key: r.meta_key,
    value: r.meta_value,
    valueType: r.meta_type,
  };
}

type CompanionRef = {
  name: string;
  table: SQL;
  owner: Name;
  uniqueConstraint: Name;
  keyIndex: Name;
};

/**
 * CompanionStore backed by Postgres through drizzle.
 *
 * Companion tables are named per owner table at run time, so every statement
 * is built with the `sql` template and `sql.identifier`; values are always bound.
 */
export class PgCompanionStore implements CompanionStore {
  private readonly knownTables = new Set<string>();
  private readonly schema: string;
  private readonly logger: MetaLogger;

  constructor(
    private readonly db: SqlExecutor,
    options: PgCompanionStoreOptions = {},
  ) {
    this.schema = options.schema ?? "public";
    this.logger = options.logger ?? silentLogger;
  }

  private ref(ownerTable: string): CompanionRef {
    const names = resolveCompanionNames(ownerTable);
    return {
      name: names.table,
      table: sql`${sql.identifier(this.schema)}.${sql.identifier(names.table)}`,
      owner: sql.identifier(names.ownerColumn),
      uniqueConstraint: sql.identifier(names.uniqueConstraint),
      keyIndex: sql.identifier(names.keyIndex),
    };
  }

  private async run(operation: string, query: SQL): Promise<Record<string, unknown>[]> {
    try {
      const result = await this.db.execute(query);
      return result.rows;
    } catch (err) {
      throw toStoreFailure(operation, err);
    }
  }

  private async entries(operation: string, query: SQL): Promise<MetaEntry[]> {
    const rows = await this.run(operation, query);
    try {
      return rows.map(toEntry);
    } catch (err) {
      throw toStoreFailure(operation, err);
    }
  }

  async tableExists(ownerTable: string): Promise<boolean> {
    const { name } = this.ref(ownerTable);
    if (this.knownTables.has(name)) return true;

    const rows = await this.run(
      "tableExists",
      sql`select 1 from information_schema.tables where table_schema = ${this.schema} and table_name = ${name} limit 1`,
    );
    if (rows.length > 0) {
      this.knownTables.add(name);
      return true;
    }
    return false;
  }

  async ensureTable(ownerTable: string): Promise<void> {
    const { name, table, owner, uniqueConstraint, keyIndex } = this.ref(ownerTable);
    if (this.knownTables.has(name)) return;

    await this.run(
      "ensureTable",
      sql`create table if not exists ${table} (id bigserial primary key, ${owner} bigint not null default 0, meta_key varchar(255), meta_value text, meta_type varchar(32), constraint ${uniqueConstraint} unique (${owner}, meta_key))`,
    );
    await this.run(
      "ensureTable",
      sql`create index if not exists ${keyIndex} on ${table} (meta_key)`,
    );

    this.knownTables.add(name);
    this.logger(`ensured companion table ${this.schema}.${name}`, "meta-store");
  }

  async find(ownerTable: string, ownerId: OwnerId, key: string): Promise<MetaEntry | null> {
    const { table, owner } = this.ref(ownerTable);
    const [entry] = await this.entries(
      "find",
      sql`select id, ${owner} as owner_id, meta_key, meta_value, meta_type from ${table} where ${owner} = ${ownerId} and meta_key = ${key} limit 1`,
    );
    return entry ?? null;
  }

  async loadAll(ownerTable: string, ownerId: OwnerId): Promise<MetaEntry[]> {
    const { table, owner } = this.ref(ownerTable);
    return this.entries(
      "loadAll",
      sql`select id, ${owner} as owner_id, meta_key, meta_value, meta_type from ${table} where ${owner} = ${ownerId}`,
    );
  }

  async upsert(ownerTable: string, ownerId: OwnerId, key: string, value: EncodedMetaValue): Promise<MetaEntry> {
    const { table, owner } = this.ref(ownerTable);
    const [entry] = await this.entries(
      "upsert",
      sql`insert into ${table} (${owner}, meta_key, meta_value, meta_type) values (${ownerId}, ${key}, ${value.text}, ${value.type}) on conflict (${owner}, meta_key) do update set meta_value = excluded.meta_value, meta_type = excluded.meta_type returning id, ${owner} as owner_id, meta_key, meta_value, meta_type`,
    );
    if (!entry) {
      throw toStoreFailure("upsert", new Error(`no row returned for ${key}`));
    }
    return entry;
  }

  async delete(ownerTable: string, ownerId: OwnerId, key: string): Promise<boolean> {
    const { table, owner } = this.ref(ownerTable);
    const rows = await this.run(
      "delete",
      sql`delete from ${table} where ${owner} = ${ownerId} and meta_key = ${key} returning id`,
    );
    return rows.length > 0;
  }
}
