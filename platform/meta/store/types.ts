import { MetaInvariantViolation } from "../errors";

/** Durable identity of the host record that owns a set of meta entries. */
export type OwnerId = number | string;

/** One row of a companion table. `value` and `valueType` are stored as written. */
export type MetaEntry = Readonly<{
  id: string;
  ownerId: OwnerId;
  key: string;
  value: string | null;
  valueType: string | null;
}>;

export const META_TABLE_SUFFIX = "_meta";

const OWNER_TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const MAX_IDENTIFIER_LENGTH = 63;

export function companionTableName(ownerTable: string): string {
  return `${ownerTable}${META_TABLE_SUFFIX}`;
}

export function ownerColumnName(ownerTable: string): string {
  return `${ownerTable}_id`;
}

export type CompanionNames = Readonly<{
  table: string;
  ownerColumn: string;
  uniqueConstraint: string;
  keyIndex: string;
}>;

/**
 * Validates an owner table base name and returns the derived companion names.
 * Every derived identifier must fit Postgres' limit; longer ones would be truncated.
 */
export function resolveCompanionNames(ownerTable: string): CompanionNames {
  if (!OWNER_TABLE_NAME.test(ownerTable)) {
    throw new MetaInvariantViolation(`Owner table name "${ownerTable}" is not a plain SQL identifier.`);
  }
  const table = companionTableName(ownerTable);
  const names: CompanionNames = {
    table,
    ownerColumn: ownerColumnName(ownerTable),
    uniqueConstraint: `${table}_owner_key_unique`,
    keyIndex: `${table}_meta_key_idx`,
  };
  const tooLong = [names.uniqueConstraint, names.keyIndex].find((name) => name.length > MAX_IDENTIFIER_LENGTH);
  if (tooLong) {
    throw new MetaInvariantViolation(
      `Companion table name "${table}" is too long: "${tooLong}" exceeds ${MAX_IDENTIFIER_LENGTH} characters.`,
    );
  }
  return names;
}
