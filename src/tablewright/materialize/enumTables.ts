// materialize/enumTables.ts

import type { SqlClient } from "./sqlClient.js";
import type { EnumEntry, Enumeration } from "../model/enumeration.js";
import { ConfigurationError, MaterializationError } from "../model/errors.js";
import { getDialect } from "../sql/dialects.js";
import { logger } from "../utils/logger.js";
import { enumTableName } from "../utils/naming.js";

const q = getDialect("postgresql").quote;

/** Width of the lookup table's `name` column */
export const ENUM_NAME_LENGTH = 50;

export interface EnumTable {
  readonly enumeration: Enumeration;
  readonly table: string;
  readonly rows: readonly EnumEntry[];
}

export function enumTableFor(enumeration: Enumeration): EnumTable {
  const rows = enumeration.entries();
  for (const row of rows) {
    if (row.name.length > ENUM_NAME_LENGTH) {
      throw new ConfigurationError(
        `Value ${row.name} of enum ${enumeration.name} is longer than ${ENUM_NAME_LENGTH} characters`
      );
    }
  }
  return { enumeration, table: enumTableName(enumeration.name), rows };
}

/** Drop-and-recreate statements of one lookup table */
export function enumTableStatements(table: string): string[] {
  return [
    `DROP TABLE IF EXISTS ${q(table)} CASCADE`,
    `CREATE TABLE ${q(table)} (\n` +
      `  ${q("value")} INTEGER NOT NULL UNIQUE,\n` +
      `  ${q("name")} VARCHAR(${ENUM_NAME_LENGTH}) NOT NULL UNIQUE\n` +
      `)`,
  ];
}

/** One parameterized INSERT for all rows */
export function enumInsert(table: EnumTable): { text: string; values: unknown[] } {
  const values: unknown[] = [];
  const tuples = table.rows.map((row) => {
    values.push(row.code, row.name);
    return `($${values.length - 1}, $${values.length})`;
  });
  return {
    text: `INSERT INTO ${q(table.table)} (${q("value")}, ${q("name")}) VALUES ${tuples.join(", ")}`,
    values,
  };
}

async function run(client: SqlClient, subject: string, text: string, values?: unknown[]) {
  try {
    return await client.query(text, values);
  } catch (err) {
    throw new MaterializationError(subject, err);
  }
}

/**
 * Lookup tables for `enums`. Each one is dropped, created and filled before
 * the next enum is touched.
 */
export async function createEnumTables(
  client: SqlClient,
  enums: Iterable<Enumeration>,
  options: { verbose?: boolean } = {}
): Promise<EnumTable[]> {
  const tables = [...enums].map(enumTableFor);
  const owners = new Map<string, string>();
  for (const t of tables) {
    const other = owners.get(t.table);
    if (other !== undefined) {
      throw new ConfigurationError(
        `Enums ${other} and ${t.enumeration.name} would share the lookup table ${t.table}`
      );
    }
    owners.set(t.table, t.enumeration.name);
  }

  logger.action("Generating and populating tables for enums");
  for (const t of tables) {
    const subject = `enum ${t.enumeration.name}`;
    for (const statement of enumTableStatements(t.table)) {
      await run(client, subject, statement);
    }
    const insert = enumInsert(t);
    await run(client, subject, insert.text, insert.values);

    logger.item(`Enum: ${t.enumeration.name} --> Table: ${t.table} (${t.rows.length} values)`);
    if (options.verbose) {
      for (const row of t.rows) logger.item(`    - ${String(row.code).padStart(2)}: ${row.name}`);
    }
  }
  logger.done();

  return tables;
}

/** Rows of an enum's lookup table, by code */
export async function readEnumTable(client: SqlClient, enumeration: Enumeration): Promise<EnumEntry[]> {
  const table = enumTableName(enumeration.name);
  const result = await run(
    client,
    `enum ${enumeration.name}`,
    `SELECT ${q("value")}, ${q("name")} FROM ${q(table)} ORDER BY ${q("value")}`
  );
  return result.rows.map((row) => ({ code: Number(row.value), name: String(row.name) }));
}
