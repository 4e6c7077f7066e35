// sql/compileDDL.ts

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { adaptToEngine } from "./adaptToEngine.js";
import { buildTableSQL } from "./buildTableSQL.js";
import { type Dialect, getDialect } from "./dialects.js";
import { type SchemaSource, toSnapshot } from "../model/metadata.js";
import { multilineRstrip } from "../utils/text.js";

export const STATEMENT_SEPARATOR = ";\n\n";

export interface CompileOptions {
  /** `omit` leaves procedures to the execution hooks, `delimited` appends their script form */
  procedures?: "omit" | "delimited";
}

function resolveDialect(dialect: Dialect | string): Dialect {
  return typeof dialect === "string" ? getDialect(dialect) : dialect;
}

/** DDL script, tables in dependency order, identical for identical models */
export function compileDDL(
  schema: SchemaSource,
  dialect: Dialect | string,
  options: CompileOptions = {}
): string {
  const d = resolveDialect(dialect);
  const adapted = adaptToEngine(toSnapshot(schema), d, { forText: true });

  const tables = adapted.tables
    .flatMap((t) => buildTableSQL(t, d))
    .map((s) => s.trim())
    .join(STATEMENT_SEPARATOR);
  if (options.procedures !== "delimited" || adapted.afterCreate.length === 0) {
    return multilineRstrip(tables);
  }

  // delimited hooks carry their own terminators
  const hooks = adapted.afterCreate.map((s) => s.trim()).join("\n\n");
  return multilineRstrip(tables ? `${tables}${STATEMENT_SEPARATOR}${hooks}` : hooks);
}

/** Statements to run one by one against a live database, procedures last */
export function createStatements(schema: SchemaSource, dialect: Dialect | string): string[] {
  const d = resolveDialect(dialect);
  const adapted = adaptToEngine(toSnapshot(schema), d, { forText: false });
  return [...adapted.tables.flatMap((t) => buildTableSQL(t, d)), ...adapted.afterCreate];
}

export function ddlFileName(schemaName: string, dialect: Dialect | string): string {
  return `full_ddl.${schemaName.toLowerCase()}.${resolveDialect(dialect).name}.sql`;
}

/** Write `full_ddl.<schema>.<dialect>.sql` into `dir`, returns its path */
export async function writeDDLFile(
  schema: SchemaSource,
  dialect: Dialect | string,
  dir: string
): Promise<string> {
  const snapshot = toSnapshot(schema);
  await mkdir(dir, { recursive: true });
  const file = path.join(dir, ddlFileName(snapshot.schemaName, dialect));
  await writeFile(file, compileDDL(snapshot, dialect), "utf8");
  return file;
}
