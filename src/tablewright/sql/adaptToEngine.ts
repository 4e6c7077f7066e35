// sql/adaptToEngine.ts

import type { Dialect, DialectName } from "./dialects.js";
import type { ColumnShape } from "../model/column.js";
import { text } from "../model/expressions.js";
import type { SchemaSnapshot } from "../model/metadata.js";
import type { TableShape } from "../model/table.js";

/** Returns the column unchanged or a replacement, never mutates */
export type ColumnRewrite = (column: ColumnShape, table: TableShape) => ColumnShape;

export interface AdaptedSchema extends SchemaSnapshot {
  readonly dialect: DialectName;
  /** Statements to run once all tables exist */
  readonly afterCreate: readonly string[];
}

export interface AdaptOptions {
  /** Script output: hooks are wrapped in the dialect's delimiters */
  forText: boolean;
}

export const TIMESTAMP_PRECISION = 3;

/**
 * Plain DATETIME columns get millisecond precision; a CURRENT_TIMESTAMP
 * default has to carry the same precision.
 */
export const highPrecisionTimestamps: ColumnRewrite = (column) => {
  const t = column.type;
  if (t.kind !== "scalar" || t.name !== "DATETIME" || t.fractionalSeconds !== undefined) {
    return column;
  }
  const defaultExpr =
    column.defaultExpr?.sql.toUpperCase() === "CURRENT_TIMESTAMP"
      ? text(`CURRENT_TIMESTAMP(${TIMESTAMP_PRECISION})`)
      : column.defaultExpr;
  return { ...column, type: { ...t, fractionalSeconds: TIMESTAMP_PRECISION }, defaultExpr };
};

const REWRITES: Record<DialectName, readonly ColumnRewrite[]> = {
  mysql: [highPrecisionTimestamps],
  postgresql: [highPrecisionTimestamps],
};

/** New schema whose columns went through `rewrites` in order */
export function rewriteColumns(
  schema: SchemaSnapshot,
  rewrites: readonly ColumnRewrite[]
): SchemaSnapshot {
  const tables = schema.tables.map((table): TableShape => {
    let changed = false;
    const columns = table.columns.map((original) => {
      const next = rewrites.reduce((col, rewrite) => rewrite(col, table), original);
      if (next !== original) changed = true;
      return next;
    });
    if (!changed) return table;
    return {
      name: table.name,
      columns,
      primaryKey: table.primaryKey,
      constraints: table.constraints,
      indexes: table.indexes,
      options: table.options,
    };
  });
  return { ...schema, tables };
}

/** Engine-specific variant of `schema`; the input is left as it was */
export function adaptToEngine(
  schema: SchemaSnapshot,
  dialect: Dialect,
  options: AdaptOptions
): AdaptedSchema {
  const adapted = rewriteColumns(schema, REWRITES[dialect.name]);

  const afterCreate = schema.procedures.flatMap((proc) => {
    const statements = dialect.procedure(proc);
    return options.forText ? statements.map((s) => dialect.delimit(s)) : statements;
  });

  return Object.freeze({ ...adapted, dialect: dialect.name, afterCreate: Object.freeze(afterCreate) });
}
