// sql/buildTableSQL.ts

import { buildColumnSQL } from "./buildColumnSQL.js";
import type { Dialect } from "./dialects.js";
import type { ForeignKeyConstraint } from "../model/constraints.js";
import type { TableConstraint, TableShape } from "../model/table.js";
import { escapeLiteral } from "../utils/text.js";

function columnList(columns: readonly string[], dialect: Dialect): string {
  return columns.map((c) => dialect.quote(c)).join(", ");
}

function named(name: string | undefined, dialect: Dialect): string {
  return name ? `CONSTRAINT ${dialect.quote(name)} ` : "";
}

function foreignKeySQL(fk: ForeignKeyConstraint, dialect: Dialect): string {
  const target = fk.targets[0]?.table ?? "";
  let sql =
    `${named(fk.name, dialect)}FOREIGN KEY (${columnList(fk.columns, dialect)}) ` +
    `REFERENCES ${dialect.quote(target)} (${columnList(
      fk.targets.map((t) => t.column),
      dialect
    )})`;
  if (fk.onDelete) sql += ` ON DELETE ${fk.onDelete}`;
  if (fk.onUpdate) sql += ` ON UPDATE ${fk.onUpdate}`;
  return sql;
}

function constraintSQL(c: TableConstraint, dialect: Dialect): string {
  switch (c.kind) {
    case "check":
      return `${named(c.name, dialect)}CHECK (${c.sql})`;
    case "enumCheck":
      return `${named(c.name, dialect)}CHECK (${dialect.quote(c.column)} IN (${c.codes.join(",")}))`;
    case "unique":
      return `${named(c.name, dialect)}UNIQUE (${columnList(c.columns, dialect)})`;
    case "foreignKey":
      return foreignKeySQL(c, dialect);
  }
}

/**
 * CREATE TABLE followed by the table's index statements (and, where the
 * dialect has no inline column comments, its COMMENT ON statements).
 */
export function buildTableSQL(table: TableShape, dialect: Dialect): string[] {
  const body: string[] = table.columns.map((col) => buildColumnSQL(col, dialect));

  if (table.primaryKey.length > 0) {
    body.push(`PRIMARY KEY (${columnList(table.primaryKey, dialect)})`);
  }
  for (const c of table.constraints) body.push(constraintSQL(c, dialect));

  const create =
    `CREATE TABLE ${dialect.quote(table.name)} (\n` +
    body.map((line) => `  ${line}`).join(",\n") +
    `\n)${dialect.tableSuffix(table.options)}`;

  const statements = [create];

  for (const ix of table.indexes) {
    statements.push(
      `CREATE ${ix.unique ? "UNIQUE " : ""}INDEX ${dialect.quote(ix.name)} ` +
        `ON ${dialect.quote(table.name)} (${columnList(ix.columns, dialect)})`
    );
  }

  if (!dialect.inlineComments) {
    for (const col of table.columns) {
      if (!col.comment) continue;
      statements.push(
        `COMMENT ON COLUMN ${dialect.quote(table.name)}.${dialect.quote(col.name)} ` +
          `IS '${escapeLiteral(col.comment)}'`
      );
    }
  }

  return statements;
}
