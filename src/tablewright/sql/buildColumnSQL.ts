// sql/buildColumnSQL.ts

import type { Dialect } from "./dialects.js";
import type { ColumnShape } from "../model/column.js";
import { escapeLiteral } from "../utils/text.js";

/** One column definition inside CREATE TABLE; keys and checks are table level */
export function buildColumnSQL(col: ColumnShape, dialect: Dialect): string {
  const parts: string[] = [];

  parts.push(dialect.quote(col.name));
  parts.push(dialect.columnType(col.type));

  if (!col.nullable) parts.push("NOT NULL");

  if (col.defaultExpr !== undefined) parts.push(`DEFAULT ${col.defaultExpr.sql}`);

  if (col.autoincrement) parts.push(dialect.autoIncrement);

  if (col.comment && dialect.inlineComments) {
    parts.push(`COMMENT '${escapeLiteral(col.comment)}'`);
  }

  return parts.join(" ");
}
