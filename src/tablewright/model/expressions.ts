// model/expressions.ts

/** Raw SQL that is emitted unquoted */
export interface SqlExpression {
  readonly kind: "expression";
  readonly sql: string;
}

export function text(sql: string): SqlExpression {
  return Object.freeze({ kind: "expression", sql: String(sql) });
}

/** Boolean or numeric literal, never quoted in DDL */
export function literal(value: boolean | number): SqlExpression {
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new RangeError(`literal() needs a finite number, got ${value}`);
  }
  return text(String(value));
}

export function isSqlExpression(value: unknown): value is SqlExpression {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "expression" &&
    "sql" in value &&
    typeof value.sql === "string"
  );
}

export const CURRENT_TIMESTAMP = text("CURRENT_TIMESTAMP");
export const NULL = text("NULL");

export const CASCADE = "CASCADE";
export const SET_NULL = "SET NULL";
export const RESTRICT = "RESTRICT";
export const NO_ACTION = "NO ACTION";
