// sql/buildDefaultSQL.ts

import { type SqlExpression, isSqlExpression, literal, text } from "../model/expressions.js";
import { ConfigurationError } from "../model/errors.js";
import { escapeLiteral } from "../utils/text.js";

export type JsonDefault = { readonly [key: string]: unknown } | readonly unknown[];

export type DefaultValue = boolean | number | string | SqlExpression | JsonDefault | null;

/**
 * Turn a column's `default` option into the server-side expression emitted in
 * DDL. Booleans and numbers become unquoted literals, strings and JSON values
 * quoted literals; expressions pass through unchanged.
 */
export function buildDefaultSQL(def: DefaultValue | undefined): SqlExpression | undefined {
  if (def === undefined || def === null) return undefined;

  /* ---------- EXPRESSIONS ---------- */
  if (isSqlExpression(def)) return def;

  /* ---------- SCALARS ---------- */
  if (typeof def === "boolean") return literal(def);

  if (typeof def === "number") {
    if (!Number.isFinite(def)) {
      throw new ConfigurationError(`Default ${def} is not a finite number`);
    }
    return literal(def);
  }

  if (typeof def === "string") {
    return text(`'${escapeLiteral(def)}'`);
  }

  /* ---------- JSON / OBJECT ---------- */
  if (typeof def === "object") {
    return text(`'${escapeLiteral(JSON.stringify(def))}'`);
  }

  throw new ConfigurationError(`Unsupported default value ${String(def)}`);
}
