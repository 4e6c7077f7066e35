// model/columnTypes.ts

import type { Enumeration } from "./enumeration.js";

/** Pass-through SQL types (rendered per dialect, no special mapping) */
export type ScalarTypeName =
  | "INTEGER"
  | "BIGINT"
  | "SMALLINT"
  | "NUMERIC"
  | "VARCHAR"
  | "TEXT"
  | "DATE"
  | "DATETIME"
  | "TIME"
  | "JSON"
  | "LARGE_BINARY"
  | "VARBINARY";

export interface ScalarType {
  readonly kind: "scalar";
  readonly name: ScalarTypeName;
  readonly length?: number;
  readonly precision?: number;
  readonly scale?: number;
  /** Fractional seconds precision of DATETIME */
  readonly fractionalSeconds?: number;
}

export interface BooleanType {
  readonly kind: "boolean";
}

/** Fixed-width BINARY(n) */
export interface BinaryType {
  readonly kind: "binary";
  readonly length: number;
}

/** Integer column restricted to the codes of an enumeration */
export interface EnumType {
  readonly kind: "enum";
  readonly enumeration: Enumeration;
}

export type ColumnType = ScalarType | BooleanType | BinaryType | EnumType;

function scalar(name: ScalarTypeName, extra: Omit<ScalarType, "kind" | "name"> = {}): ScalarType {
  return Object.freeze({ kind: "scalar", name, ...extra });
}

function positive(value: number, what: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${what} must be a positive integer, got ${value}`);
  }
  return value;
}

/* ---------- MODEL VOCABULARY ---------- */

export const Integer = scalar("INTEGER");
export const BigInteger = scalar("BIGINT");
export const SmallInteger = scalar("SMALLINT");
export const Text = scalar("TEXT");
export const DateTime = scalar("DATETIME");
export const SqlDate = scalar("DATE");
export const Time = scalar("TIME");
export const Json = scalar("JSON");
export const LargeBinary = scalar("LARGE_BINARY");
export const Bool: BooleanType = Object.freeze({ kind: "boolean" });

export function Varchar(length: number): ScalarType {
  return scalar("VARCHAR", { length: positive(length, "VARCHAR length") });
}

export function Numeric(precision: number, scale = 0): ScalarType {
  return scalar("NUMERIC", { precision: positive(precision, "NUMERIC precision"), scale });
}

export function VarBinary(length: number): ScalarType {
  return scalar("VARBINARY", { length: positive(length, "VARBINARY length") });
}

export function Binary(length: number): BinaryType {
  return Object.freeze({ kind: "binary", length: positive(length, "BINARY length") });
}

const KINDS = new Set(["scalar", "boolean", "binary", "enum"]);

export function isColumnType(value: unknown): value is ColumnType {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    typeof value.kind === "string" &&
    KINDS.has(value.kind)
  );
}
