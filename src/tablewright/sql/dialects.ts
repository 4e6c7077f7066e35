// sql/dialects.ts

import { buildMysqlProcedure, buildPostgresProcedure, delimitMysql } from "./buildProcedureSQL.js";
import type { ColumnType, ScalarType } from "../model/columnTypes.js";
import { ConfigurationError } from "../model/errors.js";
import type { StoredProcedure } from "../model/storedProcedure.js";
import type { TableOptions } from "../model/table.js";

export type DialectName = "mysql" | "postgresql";

export const DIALECT_NAMES: readonly DialectName[] = ["mysql", "postgresql"];

export interface Dialect {
  readonly name: DialectName;
  quote(identifier: string): string;
  columnType(type: ColumnType): string;
  /** Appended after NOT NULL / DEFAULT */
  readonly autoIncrement: string;
  /** Column comments inside the column definition, or as COMMENT ON statements */
  readonly inlineComments: boolean;
  tableSuffix(options: TableOptions): string;
  /** Execution form, run after the tables exist */
  procedure(proc: StoredProcedure): string[];
  /** Script form of one execution statement, its terminator included */
  delimit(statement: string): string;
}

function sized(base: string, t: ScalarType): string {
  return t.length === undefined ? base : `${base}(${t.length})`;
}

function numeric(t: ScalarType): string {
  return t.precision === undefined ? "NUMERIC" : `NUMERIC(${t.precision}, ${t.scale ?? 0})`;
}

/* ---------- MYSQL ---------- */

function mysqlType(type: ColumnType): string {
  switch (type.kind) {
    case "enum":
      return "INTEGER";
    case "boolean":
      return "BOOL";
    case "binary":
      return `BINARY(${type.length})`;
    case "scalar":
      switch (type.name) {
        case "NUMERIC":
          return numeric(type);
        case "VARCHAR":
        case "VARBINARY":
          return sized(type.name, type);
        case "DATETIME":
          return type.fractionalSeconds === undefined
            ? "DATETIME"
            : `DATETIME(${type.fractionalSeconds})`;
        case "LARGE_BINARY":
          return "BLOB";
        default:
          return type.name;
      }
  }
}

const mysql: Dialect = {
  name: "mysql",
  quote: (id) => `\`${id.replace(/`/g, "``")}\``,
  columnType: mysqlType,
  autoIncrement: "AUTO_INCREMENT",
  inlineComments: true,
  tableSuffix: (o) =>
    ` ENGINE=${o.engine} DEFAULT CHARSET=${o.charset} COLLATE=${o.collate} ROW_FORMAT=${o.rowFormat}`,
  procedure: buildMysqlProcedure,
  delimit: delimitMysql,
};

/* ---------- POSTGRESQL ---------- */

function postgresType(type: ColumnType): string {
  switch (type.kind) {
    case "enum":
      return "INTEGER";
    case "boolean":
      return "BOOLEAN";
    case "binary":
      return "BYTEA";
    case "scalar":
      switch (type.name) {
        case "NUMERIC":
          return numeric(type);
        case "VARCHAR":
          return sized("VARCHAR", type);
        case "DATETIME":
          return type.fractionalSeconds === undefined
            ? "TIMESTAMP WITHOUT TIME ZONE"
            : `TIMESTAMP(${type.fractionalSeconds}) WITHOUT TIME ZONE`;
        case "LARGE_BINARY":
        case "VARBINARY":
          return "BYTEA";
        default:
          return type.name;
      }
  }
}

const postgresql: Dialect = {
  name: "postgresql",
  quote: (id) => `"${id.replace(/"/g, '""')}"`,
  columnType: postgresType,
  autoIncrement: "GENERATED ALWAYS AS IDENTITY",
  inlineComments: false,
  tableSuffix: () => "",
  procedure: buildPostgresProcedure,
  delimit: (statement) => `${statement};`,
};

const DIALECTS: Record<DialectName, Dialect> = { mysql, postgresql };

export function isDialectName(name: string): name is DialectName {
  return DIALECT_NAMES.some((d) => d === name);
}

export function getDialect(name: string): Dialect {
  const key = name.trim().toLowerCase();
  if (!isDialectName(key)) {
    throw new ConfigurationError(
      `Unknown SQL dialect "${name}", expected one of ${DIALECT_NAMES.join(", ")}`
    );
  }
  return DIALECTS[key];
}
