// model/vocabulary.ts

import { Column, type ColumnOptions, type ColumnTypeInput } from "./column.js";
import * as types from "./columnTypes.js";
import * as constraints from "./constraints.js";
import { Enumeration } from "./enumeration.js";
import { ConfigurationError } from "./errors.js";
import * as expressions from "./expressions.js";
import type { SchemaMetadata } from "./metadata.js";
import {
  INOUT,
  IN,
  OUT,
  ProcComment,
  ProcParam,
  type ProcedurePart,
  ProcSqlBody,
  StoredProcedure,
} from "./storedProcedure.js";
import { type ColumnNames, Table, type TableItem } from "./table.js";

/** Read-only name lookup exposed to model sources */
function lookup<V>(what: string, get: (name: string) => V | undefined): Readonly<Record<string, V>> {
  return new Proxy<Record<string, V>>(
    {},
    {
      get(_target, key) {
        if (typeof key !== "string") return undefined;
        const value = get(key);
        if (value === undefined) throw new ConfigurationError(`Unknown ${what} ${key}`);
        return value;
      },
      set() {
        throw new ConfigurationError(`${what} lookup is read-only`);
      },
    }
  );
}

/**
 * Globals a model source is evaluated with. Every declaration registers on
 * `metadata`, so the vocabulary is bound to exactly one model load.
 */
export function createVocabulary(metadata: SchemaMetadata) {
  return {
    Schema(name: string): void {
      metadata.context.declareSchema(String(name));
    },
    Enum(name: string, ...values: string[]): Enumeration {
      return metadata.addEnum(new Enumeration(name, values));
    },
    Table(name: string, ...items: TableItem[]): Table {
      return metadata.addTable(new Table(name, items));
    },
    Column(name: string, type: ColumnTypeInput, options?: ColumnOptions): Column {
      return new Column(name, type, options);
    },
    StoredProcedure(name: string, ...parts: ProcedurePart[]): StoredProcedure {
      return metadata.addProcedure(new StoredProcedure(name, parts));
    },
    ProcParam(name: string, type: string, direction?: string): ProcParam {
      return new ProcParam(name, type, direction);
    },
    ProcComment(comment: string): ProcComment {
      return new ProcComment(String(comment));
    },
    ProcSqlBody(sql: string): ProcSqlBody {
      return new ProcSqlBody(String(sql));
    },
    IN,
    OUT,
    INOUT,

    Integer: types.Integer,
    BigInteger: types.BigInteger,
    SmallInteger: types.SmallInteger,
    Numeric: types.Numeric,
    Varchar: types.Varchar,
    Text: types.Text,
    Bool: types.Bool,
    DateTime: types.DateTime,
    SqlDate: types.SqlDate,
    Time: types.Time,
    Json: types.Json,
    LargeBinary: types.LargeBinary,
    VarBinary: types.VarBinary,
    Binary: types.Binary,

    ForeignKey: constraints.ForeignKey,
    ForeignKeyConstraint: constraints.ForeignKeyConstraint,
    UniqueConstraint: constraints.UniqueConstraint,
    PrimaryKeyConstraint: constraints.PrimaryKeyConstraint,
    CheckConstraint: constraints.CheckConstraint,
    Index: constraints.Index,

    text: expressions.text,
    literal: expressions.literal,
    CURRENT_TIMESTAMP: expressions.CURRENT_TIMESTAMP,
    NULL: expressions.NULL,
    CASCADE: expressions.CASCADE,
    SET_NULL: expressions.SET_NULL,
    RESTRICT: expressions.RESTRICT,
    NO_ACTION: expressions.NO_ACTION,

    enums: lookup<Enumeration>("enum", (name) => metadata.enums.get(name)),
    tables: lookup<ColumnNames>("table", (name) =>
      metadata.tableNames.has(name) ? metadata.tableNames.get(name) : undefined
    ),
  };
}

export type Vocabulary = ReturnType<typeof createVocabulary>;
