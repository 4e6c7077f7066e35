// model/column.ts

import { type ColumnType, isColumnType } from "./columnTypes.js";
import { type ForeignKeySpec, ForeignKey, isForeignKeySpec } from "./constraints.js";
import { Enumeration } from "./enumeration.js";
import { ConfigurationError } from "./errors.js";
import type { SqlExpression } from "./expressions.js";
import { type DefaultValue, buildDefaultSQL } from "../sql/buildDefaultSQL.js";
import { isValidIdentifier } from "../utils/naming.js";

export interface ColumnOptions {
  primaryKey?: boolean;
  nullable?: boolean;
  unique?: boolean;
  index?: boolean;
  default?: DefaultValue;
  /** Off unless asked for, surrogate keys are declared explicitly */
  autoincrement?: boolean;
  foreignKey?: string | ForeignKeySpec;
  comment?: string;
}

const KNOWN_OPTIONS: ReadonlySet<string> = new Set([
  "primaryKey",
  "nullable",
  "unique",
  "index",
  "default",
  "autoincrement",
  "foreignKey",
  "comment",
]);

const RAW_DEFAULT_OPTIONS: ReadonlySet<string> = new Set(["serverDefault", "server_default"]);

/** Read-only view of a column shared by the model and its engine-adapted copies */
export interface ColumnShape {
  readonly name: string;
  readonly type: ColumnType;
  readonly primaryKey: boolean;
  readonly nullable: boolean;
  readonly unique: boolean;
  readonly index: boolean;
  readonly autoincrement: boolean;
  readonly defaultExpr: SqlExpression | undefined;
  readonly foreignKey: ForeignKeySpec | undefined;
  readonly comment: string | undefined;
}

export type ColumnTypeInput = ColumnType | Enumeration;

export function toColumnType(input: ColumnTypeInput, where: string): ColumnType {
  if (input instanceof Enumeration) return input.asColumnType();
  if (isColumnType(input)) return input;
  throw new ConfigurationError(`Column ${where} has an unknown type`);
}

export class Column implements ColumnShape {
  readonly type: ColumnType;
  readonly primaryKey: boolean;
  readonly nullable: boolean;
  readonly unique: boolean;
  readonly index: boolean;
  readonly autoincrement: boolean;
  readonly defaultExpr: SqlExpression | undefined;
  readonly foreignKey: ForeignKeySpec | undefined;
  readonly comment: string | undefined;

  constructor(
    public readonly name: string,
    type: ColumnTypeInput,
    options: ColumnOptions = {}
  ) {
    if (!isValidIdentifier(name)) {
      throw new ConfigurationError(`Invalid column name "${name}"`);
    }
    for (const key of Object.keys(options)) {
      if (RAW_DEFAULT_OPTIONS.has(key)) {
        throw new ConfigurationError(
          `Column ${name}: "${key}" is not supported, use "default" so the value is rendered as a literal`
        );
      }
      if (!KNOWN_OPTIONS.has(key)) {
        throw new ConfigurationError(`Column ${name}: unknown option "${key}"`);
      }
    }

    this.type = toColumnType(type, name);
    this.primaryKey = options.primaryKey === true;
    this.nullable = this.primaryKey ? false : options.nullable !== false;
    this.unique = options.unique === true;
    this.index = options.index === true;
    this.autoincrement = options.autoincrement === true;
    this.defaultExpr = buildDefaultSQL(options.default);
    this.comment = options.comment;

    const fk = options.foreignKey;
    this.foreignKey = fk === undefined || isForeignKeySpec(fk) ? fk : ForeignKey(fk);

    if (this.autoincrement && this.defaultExpr !== undefined) {
      throw new ConfigurationError(`Column ${name} cannot be auto-increment and have a default`);
    }
    if (this.autoincrement && !isIntegerType(this.type)) {
      throw new ConfigurationError(`Auto-increment column ${name} must have an integer type`);
    }

    Object.freeze(this);
  }
}

function isIntegerType(type: ColumnType): boolean {
  return (
    type.kind === "scalar" &&
    (type.name === "INTEGER" || type.name === "BIGINT" || type.name === "SMALLINT")
  );
}
