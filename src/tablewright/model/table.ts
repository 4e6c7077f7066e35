// model/table.ts

import { Column, type ColumnShape } from "./column.js";
import {
  type Constraint,
  type EnumCheckConstraint,
  type ForeignKeyConstraint,
  type IndexDefinition,
  isConstraint,
} from "./constraints.js";
import { ConfigurationError, DuplicateDefinition } from "./errors.js";
import { indexName, isValidIdentifier } from "../utils/naming.js";

/** MySQL storage options, key order is the order they are rendered in */
export interface TableOptions {
  readonly engine: string;
  readonly charset: string;
  readonly collate: string;
  readonly rowFormat: string;
}

export const DEFAULT_TABLE_OPTIONS: TableOptions = Object.freeze({
  engine: "InnoDB",
  charset: "utf8mb4",
  collate: "utf8mb4_general_ci",
  rowFormat: "DYNAMIC",
});

export interface TableOptionsInput {
  engine?: string;
  charset?: string;
  characterSet?: string;
  collate?: string;
  collation?: string;
  rowFormat?: string;
}

export type TableItem = Column | Constraint | TableOptionsInput;

/** Constraints rendered inside CREATE TABLE, after the primary key */
export type TableConstraint =
  | Exclude<Constraint, IndexDefinition | { kind: "primaryKey" }>
  | EnumCheckConstraint;

export interface TableShape {
  readonly name: string;
  readonly columns: readonly ColumnShape[];
  readonly primaryKey: readonly string[];
  readonly constraints: readonly TableConstraint[];
  readonly indexes: readonly IndexDefinition[];
  readonly options: TableOptions;
}

const OPTION_KEYS: ReadonlySet<string> = new Set([
  "engine",
  "charset",
  "characterSet",
  "collate",
  "collation",
  "rowFormat",
]);

function isOptionsInput(item: object): item is TableOptionsInput {
  return Object.keys(item).every((key) => OPTION_KEYS.has(key));
}

function pick(input: TableOptionsInput, a: keyof TableOptionsInput, b?: keyof TableOptionsInput) {
  const first = input[a];
  const second = b === undefined ? undefined : input[b];
  if (first !== undefined && second !== undefined && first !== second) {
    throw new ConfigurationError(`Table option ${a} conflicts with ${b}`);
  }
  return first ?? second;
}

function resolveOptions(input: TableOptionsInput): TableOptions {
  return Object.freeze({
    engine: pick(input, "engine") ?? DEFAULT_TABLE_OPTIONS.engine,
    charset: pick(input, "charset", "characterSet") ?? DEFAULT_TABLE_OPTIONS.charset,
    collate: pick(input, "collate", "collation") ?? DEFAULT_TABLE_OPTIONS.collate,
    rowFormat: pick(input, "rowFormat") ?? DEFAULT_TABLE_OPTIONS.rowFormat,
  });
}

/**
 * Column-name namespace of a table, so other declarations can refer to
 * `table.column` without string literals.
 */
export class ColumnNames {
  private readonly names = new Map<string, string>();

  constructor(public readonly tableName: string) {}

  add(column: string): void {
    if (this.names.has(column)) {
      throw new DuplicateDefinition("column", column, this.tableName);
    }
    this.names.set(column, `${this.tableName}.${column}`);
  }

  has(column: string): boolean {
    return this.names.has(column);
  }

  /** Qualified `table.column` */
  ref(column: string): string {
    const ref = this.names.get(column);
    if (ref === undefined) {
      throw new ConfigurationError(`Table ${this.tableName} has no column ${column}`);
    }
    return ref;
  }

  list(): string[] {
    return [...this.names.keys()];
  }
}

export class Table implements TableShape {
  readonly names: ColumnNames;
  readonly options: TableOptions;
  private readonly columnMap = new Map<string, Column>();
  private readonly constraintList: TableConstraint[] = [];
  private readonly indexList: IndexDefinition[] = [];
  private readonly pk: string[] = [];

  constructor(
    public readonly name: string,
    items: readonly TableItem[]
  ) {
    if (!isValidIdentifier(name)) {
      throw new ConfigurationError(`Invalid table name "${name}"`);
    }
    this.names = new ColumnNames(name);

    let options: TableOptionsInput | undefined;
    let explicitPk: readonly string[] | undefined;

    for (const item of items) {
      if (item instanceof Column) {
        this.addColumn(item);
      } else if (isConstraint(item)) {
        if (item.kind === "primaryKey") {
          if (explicitPk) {
            throw new ConfigurationError(`Table ${name} declares more than one primary key`);
          }
          explicitPk = item.columns;
        } else if (item.kind === "index") {
          this.indexList.push(item);
        } else {
          this.constraintList.push(item);
        }
      } else if (typeof item === "object" && item !== null && isOptionsInput(item)) {
        if (options) {
          throw new ConfigurationError(`Table ${name} has more than one options object`);
        }
        options = item;
      } else {
        throw new ConfigurationError(`Table ${name}: unsupported item ${describeItem(item)}`);
      }
    }

    if (this.columnMap.size === 0) {
      throw new ConfigurationError(`Table ${name} has no columns`);
    }
    if (explicitPk) {
      if (this.pk.length > 0) {
        throw new ConfigurationError(
          `Table ${name} marks primary key columns and also declares PrimaryKeyConstraint`
        );
      }
      this.pk.push(...explicitPk);
    }

    this.options = resolveOptions(options ?? {});
    this.checkConstraintColumns();
  }

  private addColumn(column: Column): void {
    this.names.add(column.name);
    this.columnMap.set(column.name, column);

    if (column.primaryKey) this.pk.push(column.name);

    if (column.foreignKey) {
      const fk: ForeignKeyConstraint = Object.freeze({
        kind: "foreignKey",
        name: column.foreignKey.name,
        columns: [column.name],
        targets: [column.foreignKey.target],
        onDelete: column.foreignKey.onDelete,
        onUpdate: column.foreignKey.onUpdate,
      });
      this.constraintList.push(fk);
    }
    if (column.unique) {
      this.constraintList.push(Object.freeze({ kind: "unique", columns: [column.name] }));
    }
    if (column.index) {
      this.indexList.push(
        Object.freeze({
          kind: "index",
          name: indexName(this.name, column.name),
          columns: [column.name],
          unique: false,
        })
      );
    }
    // enum range check goes in now so constraint order follows column order
    if (column.type.kind === "enum") {
      this.constraintList.push(column.type.enumeration.checkConstraint(this.name, column.name));
    }
  }

  private checkConstraintColumns(): void {
    const lists: Array<readonly string[]> = [this.pk];
    for (const c of this.constraintList) {
      if (c.kind === "enumCheck") lists.push([c.column]);
      else if (c.kind !== "check") lists.push(c.columns);
    }
    for (const ix of this.indexList) lists.push(ix.columns);
    for (const cols of lists) {
      for (const col of cols) {
        if (!this.columnMap.has(col)) {
          throw new ConfigurationError(`Table ${this.name} has no column ${col}`);
        }
      }
    }
  }

  get columns(): readonly Column[] {
    return [...this.columnMap.values()];
  }

  get primaryKey(): readonly string[] {
    return [...this.pk];
  }

  get constraints(): readonly TableConstraint[] {
    return [...this.constraintList];
  }

  get indexes(): readonly IndexDefinition[] {
    return [...this.indexList];
  }

  ref(column: string): string {
    return this.names.ref(column);
  }
}

function describeItem(item: unknown): string {
  if (typeof item === "object" && item !== null) return JSON.stringify(item);
  return String(item);
}
