// model/constraints.ts

import { ConfigurationError } from "./errors.js";
import { isValidIdentifier } from "../utils/naming.js";

export type ReferentialAction = "CASCADE" | "SET NULL" | "SET DEFAULT" | "RESTRICT" | "NO ACTION";

const FK_ACTIONS: readonly ReferentialAction[] = [
  "CASCADE",
  "SET NULL",
  "SET DEFAULT",
  "RESTRICT",
  "NO ACTION",
];

export interface ColumnRef {
  readonly table: string;
  readonly column: string;
}

export interface CheckConstraint {
  readonly kind: "check";
  readonly name?: string;
  readonly sql: string;
}

/** Derived from an enum column: the column may only hold the enum's codes */
export interface EnumCheckConstraint {
  readonly kind: "enumCheck";
  readonly name: string;
  readonly column: string;
  readonly codes: readonly number[];
}

export interface ForeignKeyConstraint {
  readonly kind: "foreignKey";
  readonly name?: string;
  readonly columns: readonly string[];
  readonly targets: readonly ColumnRef[];
  readonly onDelete?: ReferentialAction;
  readonly onUpdate?: ReferentialAction;
}

export interface UniqueConstraint {
  readonly kind: "unique";
  readonly name?: string;
  readonly columns: readonly string[];
}

export interface PrimaryKeyConstraint {
  readonly kind: "primaryKey";
  readonly name?: string;
  readonly columns: readonly string[];
}

export interface IndexDefinition {
  readonly kind: "index";
  readonly name: string;
  readonly columns: readonly string[];
  readonly unique: boolean;
}

export type Constraint =
  | CheckConstraint
  | ForeignKeyConstraint
  | UniqueConstraint
  | PrimaryKeyConstraint
  | IndexDefinition;

/** Column-level `foreignKey` option, bound to its column by the table */
export interface ForeignKeySpec {
  readonly kind: "foreignKeyRef";
  readonly target: ColumnRef;
  readonly name?: string;
  readonly onDelete?: ReferentialAction;
  readonly onUpdate?: ReferentialAction;
}

export interface ForeignKeyOptions {
  name?: string;
  onDelete?: string;
  onUpdate?: string;
}

/* ---------- HELPERS ---------- */

function normalizeAction(action: string | undefined, where: string): ReferentialAction | undefined {
  if (action === undefined) return undefined;
  const upper = String(action).trim().toUpperCase();
  const valid = FK_ACTIONS.find((a) => a === upper);
  if (valid) return valid;
  throw new ConfigurationError(`Invalid ${where} action "${action}"`);
}

function checkIdentifiers(names: readonly string[], what: string): readonly string[] {
  if (names.length === 0) {
    throw new ConfigurationError(`${what} needs at least one column`);
  }
  for (const n of names) {
    if (typeof n !== "string" || !isValidIdentifier(n)) {
      throw new ConfigurationError(`Invalid column name "${String(n)}" in ${what}`);
    }
  }
  return Object.freeze([...names]);
}

/** `"users.id"` → `{ table: "users", column: "id" }` */
export function parseColumnRef(ref: string): ColumnRef {
  const parts = String(ref).split(".");
  const [table, column] = parts;
  if (
    parts.length !== 2 ||
    table === undefined ||
    column === undefined ||
    !isValidIdentifier(table) ||
    !isValidIdentifier(column)
  ) {
    throw new ConfigurationError(`Invalid column reference "${ref}", expected "table.column"`);
  }
  return Object.freeze({ table, column });
}

/* ---------- MODEL VOCABULARY ---------- */

export function ForeignKey(target: string, options: ForeignKeyOptions = {}): ForeignKeySpec {
  return Object.freeze({
    kind: "foreignKeyRef",
    target: parseColumnRef(target),
    name: options.name,
    onDelete: normalizeAction(options.onDelete, "ON DELETE"),
    onUpdate: normalizeAction(options.onUpdate, "ON UPDATE"),
  });
}

export function ForeignKeyConstraint(
  columns: readonly string[],
  targets: readonly string[],
  options: ForeignKeyOptions = {}
): ForeignKeyConstraint {
  const cols = checkIdentifiers(columns, "foreign key");
  if (targets.length !== cols.length) {
    throw new ConfigurationError(
      `Foreign key (${cols.join(", ")}) has ${cols.length} columns but ${targets.length} targets`
    );
  }
  const refs = targets.map(parseColumnRef);
  const referenced = new Set(refs.map((r) => r.table));
  if (referenced.size !== 1) {
    throw new ConfigurationError(
      `Foreign key (${cols.join(", ")}) must reference a single table`
    );
  }
  return Object.freeze({
    kind: "foreignKey",
    name: options.name,
    columns: cols,
    targets: Object.freeze(refs),
    onDelete: normalizeAction(options.onDelete, "ON DELETE"),
    onUpdate: normalizeAction(options.onUpdate, "ON UPDATE"),
  });
}

export function UniqueConstraint(...columns: string[]): UniqueConstraint {
  return Object.freeze({ kind: "unique", columns: checkIdentifiers(columns, "unique constraint") });
}

export function PrimaryKeyConstraint(...columns: string[]): PrimaryKeyConstraint {
  return Object.freeze({
    kind: "primaryKey",
    columns: checkIdentifiers(columns, "primary key"),
  });
}

export function CheckConstraint(sql: string, name?: string): CheckConstraint {
  if (typeof sql !== "string" || sql.trim() === "") {
    throw new ConfigurationError("Check constraint needs an SQL condition");
  }
  if (name !== undefined && !isValidIdentifier(name)) {
    throw new ConfigurationError(`Invalid check constraint name "${name}"`);
  }
  return Object.freeze({ kind: "check", name, sql });
}

export function Index(
  name: string,
  columns: readonly string[],
  options: { unique?: boolean } = {}
): IndexDefinition {
  if (!isValidIdentifier(name)) {
    throw new ConfigurationError(`Invalid index name "${name}"`);
  }
  return Object.freeze({
    kind: "index",
    name,
    columns: checkIdentifiers(columns, `index ${name}`),
    unique: options.unique === true,
  });
}

const CONSTRAINT_KINDS = new Set(["check", "foreignKey", "unique", "primaryKey", "index"]);

export function isConstraint(value: unknown): value is Constraint {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    typeof value.kind === "string" &&
    CONSTRAINT_KINDS.has(value.kind)
  );
}

export function isForeignKeySpec(value: unknown): value is ForeignKeySpec {
  return typeof value === "object" && value !== null && "kind" in value && value.kind === "foreignKeyRef";
}
