// model/enumeration.ts

import type { EnumType } from "./columnTypes.js";
import type { EnumCheckConstraint } from "./constraints.js";
import { ConfigurationError, DuplicateDefinition } from "./errors.js";
import { checkConstraintName, isValidIdentifier } from "../utils/naming.js";

export interface EnumEntry {
  readonly code: number;
  readonly name: string;
}

/**
 * Named, ordered set of values. Codes are assigned in declaration order,
 * starting at 0 with no gaps.
 */
export class Enumeration {
  private readonly codes = new Map<string, number>();
  private readonly columnType: EnumType;

  constructor(
    public readonly name: string,
    values: readonly string[]
  ) {
    if (!isValidIdentifier(name)) {
      throw new ConfigurationError(`Invalid enum name "${name}"`);
    }
    if (values.length === 0) {
      throw new ConfigurationError(`Enum ${name} needs at least one value`);
    }
    for (const value of values) this.addValue(value);
    this.columnType = Object.freeze({ kind: "enum", enumeration: this });
  }

  private addValue(value: string): void {
    if (typeof value !== "string" || !isValidIdentifier(value)) {
      throw new ConfigurationError(`Invalid value "${String(value)}" for enum ${this.name}`);
    }
    if (this.codes.has(value)) {
      throw new DuplicateDefinition("enum value", value, this.name);
    }
    this.codes.set(value, this.codes.size);
  }

  get values(): readonly string[] {
    return [...this.codes.keys()];
  }

  get size(): number {
    return this.codes.size;
  }

  has(value: string): boolean {
    return this.codes.has(value);
  }

  code(value: string): number {
    const code = this.codes.get(value);
    if (code === undefined) {
      throw new ConfigurationError(`${value} is not a value of enum ${this.name}`);
    }
    return code;
  }

  /** `(code, name)` pairs in code order */
  entries(): EnumEntry[] {
    return [...this.codes].map(([name, code]) => ({ code, name }));
  }

  /** Column type backed by this enumeration */
  asColumnType(): EnumType {
    return this.columnType;
  }

  /** Restricts a column holding this enum to its valid codes */
  checkConstraint(table: string, column: string): EnumCheckConstraint {
    return Object.freeze({
      kind: "enumCheck",
      name: checkConstraintName(table, column),
      column,
      codes: Object.freeze([...this.codes.values()]),
    });
  }
}
