// model/typeMappings.ts

import type { ColumnType } from "./columnTypes.js";
import { ConfigurationError } from "./errors.js";
import { type SchemaSource, toSnapshot } from "./metadata.js";

export type TypeFamily = "enum" | "boolean" | "binary";

export const TYPE_FAMILIES: readonly TypeFamily[] = ["enum", "boolean", "binary"];

export const DEFAULT_TYPE_FAMILIES: readonly TypeFamily[] = ["enum", "boolean"];

/** table → column → mapped type name */
export type TypeMappings = Record<string, Record<string, string>>;

export function parseTypeFamilies(names: readonly string[]): TypeFamily[] {
  return names.map((name) => {
    const family = TYPE_FAMILIES.find((f) => f === name.trim().toLowerCase());
    if (!family) {
      throw new ConfigurationError(
        `Unknown type family "${name}", expected one of ${TYPE_FAMILIES.join(", ")}`
      );
    }
    return family;
  });
}

function byName(a: { name: string }, b: { name: string }): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function mappedName(type: ColumnType, families: ReadonlySet<TypeFamily>): string | undefined {
  switch (type.kind) {
    case "enum":
      return families.has("enum") ? type.enumeration.name : undefined;
    case "boolean":
      return families.has("boolean") ? "BOOLEAN" : undefined;
    case "binary":
      return families.has("binary") ? "BINARY" : undefined;
    default:
      return undefined;
  }
}

/**
 * Columns whose type belongs to one of `families`. Tables and columns are
 * sorted by name; tables without such columns are left out.
 */
export function getTypeMappings(
  schema: SchemaSource,
  families: readonly TypeFamily[] = DEFAULT_TYPE_FAMILIES
): TypeMappings {
  const wanted = new Set(families);
  const mappings: TypeMappings = {};

  const tables = [...toSnapshot(schema).tables].sort(byName);
  for (const table of tables) {
    const columns = [...table.columns].sort(byName);
    for (const column of columns) {
      const name = mappedName(column.type, wanted);
      if (name === undefined) continue;
      const entry = (mappings[table.name] ??= {});
      entry[column.name] = name;
    }
  }
  return mappings;
}

/** enum name → `table.column` of every column using it, in declaration order of enums */
export function enumUsage(schema: SchemaSource): Map<string, string[]> {
  const snapshot = toSnapshot(schema);
  const usage = new Map<string, string[]>();
  for (const e of snapshot.enums) usage.set(e.name, []);

  for (const table of snapshot.tables) {
    for (const column of table.columns) {
      if (column.type.kind !== "enum") continue;
      usage.get(column.type.enumeration.name)?.push(`${table.name}.${column.name}`);
    }
  }
  return usage;
}
