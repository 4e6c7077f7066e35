// utils/dependencySort.ts

import { ConfigurationError } from "../model/errors.js";
import type { TableShape } from "../model/table.js";

/**
 * Check foreign-key targets and order tables so every referenced table comes
 * before the tables pointing at it. Ties keep declaration order.
 */
export function validateAndSortTables<T extends TableShape>(tables: readonly T[]): T[] {
  const errors: string[] = [];
  const byName = new Map<string, T>();
  for (const t of tables) byName.set(t.name, t);

  /* ---------- RESOLVE REFERENCES ---------- */
  const graph = new Map<string, Set<string>>();
  for (const t of tables) graph.set(t.name, new Set());

  for (const t of tables) {
    for (const c of t.constraints) {
      if (c.kind !== "foreignKey") continue;
      for (const target of c.targets) {
        const parent = byName.get(target.table);
        if (!parent) {
          errors.push(`${t.name}.${c.columns.join(",")} references unknown table ${target.table}`);
          continue;
        }
        if (!parent.columns.some((col) => col.name === target.column)) {
          errors.push(
            `${t.name}.${c.columns.join(",")} references unknown column ${target.table}.${target.column}`
          );
          continue;
        }
        // self references do not constrain creation order
        if (parent.name !== t.name) graph.get(parent.name)?.add(t.name);
      }
    }
  }

  if (errors.length) {
    throw new ConfigurationError(`Invalid foreign keys:\n  ${errors.join("\n  ")}`);
  }

  /* ---------- TOPOLOGICAL SORT ---------- */
  const inDegree = new Map<string, number>();
  for (const t of tables) inDegree.set(t.name, 0);
  for (const outs of graph.values()) {
    for (const v of outs) inDegree.set(v, (inDegree.get(v) ?? 0) + 1);
  }

  const position = new Map<string, number>();
  tables.forEach((t, i) => position.set(t.name, i));
  const byPosition = (a: string, b: string) => (position.get(a) ?? 0) - (position.get(b) ?? 0);

  const ready: string[] = tables.filter((t) => inDegree.get(t.name) === 0).map((t) => t.name);
  const order: T[] = [];

  while (ready.length) {
    ready.sort(byPosition);
    const u = ready.shift();
    if (u === undefined) break;
    const table = byName.get(u);
    if (table) order.push(table);
    for (const v of graph.get(u) ?? []) {
      const d = (inDegree.get(v) ?? 0) - 1;
      inDegree.set(v, d);
      if (d === 0) ready.push(v);
    }
  }

  if (order.length !== tables.length) {
    const stuck = tables.filter((t) => (inDegree.get(t.name) ?? 0) > 0).map((t) => t.name);
    throw new ConfigurationError(`Foreign key cycle between tables: ${stuck.join(", ")}`);
  }

  return order;
}
