// materialize/enumViews.ts

import type { SqlClient } from "./sqlClient.js";
import { MaterializationError } from "../model/errors.js";
import type { SchemaSnapshot } from "../model/metadata.js";
import { getTypeMappings } from "../model/typeMappings.js";
import { getDialect } from "../sql/dialects.js";
import { logger } from "../utils/logger.js";
import { enumTableName, enumViewName } from "../utils/naming.js";

const q = getDialect("postgresql").quote;

export interface EnumView {
  readonly name: string;
  readonly table: string;
  readonly sql: string;
}

/**
 * Alias of the lookup join for `column`. Every join is aliased, so an alias
 * can only clash with the base table; those of distinct columns all differ.
 */
export function joinAlias(table: string, column: string): string {
  const alias = `${column}_lookup`;
  return alias === table ? `${alias}_2` : alias;
}

/**
 * One view per table with enum columns: all of the table's columns plus a
 * `<column>_name` for each enum column, left-joined on the stored code.
 */
export function buildEnumViews(schema: SchemaSnapshot): EnumView[] {
  const views: EnumView[] = [];

  for (const [table, columns] of Object.entries(getTypeMappings(schema, ["enum"]))) {
    const selects = [`${q(table)}.*`];
    const joins: string[] = [];

    for (const [column, enumName] of Object.entries(columns)) {
      const alias = joinAlias(table, column);
      selects.push(`${q(alias)}.${q("name")} AS ${q(`${column}_name`)}`);
      joins.push(
        `LEFT JOIN ${q(enumTableName(enumName))} AS ${q(alias)} ` +
          `ON ${q(table)}.${q(column)} = ${q(alias)}.${q("value")}`
      );
    }

    const name = enumViewName(table);
    views.push({
      name,
      table,
      sql: `CREATE OR REPLACE VIEW ${q(name)} AS SELECT ${selects.join(", ")} FROM ${q(table)} ${joins.join(" ")}`,
    });
  }
  return views;
}

export async function createEnumViews(client: SqlClient, views: readonly EnumView[]): Promise<void> {
  logger.action("Creating views with enum names");
  for (const view of views) {
    try {
      await client.query(view.sql);
    } catch (err) {
      throw new MaterializationError(`view ${view.name}`, err);
    }
    logger.item(`View ${view.name} to combine table ${view.table} with its enum values`);
  }
  logger.done();
}
