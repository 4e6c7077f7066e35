// materialize/materializeEnums.ts

import { type EnumTable, createEnumTables } from "./enumTables.js";
import { type EnumView, buildEnumViews, createEnumViews } from "./enumViews.js";
import type { SqlClient } from "./sqlClient.js";
import { type SchemaSource, toSnapshot } from "../model/metadata.js";
import { logger } from "../utils/logger.js";

export interface MaterializeResult {
  readonly tables: readonly EnumTable[];
  readonly views: readonly EnumView[];
}

/**
 * Lookup tables for every enum, then the name views. Re-running drops and
 * recreates the tables, so their contents come out the same.
 */
export async function materializeEnums(
  client: SqlClient,
  schema: SchemaSource,
  options: { verbose?: boolean } = {}
): Promise<MaterializeResult> {
  const snapshot = toSnapshot(schema);
  logger.section("Enum Tables");

  if (snapshot.enums.length === 0) {
    logger.action("No enums found in the given model");
    logger.done();
    return { tables: [], views: [] };
  }

  const tables = await createEnumTables(client, snapshot.enums, options);

  const views = buildEnumViews(snapshot);
  await createEnumViews(client, views);

  return { tables, views };
}
