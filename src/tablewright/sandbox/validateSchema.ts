// sandbox/validateSchema.ts

import { InvalidSchemaName, MissingSchemaName } from "../model/errors.js";
import type { SchemaMetadata, SchemaSnapshot } from "../model/metadata.js";

const INVALID_CHARS = "-^<>/'\"{}[]~`";

/** Shown in the error message, `.` and `\` are rejected too */
export const FORBIDDEN_SCHEMA_CHARS = `.${INVALID_CHARS}\\`;

export function checkSchemaName(name: string | undefined, file: string): string {
  if (name === undefined) throw new MissingSchemaName(file);
  const bad = name === "" || /\s/.test(name) || [...name].some((ch) => FORBIDDEN_SCHEMA_CHARS.includes(ch));
  if (bad) throw new InvalidSchemaName(name, file, FORBIDDEN_SCHEMA_CHARS);
  return name;
}

/**
 * Schema-level checks run once the model graph exists and before any backend
 * reads it: the schema name, then foreign-key resolution and ordering.
 */
export function validateSchema(metadata: SchemaMetadata): SchemaSnapshot {
  checkSchemaName(metadata.schemaName, metadata.file);
  return metadata.snapshot();
}
