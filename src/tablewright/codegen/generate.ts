// codegen/generate.ts

import path from "node:path";

import { type Packages, DEFAULT_BASE_PACKAGE, packagesFor } from "./enumTemplateData.js";
import { renderArtifacts, writeArtifacts } from "./renderArtifacts.js";
import { type TemplateLoader, fileLoader, loadTemplates } from "./templates.js";
import type { DbSettings } from "../materialize/settings.js";
import type { SchemaSnapshot } from "../model/metadata.js";
import type { TypeFamily } from "../model/typeMappings.js";
import { writeDDLFile } from "../sql/compileDDL.js";
import { DIALECT_NAMES, type DialectName } from "../sql/dialects.js";
import { logger } from "../utils/logger.js";
import { VERSION } from "../version.js";

export interface GenerateOptions {
  modelFile: string;
  settings: DbSettings;
  codeDir: string;
  configDir: string;
  sqlDir: string;
  basePackage?: string;
  /** One DDL file per dialect */
  dialects?: readonly DialectName[];
  jdbcDialect?: DialectName;
  typeFamilies?: readonly TypeFamily[];
  templates?: TemplateLoader;
  now?: Date;
}

export interface GenerateResult {
  readonly packages: Packages;
  readonly codeFiles: readonly string[];
  readonly ddlFiles: readonly string[];
  readonly configFile: string;
}

/**
 * Enum sources and converters, DDL files, then the generator configuration.
 * `schema` must come from a validated model.
 */
export async function generate(schema: SchemaSnapshot, options: GenerateOptions): Promise<GenerateResult> {
  const packages = packagesFor(schema.schemaName, options.basePackage ?? DEFAULT_BASE_PACKAGE);
  const codeDir = path.resolve(options.codeDir);
  const configDir = path.resolve(options.configDir);

  const templates = await loadTemplates(options.templates ?? fileLoader());
  const files = renderArtifacts(
    schema,
    templates,
    {
      packages,
      settings: options.settings,
      codeDir,
      jdbcDialect: options.jdbcDialect,
      typeFamilies: options.typeFamilies,
    },
    {
      version: VERSION,
      generatedAt: (options.now ?? new Date()).toISOString(),
      modelFile: options.modelFile,
    }
  );

  /* ---------- ENUMS ---------- */
  logger.section("Java Enums And Converters");
  const codeFiles: string[] = [];
  for (const enumeration of schema.enums) {
    logger.action(`Generating files for enum: ${enumeration.name}`);
    const own = files.filter((f) => f.enumName === enumeration.name);
    codeFiles.push(...(await writeArtifacts(own, { codeDir, configDir })));
    logger.done();
  }

  /* ---------- DDL ---------- */
  logger.section("Database Creation DDL");
  const ddlFiles: string[] = [];
  for (const dialect of options.dialects ?? DIALECT_NAMES) {
    logger.action(`Generating database schema for ${dialect}`);
    const file = await writeDDLFile(schema, dialect, options.sqlDir);
    logger.file(file);
    ddlFiles.push(file);
    logger.done();
  }

  /* ---------- GENERATOR CONFIG ---------- */
  logger.section("jOOQ");
  logger.action("Generating jOOQ generator configuration file");
  const [configFile = ""] = await writeArtifacts(
    files.filter((f) => f.kind === "config"),
    { codeDir, configDir }
  );
  logger.done();

  return { packages, codeFiles, ddlFiles, configFile };
}
