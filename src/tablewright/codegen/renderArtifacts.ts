// codegen/renderArtifacts.ts

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { EnumTemplateData, type Packages } from "./enumTemplateData.js";
import { jdbcTarget } from "./jdbc.js";
import { type TemplateSet, renderTemplate } from "./templates.js";
import type { DbSettings } from "../materialize/settings.js";
import { type SchemaSource, toSnapshot } from "../model/metadata.js";
import { DEFAULT_TYPE_FAMILIES, type TypeFamily, getTypeMappings } from "../model/typeMappings.js";
import type { DialectName } from "../sql/dialects.js";
import { logger } from "../utils/logger.js";

/** Fixed inputs of a run, so identical inputs render identical files */
export interface ArtifactMeta {
  readonly version: string;
  readonly generatedAt: string;
  readonly modelFile: string;
}

export interface ArtifactOptions {
  readonly packages: Packages;
  readonly settings: DbSettings;
  /** Absolute directory the code generator writes into */
  readonly codeDir: string;
  readonly jdbcDialect?: DialectName;
  readonly typeFamilies?: readonly TypeFamily[];
}

export type ArtifactKind = "enum" | "converter" | "config";

export interface RenderedFile {
  readonly kind: ArtifactKind;
  /** `code` files go under the code directory, `config` under the config directory */
  readonly root: "code" | "config";
  /** Enumeration an enum or converter file was rendered for */
  readonly enumName?: string;
  readonly path: string;
  readonly contents: string;
}

export interface ForcedType {
  readonly expression: string;
  readonly name: string;
  readonly converter?: string;
}

export function configFileName(schemaName: string): string {
  return `ogma_jooq_gen_config.${schemaName.toLowerCase()}.xml`;
}

const packageDirs = new Map<string, string>();

/** `a.b.c` → `a/b/c`, computed once per package */
export function packageDir(pkg: string): string {
  let dir = packageDirs.get(pkg);
  if (dir === undefined) {
    dir = path.join(...pkg.split("."));
    packageDirs.set(pkg, dir);
  }
  return dir;
}

/**
 * Columns the code generator must map to a custom type. Enum columns resolve
 * to the enum's fully qualified name and get its converter.
 */
export function forcedTypes(
  schema: SchemaSource,
  packages: Packages,
  families: readonly TypeFamily[] = DEFAULT_TYPE_FAMILIES
): ForcedType[] {
  const snapshot = toSnapshot(schema);
  const enums = new Map(snapshot.enums.map((e) => [e.name, new EnumTemplateData(e, packages)]));
  const out: ForcedType[] = [];

  for (const [table, columns] of Object.entries(getTypeMappings(snapshot, families))) {
    for (const [column, typeName] of Object.entries(columns)) {
      const expression = `${table}\\.${column}`;
      const data = enums.get(typeName);
      out.push(
        data
          ? { expression, name: data.enumFqn, converter: data.converterFqn }
          : { expression, name: typeName }
      );
    }
  }
  return out;
}

export function renderArtifacts(
  schema: SchemaSource,
  templates: TemplateSet,
  options: ArtifactOptions,
  meta: ArtifactMeta
): RenderedFile[] {
  const snapshot = toSnapshot(schema);
  const { packages } = options;
  const common = {
    compiler_version: meta.version,
    datetime: meta.generatedAt,
    database_model_file: meta.modelFile.replace(/\\/g, "/"),
  };
  const files: RenderedFile[] = [];

  /* ---------- ENUMS + CONVERTERS ---------- */
  for (const enumeration of snapshot.enums) {
    const data = new EnumTemplateData(enumeration, packages);
    files.push({
      kind: "enum",
      root: "code",
      enumName: enumeration.name,
      path: path.join(packageDir(packages.enums), data.codeFileName),
      contents: renderTemplate(
        templates,
        "java_enum",
        data.view({ ...common, package: packages.enums, file_name: data.codeFileName })
      ),
    });
    files.push({
      kind: "converter",
      root: "code",
      enumName: enumeration.name,
      path: path.join(packageDir(packages.converters), data.converterFileName),
      contents: renderTemplate(
        templates,
        "java_enum_converter",
        data.view({ ...common, package: packages.converters, file_name: data.converterFileName })
      ),
    });
  }

  /* ---------- GENERATOR CONFIG ---------- */
  const { settings } = options;
  const jdbc = jdbcTarget(options.jdbcDialect ?? "postgresql", settings);
  const config = {
    ...common,
    jdbc_driver: jdbc.driver,
    jdbc_url: jdbc.url,
    jooq_database: jdbc.database,
    input_schema: jdbc.inputSchema,
    dbhost: settings.host,
    dbport: settings.port,
    dbname: settings.name,
    dbuser: settings.user,
    dbpassword: settings.password,
    schema_name: snapshot.schemaName,
    codedir: options.codeDir,
    package: packages.db,
    fields: forcedTypes(snapshot, packages, options.typeFamilies),
  };
  files.push({
    kind: "config",
    root: "config",
    path: configFileName(snapshot.schemaName),
    contents: renderTemplate(templates, "jooq_generator_config", config, "xml"),
  });

  return files;
}

/** Write rendered files, creating each directory once; returns absolute paths */
export async function writeArtifacts(
  files: readonly RenderedFile[],
  dirs: { codeDir: string; configDir: string }
): Promise<string[]> {
  const created = new Set<string>();
  const written: string[] = [];

  for (const file of files) {
    const base = file.root === "code" ? dirs.codeDir : dirs.configDir;
    const target = path.resolve(base, file.path);
    const dir = path.dirname(target);
    if (!created.has(dir)) {
      await mkdir(dir, { recursive: true });
      created.add(dir);
    }
    await writeFile(target, file.contents, "utf8");
    logger.file(target);
    written.push(target);
  }
  return written;
}
