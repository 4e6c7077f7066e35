// cli/program.ts

import path from "node:path";

import { Command, Option } from "commander";

import { DEFAULT_BASE_PACKAGE } from "../codegen/enumTemplateData.js";
import { generate } from "../codegen/generate.js";
import {
  type DatabaseOptions,
  SchemaDatabase,
  newDatabaseName,
  removeDatabase,
  saveSchema,
} from "../materialize/database.js";
import { materializeEnums } from "../materialize/materializeEnums.js";
import { type DbEnv, type DbSettings, loadDbSettings } from "../materialize/settings.js";
import type { ClientFactory } from "../materialize/sqlClient.js";
import { enumUsage, parseTypeFamilies } from "../model/typeMappings.js";
import { type LoadedModel, loadModelFile } from "../sandbox/modelLoader.js";
import { compileDDL } from "../sql/compileDDL.js";
import { DIALECT_NAMES, getDialect } from "../sql/dialects.js";
import { logger } from "../utils/logger.js";
import { VERSION } from "../version.js";

export const DEFAULT_OUTPUT_DIR = path.resolve("output");

interface ModelFlags {
  allowImports?: boolean;
  schema?: string;
}

interface DbFlags {
  dbUser?: string;
  dbPassword?: string;
  dbHost?: string;
  dbName?: string;
  dbPort?: number;
}

interface GenerateFlags extends ModelFlags, DbFlags {
  codeDir: string;
  sqlDir: string;
  configDir: string;
  javaPackage: string;
  typeFamilies: string;
}

export interface ProgramIO {
  env: DbEnv;
  /** Plain command output (DDL, names, reports) */
  write(text: string): void;
  /** Database connections; a `pg` pool unless replaced */
  connect?: ClientFactory;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port)) throw new Error(`Invalid port "${value}"`);
  return port;
}

function withDbOptions(cmd: Command): Command {
  return cmd
    .option("-u, --db-user <user>", "user name for the database")
    .option("-p, --db-password <password>", "password for the database user")
    .option("-H, --db-host <host>", "host holding the database")
    .option("--db-name <name>", "name of the database to create or read")
    .option("-P, --db-port <port>", "database port", parsePort);
}

function withModelOptions(cmd: Command): Command {
  return cmd
    .argument("<model>", "file with the database model")
    .option("--allow-imports", "allow import statements in the model file", false)
    .addOption(new Option("--schema <name>", "override the schema name").hideHelp());
}

function dbSettings(env: DbEnv, flags: DbFlags): DbSettings {
  return loadDbSettings(env, {
    user: flags.dbUser,
    password: flags.dbPassword,
    host: flags.dbHost,
    name: flags.dbName,
    port: flags.dbPort,
  });
}

async function loadModel(file: string, flags: ModelFlags): Promise<LoadedModel> {
  logger.section("Model");
  logger.action("Loading database model");
  try {
    const model = await loadModelFile(file, {
      allowImports: flags.allowImports,
      schemaName: flags.schema,
    });
    logger.item(path.resolve(file));
    logger.done();
    return model;
  } catch (err) {
    logger.done(err instanceof Error ? err.message : String(err));
    throw err;
  }
}

export function createProgram(io: ProgramIO): Command {
  const program = new Command()
    .name("tablewright")
    .description("Compile a database model into DDL, enum lookup tables and code generator artifacts")
    .version(VERSION);
  const dbOptions: DatabaseOptions = { connect: io.connect, env: io.env };

  /* ---------- generate ---------- */
  withModelOptions(withDbOptions(program.command("generate")))
    .description("generate enum sources, DDL files and the code generator configuration")
    .option("-c, --code-dir <dir>", "directory for generated code", DEFAULT_OUTPUT_DIR)
    .option("--sql-dir <dir>", "directory for generated SQL", DEFAULT_OUTPUT_DIR)
    .option("-x, --config-dir <dir>", "directory for generated config", DEFAULT_OUTPUT_DIR)
    .option("--java-package <package>", "base package of generated code", DEFAULT_BASE_PACKAGE)
    .option("--type-families <families>", "comma separated: enum, boolean, binary", "enum,boolean")
    .action(async (file: string, flags: GenerateFlags) => {
      const model = await loadModel(file, flags);
      const settings = dbSettings(io.env, flags);
      await generate(model.schema, {
        modelFile: file,
        settings: settings.name ? settings : { ...settings, name: newDatabaseName() },
        codeDir: flags.codeDir,
        sqlDir: flags.sqlDir,
        configDir: flags.configDir,
        basePackage: flags.javaPackage,
        typeFamilies: parseTypeFamilies(flags.typeFamilies.split(",")),
      });
    });

  /* ---------- ddl ---------- */
  withModelOptions(program.command("ddl"))
    .description("print the DDL of a model")
    .addOption(new Option("-d, --dialect <dialect>", "SQL dialect").choices(DIALECT_NAMES).default("mysql"))
    .option("--with-procedures", "append stored procedures in script form", false)
    .action(async (file: string, flags: ModelFlags & { dialect: string; withProcedures: boolean }) => {
      const model = await loadModel(file, flags);
      io.write(
        `${compileDDL(model.schema, getDialect(flags.dialect), {
          procedures: flags.withProcedures ? "delimited" : "omit",
        })}\n`
      );
    });

  /* ---------- enum-tables ---------- */
  withModelOptions(withDbOptions(program.command("enum-tables")))
    .description("create and fill enum lookup tables and their views in a database")
    .option("-v, --verbose", "list every enum value", false)
    .action(async (file: string, flags: ModelFlags & DbFlags & { verbose: boolean }) => {
      const model = await loadModel(file, flags);
      const db = SchemaDatabase.open(dbSettings(io.env, flags), dbOptions);
      try {
        await materializeEnums(db.client, model.schema, { verbose: flags.verbose });
      } finally {
        await db.close();
      }
    });

  /* ---------- enum-usage ---------- */
  withModelOptions(program.command("enum-usage"))
    .description("report which columns use each enum")
    .action(async (file: string, flags: ModelFlags) => {
      const model = await loadModel(file, flags);
      const lines: string[] = [];
      for (const [name, columns] of enumUsage(model.schema)) {
        lines.push(`Enum: ${name}`);
        if (columns.length === 0) lines.push("    (unused)");
        for (const column of columns) lines.push(`    * ${column}`);
      }
      io.write(`${lines.join("\n")}\n`);
    });

  /* ---------- get-db-name ---------- */
  program
    .command("get-db-name")
    .description("print a unique name for a temporary database")
    .action(() => {
      io.write(`${newDatabaseName()}\n`);
    });

  /* ---------- create-db ---------- */
  withModelOptions(withDbOptions(program.command("create-db")))
    .description("create a database holding the model's tables and procedures")
    .action(async (file: string, flags: ModelFlags & DbFlags) => {
      const model = await loadModel(file, flags);
      const db = await saveSchema(model.schema, dbSettings(io.env, flags), dbOptions);
      await db.close();
    });

  /* ---------- drop-db ---------- */
  withDbOptions(program.command("drop-db"))
    .description("drop a database")
    .argument("<database>", "name of the database to drop")
    .action(async (database: string, flags: DbFlags) => {
      const settings = dbSettings(io.env, { ...flags, dbName: database });
      logger.section("Database");
      logger.action(`Dropping database ${database}`);
      logger.item(await removeDatabase(settings, dbOptions));
      logger.done();
    });

  return program;
}
