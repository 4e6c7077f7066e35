// materialize/database.ts

import { randomBytes } from "node:crypto";

import { type DbEnv, type DbSettings, connectionString, requireSettings } from "./settings.js";
import { type ClientFactory, type ClosableClient, type SqlClient, connectPool } from "./sqlClient.js";
import { getSSLConfig } from "./sslConfig.js";
import { MaterializationError } from "../model/errors.js";
import { type SchemaSource, toSnapshot } from "../model/metadata.js";
import { createStatements } from "../sql/compileDDL.js";
import { getDialect } from "../sql/dialects.js";
import { logger } from "../utils/logger.js";

const pgDialect = getDialect("postgresql");

/** Database the admin connection logs into */
export const ADMIN_DATABASE = "postgres";

const DUPLICATE_DATABASE = "42P04";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `tablewright_db_<UTC YYYYMMDDHHMMSS>_<32 hex>` */
export function newDatabaseName(
  now: Date = new Date(),
  random: () => string = () => randomBytes(16).toString("hex")
): string {
  const stamp =
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `tablewright_db_${stamp}_${random()}`;
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** CREATE DATABASE, an existing database is reported, not an error */
export async function createDatabase(admin: SqlClient, name: string): Promise<string> {
  return admin
    .query(`CREATE DATABASE ${pgDialect.quote(name)}`)
    .then(() => `Database '${name}' created successfully.`)
    .catch((err: unknown) => {
      if (errorCode(err) === DUPLICATE_DATABASE) return `Database '${name}' already exists.`;
      throw new MaterializationError(`database ${name}`, err);
    });
}

export async function dropDatabase(admin: SqlClient, name: string): Promise<string> {
  try {
    await admin.query(`DROP DATABASE IF EXISTS ${pgDialect.quote(name)}`);
  } catch (err) {
    throw new MaterializationError(`database ${name}`, err);
  }
  return `Database '${name}' dropped.`;
}

/** Run the execution-form DDL of `schema`, statement by statement */
export async function createSchemaObjects(client: SqlClient, schema: SchemaSource): Promise<number> {
  const statements = createStatements(toSnapshot(schema), pgDialect);
  for (const statement of statements) {
    try {
      await client.query(statement);
    } catch (err) {
      throw new MaterializationError(firstLine(statement), err);
    }
  }
  return statements.length;
}

function firstLine(statement: string): string {
  return statement.split("\n")[0] ?? statement;
}

export interface DatabaseOptions {
  /** Pool factory, replaced in tests */
  connect?: ClientFactory;
  env?: DbEnv;
}

/**
 * A connected schema database. One instance per connection string is kept
 * until it is closed.
 */
export class SchemaDatabase {
  private static instances = new Map<string, SchemaDatabase>();

  private constructor(
    public readonly settings: DbSettings,
    public readonly client: ClosableClient,
    private readonly key: string
  ) {}

  static open(settings: DbSettings, options: DatabaseOptions = {}): SchemaDatabase {
    requireSettings(settings, "user", "name");
    const url = connectionString(settings);
    const cached = this.instances.get(url);
    if (cached) return cached;

    const connect = options.connect ?? connectPool;
    const client = connect(url, sslFor(settings, url, options.env));
    const db = new SchemaDatabase(settings, client, url);
    this.instances.set(url, db);
    return db;
  }

  /** Admin connection for CREATE/DROP DATABASE; the caller ends it */
  static admin(settings: DbSettings, options: DatabaseOptions = {}): ClosableClient {
    requireSettings(settings, "user");
    const url = connectionString(settings, ADMIN_DATABASE);
    const connect = options.connect ?? connectPool;
    return connect(url, sslFor(settings, url, options.env));
  }

  async close(): Promise<void> {
    SchemaDatabase.instances.delete(this.key);
    await this.client.end();
  }
}

function sslFor(settings: DbSettings, url: string, env: DbEnv | undefined) {
  return getSSLConfig({ NODE_ENV: env?.NODE_ENV, allowSSL: settings.ssl, dbUrl: url });
}

async function withAdmin<T>(
  settings: DbSettings,
  options: DatabaseOptions,
  fn: (admin: SqlClient) => Promise<T>
): Promise<T> {
  const admin = SchemaDatabase.admin(settings, options);
  try {
    return await fn(admin);
  } finally {
    await admin.end();
  }
}

/** Create the database named in `settings` and every table and procedure of `schema` in it */
export async function saveSchema(
  schema: SchemaSource,
  settings: DbSettings,
  options: DatabaseOptions = {}
): Promise<SchemaDatabase> {
  const snapshot = toSnapshot(schema);
  logger.section("Database");
  logger.action(`Creating database ${settings.name}`);
  const message = await withAdmin(settings, options, (admin) =>
    createDatabase(admin, settings.name)
  );
  logger.item(message);

  const db = SchemaDatabase.open(settings, options);
  try {
    const count = await createSchemaObjects(db.client, snapshot);
    logger.item(`${count} statements for schema ${snapshot.schemaName}`);
  } catch (err) {
    await db.close();
    logger.done("failed");
    throw err;
  }
  logger.done();
  return db;
}

export async function removeDatabase(settings: DbSettings, options: DatabaseOptions = {}): Promise<string> {
  return withAdmin(settings, options, (admin) => dropDatabase(admin, settings.name));
}

/**
 * Run `fn` against a freshly created database holding `schema`. The database
 * is dropped afterwards unless `dropAfter` is false.
 */
export async function withDatabaseInstance<T>(
  schema: SchemaSource,
  settings: DbSettings,
  fn: (db: SchemaDatabase) => Promise<T>,
  options: DatabaseOptions & { dropAfter?: boolean } = {}
): Promise<T> {
  const db = await saveSchema(schema, settings, options);
  try {
    return await fn(db);
  } finally {
    await db.close();
    if (options.dropAfter !== false) {
      logger.action(`Dropping database ${settings.name}`);
      logger.item(await removeDatabase(settings, options));
      logger.done();
    }
  }
}
