// materialize/sqlClient.ts

import pg from "pg";
import type { QueryResultRow } from "pg";

import type { SSLConfig } from "./sslConfig.js";

export interface SqlResult {
  rows: QueryResultRow[];
  rowCount: number | null;
}

/** The part of a `pg` pool the materializer needs */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

/** Client owning its connections */
export interface ClosableClient extends SqlClient {
  end(): Promise<void>;
}

export type ClientFactory = (connectionString: string, ssl: SSLConfig) => ClosableClient;

export function poolClient(pool: pg.Pool): ClosableClient {
  return {
    query: (text, values) => pool.query(text, values),
    end: () => pool.end(),
  };
}

export const connectPool: ClientFactory = (connectionString, ssl) =>
  poolClient(new pg.Pool({ connectionString, ssl }));
