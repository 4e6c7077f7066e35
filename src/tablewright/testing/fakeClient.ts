// testing/fakeClient.ts

import type { SqlClient, SqlResult } from "../materialize/sqlClient.js";

export interface RecordedQuery {
  readonly text: string;
  readonly values: readonly unknown[] | undefined;
}

type FakeRow = {
  value: number;
  name: string;
};

const DROP = /^DROP TABLE IF EXISTS "([^"]+)"/;
const CREATE = /^CREATE TABLE "([^"]+)"/;
const INSERT = /^INSERT INTO "([^"]+)"/;
const SELECT = /^SELECT "value", "name" FROM "([^"]+)" ORDER BY "value"$/;

/**
 * In-memory stand-in for a PostgreSQL connection. It understands the lookup
 * table statements and records everything else.
 */
export class FakeSqlClient implements SqlClient {
  readonly queries: RecordedQuery[] = [];
  readonly tables = new Map<string, FakeRow[]>();
  ended = false;

  constructor(private readonly failOn?: RegExp) {}

  async query(text: string, values?: unknown[]): Promise<SqlResult> {
    this.queries.push({ text, values });
    if (this.failOn?.test(text)) {
      throw Object.assign(new Error("simulated failure"), { code: "XX000" });
    }

    let m = DROP.exec(text);
    if (m?.[1]) {
      this.tables.delete(m[1]);
      return { rows: [], rowCount: null };
    }
    m = CREATE.exec(text);
    if (m?.[1]) {
      if (this.tables.has(m[1])) throw new Error(`relation "${m[1]}" already exists`);
      this.tables.set(m[1], []);
      return { rows: [], rowCount: null };
    }
    m = INSERT.exec(text);
    if (m?.[1]) return { rows: [], rowCount: this.insert(m[1], values ?? []) };

    m = SELECT.exec(text);
    if (m?.[1]) {
      const rows = this.tables.get(m[1]);
      if (!rows) throw new Error(`relation "${m[1]}" does not exist`);
      const sorted = [...rows].sort((a, b) => a.value - b.value);
      return { rows: sorted.map((row) => ({ ...row })), rowCount: sorted.length };
    }
    return { rows: [], rowCount: 0 };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  texts(): string[] {
    return this.queries.map((q) => q.text);
  }

  private insert(table: string, values: readonly unknown[]): number {
    const rows = this.tables.get(table);
    if (!rows) throw new Error(`relation "${table}" does not exist`);
    for (let i = 0; i < values.length; i += 2) {
      const value = Number(values[i]);
      const name = String(values[i + 1]);
      if (rows.some((r) => r.value === value || r.name === name)) {
        throw new Error(`duplicate key in ${table}`);
      }
      rows.push({ value, name });
    }
    return values.length / 2;
  }
}
