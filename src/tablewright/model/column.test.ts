import { describe, expect, it } from "vitest";

import { Column, type ColumnOptions } from "./column.js";
import { Bool, DateTime, Integer, Varchar } from "./columnTypes.js";
import { ConfigurationError } from "./errors.js";
import { CURRENT_TIMESTAMP, text } from "./expressions.js";

describe("Column", () => {
  it("wraps boolean and numeric defaults as unquoted literals", () => {
    expect(new Column("flag", Bool, { default: true }).defaultExpr?.sql).toBe("true");
    expect(new Column("n", Integer, { default: 0 }).defaultExpr?.sql).toBe("0");
    expect(new Column("ratio", Integer, { default: 1.5 }).defaultExpr?.sql).toBe("1.5");
  });

  it("quotes string defaults", () => {
    expect(new Column("label", Varchar(20), { default: "it's" }).defaultExpr?.sql).toBe("'it''s'");
  });

  it("passes expressions through unchanged", () => {
    expect(new Column("at", DateTime, { default: CURRENT_TIMESTAMP }).defaultExpr).toBe(CURRENT_TIMESTAMP);
    const expr = text("now()");
    expect(new Column("at", DateTime, { default: expr }).defaultExpr).toBe(expr);
  });

  it("rejects a raw server default", () => {
    const options: ColumnOptions & { serverDefault: string } = { serverDefault: "1" };
    expect(() => new Column("n", Integer, options)).toThrow(ConfigurationError);
    const snake: ColumnOptions & { server_default: string } = { server_default: "1" };
    expect(() => new Column("n", Integer, snake)).toThrow(/"server_default" is not supported/);
  });

  it("keeps auto-increment off unless asked for", () => {
    expect(new Column("id", Integer, { primaryKey: true }).autoincrement).toBe(false);
    expect(new Column("id", Integer, { primaryKey: true, autoincrement: true }).autoincrement).toBe(true);
  });

  it("makes primary key columns NOT NULL", () => {
    expect(new Column("id", Integer, { primaryKey: true, nullable: true }).nullable).toBe(false);
    expect(new Column("note", Varchar(10)).nullable).toBe(true);
  });

  it("rejects auto-increment on non-integer columns or with a default", () => {
    expect(() => new Column("name", Varchar(10), { autoincrement: true })).toThrow(
      "Auto-increment column name must have an integer type"
    );
    expect(() => new Column("id", Integer, { autoincrement: true, default: 1 })).toThrow(
      "Column id cannot be auto-increment and have a default"
    );
  });

  it("parses string foreign keys", () => {
    const col = new Column("customer_id", Integer, { foreignKey: "customers.id" });
    expect(col.foreignKey?.target).toEqual({ table: "customers", column: "id" });
    expect(() => new Column("x", Integer, { foreignKey: "customers" })).toThrow(ConfigurationError);
  });
});
