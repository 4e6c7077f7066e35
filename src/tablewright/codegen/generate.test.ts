import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { generate } from "./generate.js";
import { loadDbSettings } from "../materialize/settings.js";
import { compileDDL } from "../sql/compileDDL.js";
import { shopModel } from "../testing/fixtures.js";

describe("generate", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "generate-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const run = () =>
    generate(shopModel().snapshot(), {
      modelFile: "shop.model.ts",
      settings: loadDbSettings({ TABLEWRIGHT_DB_USER: "test", TABLEWRIGHT_DB_NAME: "shop_test" }),
      codeDir: path.join(dir, "code"),
      configDir: path.join(dir, "config"),
      sqlDir: path.join(dir, "sql"),
      basePackage: "org.acme",
      now: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
    });

  it("writes enum sources, DDL for every dialect and the generator config", async () => {
    const result = await run();

    expect(result.packages.enums).toBe("org.acme.shop.enums");
    expect(result.codeFiles).toEqual([
      path.join(dir, "code", "org", "acme", "shop", "enums", "OrderStatus.java"),
      path.join(dir, "code", "org", "acme", "shop", "enums", "converters", "OrderStatusTypeConverter.java"),
    ]);
    expect(result.ddlFiles).toEqual([
      path.join(dir, "sql", "full_ddl.shop.mysql.sql"),
      path.join(dir, "sql", "full_ddl.shop.postgresql.sql"),
    ]);
    expect(result.configFile).toBe(path.join(dir, "config", "ogma_jooq_gen_config.shop.xml"));

    expect(await readFile(path.join(dir, "sql", "full_ddl.shop.postgresql.sql"), "utf8")).toBe(
      compileDDL(shopModel(), "postgresql")
    );
    expect(await readFile(result.configFile, "utf8")).toContain(
      "on 2024-01-02T03:04:05.000Z from shop.model.ts"
    );
  });

  it("limits DDL to the requested dialects", async () => {
    const result = await generate(shopModel().snapshot(), {
      modelFile: "shop.model.ts",
      settings: loadDbSettings({}),
      codeDir: path.join(dir, "code"),
      configDir: path.join(dir, "config"),
      sqlDir: path.join(dir, "sql"),
      dialects: ["mysql"],
    });

    expect(result.ddlFiles).toHaveLength(1);
    expect(await readdir(path.join(dir, "sql"))).toEqual(["full_ddl.shop.mysql.sql"]);
  });

  it("overwrites its own output with the same contents", async () => {
    const first = await run();
    const before = await readFile(first.configFile, "utf8");
    const second = await run();
    expect(await readFile(second.configFile, "utf8")).toBe(before);
  });
});
