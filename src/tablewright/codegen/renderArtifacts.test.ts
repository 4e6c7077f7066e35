import path from "node:path";

import { beforeAll, describe, expect, it } from "vitest";

import { EnumTemplateData, packagesFor } from "./enumTemplateData.js";
import { configFileName, forcedTypes, renderArtifacts } from "./renderArtifacts.js";
import { type TemplateSet, escapeXml, loadTemplates, renderTemplate } from "./templates.js";
import { loadDbSettings } from "../materialize/settings.js";
import { Enumeration } from "../model/enumeration.js";
import { TemplateRenderError } from "../model/errors.js";
import { newModel, shopModel } from "../testing/fixtures.js";

const settings = loadDbSettings({
  TABLEWRIGHT_DB_USER: "test",
  TABLEWRIGHT_DB_PASSWORD: "p<&>",
  TABLEWRIGHT_DB_NAME: "shop_test",
});

const packages = packagesFor("Shop");

const meta = {
  version: "1.2.3",
  generatedAt: "2024-01-02T03:04:05.000Z",
  modelFile: "models\\shop.model.ts",
};

describe("EnumTemplateData", () => {
  it("marks only the last value", () => {
    const data = new EnumTemplateData(new Enumeration("Size", ["S", "M", "L"]), packages);
    expect(data.values()).toEqual([
      { valname: "S", valnum: 0 },
      { valname: "M", valnum: 1 },
      { valname: "L", valnum: 2, last: true },
    ]);
    expect(data.converterFqn).toBe("com.example.dbutils.shop.enums.converters.SizeTypeConverter");
  });
});

describe("forcedTypes", () => {
  it("maps enum columns to their class and converter, booleans by name", () => {
    const { metadata, v } = newModel();
    v.Schema("Shop");
    const Size = v.Enum("Size", "S", "L");
    v.Table("shirts", v.Column("size", Size), v.Column("active", v.Bool));

    expect(forcedTypes(metadata, packages)).toEqual([
      { expression: "shirts\\.active", name: "BOOLEAN" },
      {
        expression: "shirts\\.size",
        name: "com.example.dbutils.shop.enums.Size",
        converter: "com.example.dbutils.shop.enums.converters.SizeTypeConverter",
      },
    ]);
    expect(forcedTypes(metadata, packages, ["enum"])).toHaveLength(1);
  });
});

describe("renderArtifacts", () => {
  let templates: TemplateSet;

  beforeAll(async () => {
    templates = await loadTemplates();
  });

  const render = () =>
    renderArtifacts(shopModel(), templates, { packages, settings, codeDir: "/work/gen" }, meta);

  it("renders an enum, its converter and the generator config", () => {
    expect(render().map((f) => [f.kind, f.root, f.path])).toEqual([
      ["enum", "code", path.join("com", "example", "dbutils", "shop", "enums", "OrderStatus.java")],
      [
        "converter",
        "code",
        path.join("com", "example", "dbutils", "shop", "enums", "converters", "OrderStatusTypeConverter.java"),
      ],
      ["config", "config", configFileName("Shop")],
    ]);
  });

  it("lists enum values with their codes", () => {
    const [enumFile] = render();
    const contents = enumFile?.contents ?? "";

    expect(contents).toContain(" * from models/shop.model.ts. Do not edit");
    expect(contents).toContain("package com.example.dbutils.shop.enums;\n");
    expect(contents).toContain(
      [
        "public enum OrderStatus {",
        "    Pending(0),",
        "    Shipped(1),",
        "    Delivered(2);",
        "",
        "    private final int value;",
      ].join("\n")
    );
  });

  it("points the converter at the enum class", () => {
    const converter = render()[1]?.contents ?? "";
    expect(converter).toContain("import com.example.dbutils.shop.enums.OrderStatus;");
    expect(converter).toContain(
      "public class OrderStatusTypeConverter extends AbstractConverter<Integer, OrderStatus> {"
    );
  });

  it("escapes settings in the XML config and forces enum types", () => {
    const config = render()[2]?.contents ?? "";

    expect(configFileName("Shop")).toBe("ogma_jooq_gen_config.shop.xml");
    expect(config).toContain("    <password>p&lt;&amp;&gt;</password>\n");
    expect(config).toContain("    <url>jdbc:postgresql://localhost:5432/shop_test</url>\n");
    expect(config).toContain(
      [
        "        <forcedType>",
        "          <userType>com.example.dbutils.shop.enums.OrderStatus</userType>",
        "          <converter>com.example.dbutils.shop.enums.converters.OrderStatusTypeConverter</converter>",
        "          <expression>orders\\.status</expression>",
        "        </forcedType>",
      ].join("\n")
    );
    expect(config).toContain("      <packageName>com.example.dbutils.shop.db</packageName>\n");
    expect(config).toContain("      <directory>/work/gen</directory>\n");
  });

  it("targets MySQL when asked to", () => {
    const files = renderArtifacts(
      shopModel(),
      templates,
      { packages, settings, codeDir: "/work/gen", jdbcDialect: "mysql" },
      meta
    );
    const config = files[2]?.contents ?? "";
    expect(config).toContain("<driver>com.mysql.cj.jdbc.Driver</driver>");
    expect(config).toContain("<inputSchema>shop_test</inputSchema>");
  });

  it("renders identical files for identical inputs", () => {
    expect(render()).toEqual(render());
  });
});

describe("templates", () => {
  it("names the template a loader could not read", async () => {
    const load = loadTemplates(async (name) => {
      if (name === "java_enum") throw new Error("missing");
      return "";
    });
    await expect(load).rejects.toThrow("Failed to render template java_enum: missing");
  });

  it("wraps engine errors", () => {
    const broken: TemplateSet = { java_enum: "{{#open}}", java_enum_converter: "", jooq_generator_config: "" };
    expect(() => renderTemplate(broken, "java_enum", {})).toThrow(TemplateRenderError);
  });

  it("leaves Java output unescaped", () => {
    const set: TemplateSet = { java_enum: "{{value}}", java_enum_converter: "", jooq_generator_config: "" };
    expect(renderTemplate(set, "java_enum", { value: "a<b>&c" })).toBe("a<b>&c");
    expect(escapeXml(`"it's"`)).toBe("&quot;it&apos;s&quot;");
  });
});
