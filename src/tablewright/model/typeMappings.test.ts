import { describe, expect, it } from "vitest";

import { ConfigurationError } from "./errors.js";
import { enumUsage, getTypeMappings, parseTypeFamilies } from "./typeMappings.js";
import { newModel } from "../testing/fixtures.js";

function model() {
  const { metadata, v } = newModel();
  v.Schema("Catalog");
  const Color = v.Enum("Color", "Red", "Green");
  const Size = v.Enum("Size", "S", "M");
  v.Enum("Unused", "X");
  v.Table(
    "shirts",
    v.Column("size", Size),
    v.Column("color", Color),
    v.Column("active", v.Bool),
    v.Column("hash", v.Binary(16)),
    v.Column("blob", v.VarBinary(16))
  );
  v.Table("boots", v.Column("color", Color), v.Column("name", v.Varchar(40)));
  return metadata;
}

describe("getTypeMappings", () => {
  it("maps enum and boolean columns by default, sorted by table and column", () => {
    const mappings = getTypeMappings(model());
    expect(Object.keys(mappings)).toEqual(["boots", "shirts"]);
    expect(mappings).toEqual({
      boots: { color: "Color" },
      shirts: { active: "BOOLEAN", color: "Color", size: "Size" },
    });
    expect(Object.keys(mappings.shirts ?? {})).toEqual(["active", "color", "size"]);
  });

  it("includes fixed-width binaries only when asked", () => {
    expect(getTypeMappings(model(), ["binary"])).toEqual({ shirts: { hash: "BINARY" } });
  });

  it("parses family names", () => {
    expect(parseTypeFamilies(["Enum", " binary "])).toEqual(["enum", "binary"]);
    expect(() => parseTypeFamilies(["dates"])).toThrow(ConfigurationError);
  });
});

describe("enumUsage", () => {
  it("lists the columns of every enum", () => {
    expect([...enumUsage(model())]).toEqual([
      ["Color", ["shirts.color", "boots.color"]],
      ["Size", ["shirts.size"]],
      ["Unused", []],
    ]);
  });
});
