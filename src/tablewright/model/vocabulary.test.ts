import { describe, expect, it } from "vitest";

import { ConfigurationError } from "./errors.js";
import { newModel } from "../testing/fixtures.js";

describe("createVocabulary", () => {
  it("exposes declared enums and table namespaces by name", () => {
    const { v } = newModel();
    const Color = v.Enum("Color", "Red", "Green");
    v.Table("items", v.Column("id", v.Integer), v.Column("color", Color));

    expect(v.enums.Color).toBe(Color);
    expect(v.tables.items?.ref("color")).toBe("items.color");
    expect(() => v.enums.Missing).toThrow("Unknown enum Missing");
  });

  it("keeps the lookups read-only", () => {
    const { v } = newModel();
    expect(() => {
      Reflect.set(v.enums, "Color", 1);
    }).toThrow(ConfigurationError);
  });

  it("builds stored procedures from their parts", () => {
    const { metadata, v } = newModel();
    v.StoredProcedure(
      "topic_counter",
      v.ProcParam("total", "BIGINT", v.OUT),
      v.ProcComment("Count the topics"),
      v.ProcSqlBody(`
        SELECT COUNT(*) INTO total FROM topic;
      `)
    );
    const [proc] = metadata.procedures;
    expect(proc?.params.map((p) => p.sql)).toEqual(["OUT total BIGINT"]);
    expect(proc?.comment).toBe("Count the topics");
    expect(proc?.body).toBe("SELECT COUNT(*) INTO total FROM topic;");
  });

  it("rejects unknown parameter directions and missing bodies", () => {
    const { v } = newModel();
    expect(() => v.ProcParam("x", "INT", "SIDEWAYS")).toThrow('Invalid direction "SIDEWAYS" for parameter x');
    expect(() => v.StoredProcedure("empty", v.ProcComment("nothing"))).toThrow(
      "Procedure empty needs a ProcSqlBody"
    );
  });
});
