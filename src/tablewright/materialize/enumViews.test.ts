import { describe, expect, it } from "vitest";

import { buildEnumViews, joinAlias } from "./enumViews.js";
import { newModel } from "../testing/fixtures.js";

describe("buildEnumViews", () => {
  it("joins a lookup table once per enum column, each under its own alias", () => {
    const { metadata, v } = newModel();
    v.Schema("Logistics");
    const Status = v.Enum("Status", "Open", "Closed");
    const Size = v.Enum("Size", "S", "L");
    v.Table(
      "shipments",
      v.Column("id", v.Integer, { primaryKey: true }),
      v.Column("to_status", Status),
      v.Column("size", Size),
      v.Column("from_status", Status)
    );
    v.Table("plain", v.Column("id", v.Integer, { primaryKey: true }));

    const views = buildEnumViews(metadata.snapshot());

    expect(views).toEqual([
      {
        name: "enumed_shipments_view",
        table: "shipments",
        sql:
          'CREATE OR REPLACE VIEW "enumed_shipments_view" AS SELECT "shipments".*, ' +
          '"from_status_lookup"."name" AS "from_status_name", ' +
          '"size_lookup"."name" AS "size_name", ' +
          '"to_status_lookup"."name" AS "to_status_name" ' +
          'FROM "shipments" ' +
          'LEFT JOIN "enum_status" AS "from_status_lookup" ' +
          'ON "shipments"."from_status" = "from_status_lookup"."value" ' +
          'LEFT JOIN "enum_size" AS "size_lookup" ON "shipments"."size" = "size_lookup"."value" ' +
          'LEFT JOIN "enum_status" AS "to_status_lookup" ' +
          'ON "shipments"."to_status" = "to_status_lookup"."value"',
      },
    ]);
  });

  it("keeps joins apart when another enum's table looks like a numbered alias", () => {
    const { metadata, v } = newModel();
    v.Schema("Clash");
    const Status = v.Enum("Status", "Open", "Closed");
    const Status2 = v.Enum("Status_2", "A", "B");
    v.Table("t", v.Column("a", Status), v.Column("b", Status), v.Column("c", Status2));

    const [view] = buildEnumViews(metadata.snapshot());

    expect(view?.sql).toBe(
      'CREATE OR REPLACE VIEW "enumed_t_view" AS SELECT "t".*, ' +
        '"a_lookup"."name" AS "a_name", "b_lookup"."name" AS "b_name", "c_lookup"."name" AS "c_name" ' +
        'FROM "t" ' +
        'LEFT JOIN "enum_status" AS "a_lookup" ON "t"."a" = "a_lookup"."value" ' +
        'LEFT JOIN "enum_status" AS "b_lookup" ON "t"."b" = "b_lookup"."value" ' +
        'LEFT JOIN "enum_status_2" AS "c_lookup" ON "t"."c" = "c_lookup"."value"'
    );
  });

  it("steps around a base table named like an alias", () => {
    expect(joinAlias("kind_lookup", "kind")).toBe("kind_lookup_2");
    expect(joinAlias("orders", "kind")).toBe("kind_lookup");
  });

  it("orders views by table name", () => {
    const { metadata, v } = newModel();
    v.Schema("Two");
    const Flag = v.Enum("Flag", "Off", "On");
    v.Table("zebra", v.Column("flag", Flag));
    v.Table("apple", v.Column("flag", Flag));

    expect(buildEnumViews(metadata.snapshot()).map((view) => view.name)).toEqual([
      "enumed_apple_view",
      "enumed_zebra_view",
    ]);
  });
});
