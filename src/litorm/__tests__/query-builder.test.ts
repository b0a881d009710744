import { describe, expect, it } from "vitest";

import { QueryBuilder } from "../query-builder.js";
import { Book, CustomKey, Fields } from "./fixtures.js";

describe("QueryBuilder SQL", () => {
  it("selects the rowid first when no key column is declared", () => {
    expect(new QueryBuilder(Book).toSelectSql()).toEqual({
      sql: 'SELECT "rowid", "name", "year" FROM "book"',
      params: [],
    });
  });

  it("uses the declared key column as-is", () => {
    expect(new QueryBuilder(CustomKey).filter({ pk: 13 }).toSelectSql()).toEqual({
      sql: 'SELECT "key", "label", "data" FROM "custom_key" WHERE "key" = ?',
      params: [13],
    });
  });

  it("combines filters, order and limit", () => {
    const query = new QueryBuilder(Book)
      .filter({ year: 2020 })
      .order("-year", "name", "bogus")
      .limit(5);

    expect(query.toSelectSql()).toEqual({
      sql: 'SELECT "rowid", "name", "year" FROM "book" WHERE "year" = ? ORDER BY "year" DESC, "name" LIMIT 5',
      params: [2020],
    });
  });

  it("selects only the requested fields", () => {
    expect(new QueryBuilder(Book).toSelectSql(["name"]).sql).toBe('SELECT "name" FROM "book"');
  });

  it("maps pk to rowid and later filters override earlier ones", () => {
    const query = new QueryBuilder(Book).filter({ pk: 3, year: 1 }).filter({ year: 2 });
    expect(query.toSelectSql()).toEqual({
      sql: 'SELECT "rowid", "name", "year" FROM "book" WHERE "rowid" = ? AND "year" = ?',
      params: [3, 2],
    });
  });

  it("ignores a null primary key filter", () => {
    expect(new QueryBuilder(Book).filter({ pk: null, year: 1 }).toSelectSql()).toEqual({
      sql: 'SELECT "rowid", "name", "year" FROM "book" WHERE "year" = ?',
      params: [1],
    });
  });

  it("converts filter values to storage form", () => {
    const query = new QueryBuilder(Fields).filter({ email: " A@B.C " });
    expect(query.toSelectSql().params).toEqual(["a@b.c"]);
  });

  it("never mutates the builder it refines", () => {
    const base = new QueryBuilder(Book);
    base.filter({ year: 2020 }).order("name").limit(1);
    expect(base.toSelectSql().sql).toBe('SELECT "rowid", "name", "year" FROM "book"');
  });

  it("rejects negative limits", () => {
    expect(() => new QueryBuilder(Book).limit(-1)).toThrow(RangeError);
  });

  it("counts with the same filters", () => {
    expect(new QueryBuilder(Book).filter({ year: 2020 }).toCountSql()).toEqual({
      sql: 'SELECT count(*) AS "count" FROM "book" WHERE "year" = ?',
      params: [2020],
    });
  });
});

describe("QueryBuilder updates", () => {
  it("drops unknown fields and reports them", () => {
    const values = { name: "x", bogus: 1 };
    const { assignments, dropped } = new QueryBuilder(Book).encodeUpdate(values);
    expect([...assignments]).toEqual([["name", "x"]]);
    expect(dropped).toEqual(["bogus"]);
  });

  it("updates every row when there are no filters", () => {
    const builder = new QueryBuilder(Book);
    expect(builder.toUpdateSql(new Map([["name", "x"]]))).toEqual({
      sql: 'UPDATE "book" SET "name" = ? WHERE 1 = 1',
      params: ["x"],
    });
  });

  it("binds assignments before filters", () => {
    const builder = new QueryBuilder(Book).filter({ year: 2019 });
    expect(builder.toUpdateSql(new Map([["name", "x"]]))).toEqual({
      sql: 'UPDATE "book" SET "name" = ? WHERE "year" = ?',
      params: ["x", 2019],
    });
  });
});
