import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { Integer } from "../column.js";
import { MultipleResults, NotFound, UnboundModelError } from "../errors.js";
import { Litorm } from "../litorm.js";
import { defineModel } from "../model.js";
import { Book, CustomKey, Fields } from "./fixtures.js";

function open() {
  const orm = Litorm.open();
  const books = orm.bind(Book);
  const keys = orm.bind(CustomKey);
  const fields = orm.bind(Fields);
  orm.reconcile();
  return { orm, books, keys, fields };
}

let db: ReturnType<typeof open>;

beforeEach(() => {
  db = open();
});

afterEach(() => {
  db.orm.close();
});

describe("record lifecycle", () => {
  it("inserts, saves and refreshes", () => {
    const { books } = db;
    const book = books.insert({ name: "First Book", year: 2019 });
    expect(book.pk).toBe(1);

    book.set("year", 2020);
    books.refresh(books.save(book));
    expect(book.get("year")).toBe(2020);
    expect(book.get("name")).toBe("First Book");
  });

  it("inserts unsaved records through save", () => {
    const { books } = db;
    const book = books.create({ name: "Draft" });
    expect(book.pk).toBeUndefined();
    books.save(book);
    expect(book.pk).toBe(1);
    expect(books.query().count()).toBe(1);
  });

  it("forces an insert when asked", () => {
    const { books } = db;
    const book = books.create({ pk: 7, name: "Seven" });
    books.save(book, { forceInsert: true });
    expect(books.query({ pk: 7 }).get("name")).toBe("Seven");
  });

  it("inserts default values when nothing is set", () => {
    const { books } = db;
    const book = books.refresh(books.insert());
    expect(book.pk).toBe(1);
    expect(book.get("name")).toBe("");
    expect(book.get("year")).toBeNull();
  });

  it("cannot refresh a record without a key", () => {
    const { books } = db;
    expect(() => books.refresh(books.create({ name: "x" }))).toThrow(NotFound);
  });

  it("serializes declared fields and extras", () => {
    const { books } = db;
    const book = books.refresh(books.insert({ name: "A", year: 1 }));
    expect(book.toJSON()).toEqual({ rowid: 1, name: "A", year: 1 });
  });
});

describe("queries", () => {
  it("gets single records and fields", () => {
    const { books } = db;
    expect(books.query({ pk: 1 }).get()).toBeUndefined();
    expect(() => books.query({ pk: 1 }).get({ strict: true })).toThrow(NotFound);

    books.insert({ name: "First Book", year: 2019 });
    expect(books.query({ name: "First Book" }).get("year")).toBe(2019);
    expect(books.query({ name: "Missing" }).get("year", { default: 1999 })).toBe(1999);

    books.insert({ name: "Second Book", year: 2019 });
    expect(() => books.query({ year: 2019 }).get({ strict: true })).toThrow(MultipleResults);
    expect(books.query({ year: 2019 }).order("-name").get("name")).toBe("Second Book");
  });

  it("keeps an explicit primary key and rejects duplicates", () => {
    const { books } = db;
    const book = books.refresh(books.insert({ pk: 999, name: "Some Book", year: 2019 }));
    expect(book.pk).toBe(999);
    expect(() => books.insert({ pk: 999, name: "Another Book", year: 2019 })).toThrow(
      /UNIQUE constraint failed/
    );
  });

  it("orders, counts and projects values", () => {
    const { books } = db;
    books.insert({ name: "1 Bourbon", year: 2020 });
    books.insert({ name: "1 Scotch", year: 2020 });
    books.insert({ name: "1 Beer", year: 2021 });

    expect(books.query({ year: 2020 }).count()).toBe(2);
    expect(
      books.query().order("-year", "name").values(["name"], { lists: true, flat: true })
    ).toEqual(["1 Beer", "1 Bourbon", "1 Scotch"]);
    expect(books.query({ year: 2020 }).order("-name").values(["name"])).toEqual([
      { name: "1 Scotch" },
      { name: "1 Bourbon" },
    ]);
    expect(
      books.query({ year: 2020 }).order("name").values(["name", "year"], { lists: true })
    ).toEqual([
      ["1 Bourbon", 2020],
      ["1 Scotch", 2020],
    ]);
    expect(books.query({ year: 2021 }).values(["name", "year"], { flat: true })).toEqual([
      { name: "1 Beer" },
      { year: 2021 },
    ]);
    expect(books.query().order("name").limit(1).values()).toEqual([
      { rowid: 3, name: "1 Beer", year: 2021 },
    ]);
  });

  it("updates matching rows and reports the count", () => {
    const { books } = db;
    books.insert({ name: "A", year: 2019 });
    books.insert({ name: "B", year: 2020 });

    expect(books.query({ year: 2019 }).update({ name: "A2" })).toBe(1);
    expect(books.query().update({ year: 2000 })).toBe(2);
    expect(books.query().update({})).toBe(0);
    expect(books.query().order("name").values(["name", "year"], { lists: true })).toEqual([
      ["A2", 2000],
      ["B", 2000],
    ]);
  });

  it("streams records lazily and restartably", () => {
    const { books } = db;
    const stream = books.query().order("name").records();
    books.insert({ name: "b" });
    books.insert({ name: "a" });

    expect([...stream].map((b) => b.get("name"))).toEqual(["a", "b"]);
    books.insert({ name: "c" });
    expect([...stream].map((b) => b.get("name"))).toEqual(["a", "b", "c"]);
    expect(books.query().all()).toHaveLength(3);
  });
});

describe("column kinds", () => {
  it("uses a declared key column as the primary key", () => {
    const { keys } = db;
    const obj = keys.insert({ pk: 13, label: "Lucky 13" });
    expect(obj.pk).toBe(13);
    expect(obj.get("key")).toBe(13);
  });

  it("back-fills a declared key and refreshes by it", () => {
    const { keys } = db;
    const first = keys.insert({ label: "one" });
    const second = keys.insert({ label: "two" });
    expect([first.pk, second.pk]).toEqual([1, 2]);
    expect(second.get("key")).toBe(2);
    expect(keys.refresh(second).get("label")).toBe("two");
    expect(keys.query({ pk: 2 }).count()).toBe(1);
  });

  it("keeps a large key as bigint", () => {
    const { keys } = db;
    const big = keys.create({ pk: 2n ** 60n, label: "big" });
    expect(big.pk).toBe(2n ** 60n);
    expect(big.get("key")).toBe(2n ** 60n);
    keys.insert({ pk: 2n ** 60n, label: "big" });
    expect(keys.query({ pk: 2n ** 60n }).get("label")).toBe("big");
  });

  it("stores binary data unchanged", () => {
    const { keys } = db;
    const data = Buffer.from(Array.from({ length: 256 }, (_, i) => i));
    const obj = keys.refresh(keys.insert({ pk: 13, label: "Lucky 13", data }));
    expect(obj.get("data")).toEqual(data);
    expect(keys.query({ pk: 13 }).get("data")).toEqual(data);
  });

  it("stores JSON documents", () => {
    const { fields } = db;
    const doc = { hello: { world: 123, test: [1, 2, "hi"] } };
    const obj = fields.refresh(fields.insert({ pk: 28, json: doc }));
    expect(obj.get("json")).toEqual(doc);
    expect(fields.query().get("json")).toEqual(doc);
    expect(fields.query().values(["json"], { lists: true, flat: true })).toEqual([doc]);

    fields.query().update({ json: [1, 2, 3] });
    expect(fields.query().get("json")).toEqual([1, 2, 3]);
  });

  it("normalizes email and defaults JSON to an empty object", () => {
    const { fields } = db;
    const obj = fields.refresh(fields.insert({ pk: 29, email: "  Dan.Watson@example.COM  " }));
    expect(obj.get("email")).toBe("dan.watson@example.com");
    expect(obj.get("json")).toEqual({});
  });
});

describe("binding", () => {
  it("reports whether a table exists", () => {
    const { orm, books } = db;
    expect(books.exists()).toBe(true);
    const ghost = orm.bind(defineModel("Ghost", { columns: { a: Integer } }));
    expect(ghost.exists()).toBe(false);
  });

  it("refuses models that were never bound", () => {
    const { orm } = db;
    const other = defineModel("Other", { columns: { a: Integer } });
    expect(() => orm.table(other)).toThrow(UnboundModelError);
    expect(orm.table(Book).name).toBe("book");
  });
});
