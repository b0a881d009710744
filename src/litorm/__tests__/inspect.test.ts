import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { NotFound } from "../errors.js";
import { Litorm } from "../litorm.js";

let orm: Litorm<"sync">;

beforeEach(() => {
  orm = Litorm.open();
  orm.connection.exec(`
    create table people (
      pid integer primary key,
      name text not null,
      age int default 0,
      height real default 0.0,
      profile text)
  `);
  orm.connection.exec(`
    insert into people (pid, name, age, height, profile) values
      (1, 'Dan', 38, 72.0, 'hello world'),
      (4, 'Alexa', 37, 62.5, 'leave me out of this')
  `);
});

afterEach(() => {
  orm.close();
});

describe("inspect", () => {
  it("binds a record type to an existing table", () => {
    const people = orm.inspect("people", "Person");
    expect(people.model.name).toBe("Person");
    expect(people.model.pkField).toBe("pid");
    expect(people.query().count()).toBe(2);
    expect(people.query({ pk: 4 }).get("name")).toBe("Alexa");
  });

  it("mirrors the live column definitions", () => {
    const people = orm.inspect("people");
    expect(people.model.entries().map(([name, col]) => col.typedef(name))).toEqual([
      '"pid" integer PRIMARY KEY',
      '"name" text NOT NULL',
      '"age" int DEFAULT 0',
      '"height" real DEFAULT 0.0',
      '"profile" text',
    ]);
    expect(people.schemaChanges()).toEqual({ table: "people", statements: [], warnings: [] });
  });

  it("inserts with the engine assigning the key", () => {
    const people = orm.inspect("people");
    const sam = people.insert({ name: "Sam" });
    expect(sam.pk).toBe(5);
    expect(people.query({ pk: 5 }).get("age")).toBe(0);
  });

  it("leaves a key the engine does not fill to the caller", () => {
    orm.connection.exec("create table tags (code int primary key, label text)");
    const tags = orm.inspect("tags");
    expect(tags.model.pkField).toBe("code");
    expect(tags.model.column("code")?.primaryKey).toBe(false);
    expect(tags.insert({ label: "loose" }).pk).toBeUndefined();
    expect(tags.insert({ pk: 7, label: "set" }).pk).toBe(7);
    expect(tags.query({ pk: 7 }).get("label")).toBe("set");
  });

  it("fails for a missing table", () => {
    expect(() => orm.inspect("nobody")).toThrow(NotFound);
  });
});
