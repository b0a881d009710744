// model.ts

import { DescriptorError } from "./errors.js";
import { isPkValue } from "./model-types.js";
import { Entity } from "./record.js";
import { snake } from "./utils/snake.js";
import type { Column } from "./column.js";
import type { Columns, FieldName, Init, Row } from "./model-types.js";

/** What schema work needs to know about a record type, independent of its field types. */
export interface ModelShape {
  readonly name: string;
  readonly table: string;
  readonly pkField: string;
  entries(): Array<[string, Column<unknown>]>;
  column(key: string): Column<unknown> | undefined;
}

export interface ModelConfig<T> {
  /** Defaults to the snake_cased model name. */
  table?: string;
  /** Names the primary-key field when no column is declared as one. */
  primaryKey?: string;
  columns: Columns<T>;
}

export class ModelDef<T> implements ModelShape {
  readonly name: string;
  readonly table: string;
  readonly pkField: string;
  readonly columns: Columns<T>;

  constructor(name: string, config: ModelConfig<T>) {
    this.name = name;
    this.table = config.table ?? snake(name);
    this.columns = Object.freeze({ ...config.columns });

    const declared = this.entries()
      .filter(([, col]) => col.primaryKey)
      .map(([key]) => key);

    if (declared.length > 1) {
      throw new DescriptorError(
        `${name} declares more than one primary key: ${declared.join(", ")}.`
      );
    }

    this.pkField = config.primaryKey ?? declared[0] ?? "rowid";
    if (this.pkField !== "rowid" && !this.isField(this.pkField)) {
      throw new DescriptorError(
        `${name} names "${this.pkField}" as its primary key but declares no such column.`
      );
    }

    Object.freeze(this);
  }

  isField(key: string): key is FieldName<T> {
    return Object.prototype.hasOwnProperty.call(this.columns, key);
  }

  fieldNames(): FieldName<T>[] {
    return Object.keys(this.columns).filter((key): key is FieldName<T> =>
      this.isField(key)
    );
  }

  entries(): Array<[string, Column<unknown>]> {
    return this.fieldNames().map((key): [string, Column<unknown>] => [
      key,
      this.columns[key],
    ]);
  }

  column(key: string): Column<unknown> | undefined {
    return this.isField(key) ? this.columns[key] : undefined;
  }

  create(init: Init<T> = {}): Entity<T> {
    const source: Partial<T> = init;
    const fields: Partial<T> = {};
    for (const key of this.fieldNames()) {
      if (source[key] !== undefined) fields[key] = source[key];
    }

    const entity = new Entity(this, fields);
    const pk: unknown = init.pk;
    if (isPkValue(pk)) entity.pk = pk;
    return entity;
  }

  /** Builds a record from a result row, converting declared columns to native values. */
  hydrate(row: Row): Entity<T> {
    const fields: Partial<T> = {};
    const extra: Row = {};

    for (const [key, stored] of Object.entries(row)) {
      if (this.isField(key)) fields[key] = this.columns[key].toNative(stored);
      else extra[key] = stored;
    }

    return new Entity(this, fields, extra);
  }

  /** Row with declared columns converted, everything else passed through. */
  decode(row: Row): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, stored] of Object.entries(row)) {
      const col = this.column(key);
      out[key] = col ? col.toNative(stored) : stored;
    }
    return out;
  }
}

export function defineModel<T>(name: string, config: ModelConfig<T>): ModelDef<T> {
  return new ModelDef(name, config);
}

export function isModel(value: unknown): value is ModelDef<unknown> {
  return value instanceof ModelDef;
}

/** Native field shape of a model: `type Book = FieldsOf<typeof BookModel>`. */
export type FieldsOf<D> = D extends ModelDef<infer T> ? T : never;
