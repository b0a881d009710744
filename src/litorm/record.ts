// record.ts

import { isPkValue } from "./model-types.js";
import type { ModelDef } from "./model.js";
import type { FieldName, PkValue, Row } from "./model-types.js";

/**
 * One row of a record type. Declared columns live in `fields`; anything
 * else the engine returned (rowid, undeclared columns) lands in `extra`.
 */
export class Entity<T> {
  fields: Partial<T>;
  extra: Row;

  constructor(readonly model: ModelDef<T>, fields: Partial<T> = {}, extra: Row = {}) {
    this.fields = fields;
    this.extra = extra;
  }

  /** Value of the primary-key field, whatever it is called. */
  get pk(): PkValue | undefined {
    const value = this.read(this.model.pkField);
    return isPkValue(value) ? value : undefined;
  }

  set pk(value: PkValue | undefined) {
    const key = this.model.pkField;
    if (this.model.isField(key)) {
      this.fields[key] =
        value === undefined ? undefined : this.model.columns[key].toNative(value);
    } else if (value === undefined) {
      delete this.extra[key];
    } else {
      this.extra[key] = value;
    }
  }

  get<K extends FieldName<T>>(key: K): T[K] | undefined {
    return this.fields[key];
  }

  set<K extends FieldName<T>>(key: K, value: T[K]): this {
    this.fields[key] = value;
    return this;
  }

  /** Declared field or extra value by name. */
  read(key: string): unknown {
    if (this.model.isField(key)) return this.fields[key];
    return this.extra[key];
  }

  toJSON(): Record<string, unknown> {
    return { ...this.extra, ...this.fields };
  }
}
