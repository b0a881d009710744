// model-types.ts

import type { Column } from "./column.js";

/** Values the engine stores and returns. */
export type SqlValue = string | number | bigint | Buffer | null;

/** One result row, keyed by column name. */
export type Row = Record<string, SqlValue>;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Literal defaults are embedded verbatim; generators run when DDL is built. */
export type ColumnDefault = string | number | (() => string | number);

export interface ColumnOptions {
  unique?: boolean;
  notNull?: boolean;
  primaryKey?: boolean;
  default?: ColumnDefault;
}

/** Two-way mapping between a native value and what the engine stores. */
export interface Codec<N> {
  toNative(stored: SqlValue): N;
  toStorage(native: N): SqlValue;
}

/* ===================================================== */
/* RECORD SHAPES                                         */
/* ===================================================== */

export type Columns<T> = { [K in keyof T]: Column<T[K]> };

export type FieldName<T> = Extract<keyof T, string>;

export type PkValue = number | bigint | string;

/** Field values for a new record; `pk` aliases the primary-key field. */
export type Init<T> = Partial<T> & { pk?: PkValue | null };

/** Equality filters; `pk` aliases the primary-key field and is ignored when null. */
export type Filters<T> = Partial<T> & { pk?: PkValue | null };

/* ===================================================== */
/* EXECUTION MODES                                       */
/* ===================================================== */

export type Mode = "sync" | "async";

/** What an operation hands back in mode M. */
export type Out<M extends Mode, T> = M extends "async" ? Promise<T> : T;

export type Stream<M extends Mode, T> = M extends "async"
  ? AsyncIterable<T>
  : Iterable<T>;

export function isSqlValue(value: unknown): value is SqlValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    Buffer.isBuffer(value)
  );
}

export function isPkValue(value: unknown): value is PkValue {
  return (
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "string"
  );
}
