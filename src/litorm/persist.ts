// persist.ts

import { toRowId } from "./column.js";
import { NotFound } from "./errors.js";
import { statement } from "./plan.js";
import { QueryBuilder } from "./query-builder.js";
import { q } from "./sql/quote.js";
import type { PkValue, SqlValue } from "./model-types.js";
import type { Plan } from "./plan.js";
import type { Entity } from "./record.js";

export interface SaveOptions {
  /** INSERT even when the record already carries a primary key. */
  forceInsert?: boolean;
}

/** Storage values of every set, non-key field. */
function storageValues<T>(entity: Entity<T>): Map<string, SqlValue> {
  const values = new Map<string, SqlValue>();
  for (const [key, col] of entity.model.entries()) {
    if (key === entity.model.pkField) continue;
    const native = entity.read(key);
    if (native === undefined) continue;
    values.set(key, col.toStorage(native));
  }
  return values;
}

/** The engine only fills in the key when it is the rowid or a declared alias for it. */
function aliasesRowId<T>(entity: Entity<T>): boolean {
  const col = entity.model.column(entity.model.pkField);
  return col === undefined || col.primaryKey;
}

export function* insertPlan<T>(entity: Entity<T>): Plan<Entity<T>> {
  const model = entity.model;
  const pk = entity.pk;

  const values = new Map<string, SqlValue>();
  if (pk !== undefined) {
    const col = model.column(model.pkField);
    values.set(model.pkField, col ? col.toStorage(pk) : pk);
  }
  for (const [key, value] of storageValues(entity)) values.set(key, value);

  const table = q(model.table);
  const sql = values.size
    ? `INSERT INTO ${table} (${[...values.keys()].map(q).join(", ")}) VALUES (${[...values.keys()].map(() => "?").join(", ")})`
    : `INSERT INTO ${table} DEFAULT VALUES`;

  const cursor = yield* statement(sql, [...values.values()]);
  if (pk === undefined && cursor.lastInsertId !== null && aliasesRowId(entity)) {
    entity.pk = toRowId(cursor.lastInsertId);
  }
  return entity;
}

export function* updatePlan<T>(entity: Entity<T>, pk: PkValue): Plan<Entity<T>> {
  yield* new QueryBuilder(entity.model).byPk(pk).assignPlan(storageValues(entity));
  return entity;
}

/** INSERT when the record has no primary key (or when forced), otherwise UPDATE by key. */
export function* savePlan<T>(
  entity: Entity<T>,
  options: SaveOptions = {}
): Plan<Entity<T>> {
  const pk = entity.pk;
  if (pk === undefined || options.forceInsert) return yield* insertPlan(entity);
  return yield* updatePlan(entity, pk);
}

/** Replaces every field with what the engine holds for the record's key. */
export function* refreshPlan<T>(entity: Entity<T>): Plan<Entity<T>> {
  const pk = entity.pk;
  if (pk === undefined) {
    throw new NotFound(`${entity.model.name} has no primary key to refresh from.`);
  }

  const fresh = yield* new QueryBuilder(entity.model).byPk(pk).firstPlan(true);
  if (fresh === undefined) {
    throw new NotFound(`${entity.model.name} ${String(pk)} does not exist.`);
  }

  entity.fields = fresh.fields;
  entity.extra = fresh.extra;
  return entity;
}
