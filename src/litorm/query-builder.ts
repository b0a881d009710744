// query-builder.ts

import { MultipleResults, NotFound } from "./errors.js";
import { isPkValue, isSqlValue } from "./model-types.js";
import { statement } from "./plan.js";
import { buildWhere } from "./sql/buildWhere.js";
import { q } from "./sql/quote.js";
import { logger } from "./utils/logger.js";
import type { ModelDef } from "./model.js";
import type { Filters, PkValue, Row, SqlValue } from "./model-types.js";
import type { Plan } from "./plan.js";
import type { Entity } from "./record.js";

export interface QueryState {
  readonly filters: ReadonlyMap<string, SqlValue>;
  readonly order: readonly string[];
  readonly limit: number | null;
}

export interface SqlStatement {
  sql: string;
  params: SqlValue[];
}

export interface ValuesOptions {
  /** Positional arrays instead of keyed objects. */
  lists?: boolean;
  /** One entry per value instead of one per row. */
  flat?: boolean;
}

export interface GetOptions<D> {
  default?: D;
  /** Throw unless exactly one row matches. */
  strict?: boolean;
}

const EMPTY_STATE: QueryState = {
  filters: new Map(),
  order: [],
  limit: null,
};

/**
 * Immutable query description plus the plans that run it. Refinements
 * return a new builder; nothing touches the engine until a plan is driven.
 */
export class QueryBuilder<T> {
  constructor(
    readonly model: ModelDef<T>,
    readonly state: QueryState = EMPTY_STATE
  ) {}

  private copy(patch: Partial<QueryState>): QueryBuilder<T> {
    return new QueryBuilder(this.model, { ...this.state, ...patch });
  }

  /* ---------- refinements ---------- */

  filter(where: Filters<T>): QueryBuilder<T> {
    const filters = new Map(this.state.filters);

    for (const [rawKey, raw] of Object.entries(where)) {
      const value: unknown = raw;
      if (value === undefined) continue;

      if (rawKey === "pk") {
        if (isPkValue(value)) filters.set(this.model.pkField, this.encodePk(value));
        continue;
      }

      const col = this.model.column(rawKey);
      if (col) filters.set(rawKey, col.toStorage(value));
      else if (isSqlValue(value)) filters.set(rawKey, value);
    }

    return this.copy({ filters });
  }

  /** Equality on the primary key, whatever it is called. */
  byPk(pk: PkValue): QueryBuilder<T> {
    const filters = new Map(this.state.filters);
    filters.set(this.model.pkField, this.encodePk(pk));
    return this.copy({ filters });
  }

  private encodePk(pk: PkValue): SqlValue {
    const col = this.model.column(this.model.pkField);
    return col ? col.toStorage(pk) : pk;
  }

  /** `"-name"` sorts descending; unknown fields are dropped. */
  order(...fields: string[]): QueryBuilder<T> {
    return this.copy({ order: fields });
  }

  limit(n: number | null): QueryBuilder<T> {
    if (n !== null && (!Number.isInteger(n) || n < 0)) {
      throw new RangeError(`limit must be a non-negative integer, got ${n}.`);
    }
    return this.copy({ limit: n });
  }

  /* ---------- SQL ---------- */

  /** Primary key first when it is not a declared column, then every declared column. */
  defaultFields(): string[] {
    const names: string[] = this.model.fieldNames();
    return names.includes(this.model.pkField)
      ? names
      : [this.model.pkField, ...names];
  }

  private orderClause(): string {
    const terms: string[] = [];
    for (const field of this.state.order) {
      const desc = field.startsWith("-");
      const name = desc ? field.slice(1) : field;
      if (!this.model.isField(name) && name !== this.model.pkField) continue;
      terms.push(desc ? `${q(name)} DESC` : q(name));
    }
    return terms.join(", ");
  }

  private whereClause(): SqlStatement {
    const where = buildWhere(this.state.filters);
    return { sql: where.sql ? ` WHERE ${where.sql}` : "", params: where.params };
  }

  toSelectSql(fields: readonly string[] = []): SqlStatement {
    const list = fields.length ? fields : this.defaultFields();
    const where = this.whereClause();

    let sql = `SELECT ${list.map(q).join(", ")} FROM ${q(this.model.table)}${where.sql}`;
    const order = this.orderClause();
    if (order) sql += ` ORDER BY ${order}`;
    if (this.state.limit !== null) sql += ` LIMIT ${this.state.limit}`;

    return { sql, params: where.params };
  }

  toCountSql(): SqlStatement {
    const where = this.whereClause();
    return {
      sql: `SELECT count(*) AS "count" FROM ${q(this.model.table)}${where.sql}`,
      params: where.params,
    };
  }

  /** Converts update values; names that are not declared columns come back in `dropped`. */
  encodeUpdate(values: Partial<T>): {
    assignments: Map<string, SqlValue>;
    dropped: string[];
  } {
    const assignments = new Map<string, SqlValue>();
    const dropped: string[] = [];

    for (const [key, raw] of Object.entries(values)) {
      const value: unknown = raw;
      if (value === undefined) continue;
      const col = this.model.column(key);
      if (col) assignments.set(key, col.toStorage(value));
      else dropped.push(key);
    }

    return { assignments, dropped };
  }

  toUpdateSql(assignments: ReadonlyMap<string, SqlValue>): SqlStatement {
    const sets: string[] = [];
    const params: SqlValue[] = [];
    for (const [key, value] of assignments) {
      sets.push(`${q(key)} = ?`);
      params.push(value);
    }

    const where = buildWhere(this.state.filters);
    return {
      sql: `UPDATE ${q(this.model.table)} SET ${sets.join(", ")} WHERE ${where.sql || "1 = 1"}`,
      params: [...params, ...where.params],
    };
  }

  /* ===================================================== */
  /* PLANS                                                 */
  /* ===================================================== */

  *rowsPlan(fields: readonly string[] = []): Plan<Row[]> {
    const { sql, params } = this.toSelectSql(fields);
    const cursor = yield* statement(sql, params);
    return cursor.rows;
  }

  *entitiesPlan(): Plan<Entity<T>[]> {
    const rows = yield* this.rowsPlan();
    return rows.map((row) => this.model.hydrate(row));
  }

  *countPlan(): Plan<number> {
    const { sql, params } = this.toCountSql();
    const cursor = yield* statement(sql, params);
    return Number(cursor.rows[0]?.count ?? 0);
  }

  *updatePlan(values: Partial<T>): Plan<number> {
    const { assignments, dropped } = this.encodeUpdate(values);
    for (const key of dropped) {
      logger.warn("UPDATE", "Ignored unknown field", `${this.model.table}.${key}`);
    }
    return yield* this.assignPlan(assignments);
  }

  /** Zero assignments execute nothing. */
  *assignPlan(assignments: ReadonlyMap<string, SqlValue>): Plan<number> {
    if (assignments.size === 0) return 0;
    const { sql, params } = this.toUpdateSql(assignments);
    const cursor = yield* statement(sql, params);
    return cursor.rowCount;
  }

  *valuesPlan(fields: readonly string[], options: ValuesOptions = {}): Plan<unknown[]> {
    const rows = yield* this.rowsPlan(fields);
    const out: unknown[] = [];

    for (const row of rows) {
      const decoded = this.model.decode(row);
      if (options.lists && options.flat) out.push(...Object.values(decoded));
      else if (options.lists) out.push(Object.values(decoded));
      else if (options.flat) {
        for (const [key, value] of Object.entries(decoded)) out.push({ [key]: value });
      } else out.push(decoded);
    }

    return out;
  }

  /** First of at most two matches; strict mode demands exactly one. */
  *firstPlan(strict = false): Plan<Entity<T> | undefined> {
    const found: Entity<T>[] = yield* this.limit(2).entitiesPlan();

    if (strict && found.length === 0) {
      throw new NotFound(`${this.model.name} matching query does not exist.`);
    }
    if (strict && found.length > 1) {
      throw new MultipleResults(`More than one ${this.model.name} matches the query.`);
    }
    return found[0];
  }

  /** The first match, or one of its fields; the default stands in for a missing row or value. */
  *getPlan(field: string | undefined, options: GetOptions<unknown> = {}): Plan<unknown> {
    const first = yield* this.firstPlan(options.strict);
    if (first === undefined) return options.default;
    if (field === undefined) return first;

    const value = first.read(field === "pk" ? this.model.pkField : field);
    return value === undefined ? options.default : value;
  }
}
