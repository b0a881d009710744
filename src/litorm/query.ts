// query.ts

import { QueryBuilder } from "./query-builder.js";
import type { GetOptions, ValuesOptions } from "./query-builder.js";
import type { Filters, FieldName, Mode, Out, Stream } from "./model-types.js";
import type { Strategy } from "./plan.js";
import type { Entity } from "./record.js";

/** A query bound to a connection; terminal operations run in the connection's mode. */
export class Query<T, M extends Mode> {
  constructor(
    readonly builder: QueryBuilder<T>,
    private readonly strategy: Strategy<M>
  ) {}

  private wrap(builder: QueryBuilder<T>): Query<T, M> {
    return new Query(builder, this.strategy);
  }

  filter(where: Filters<T>): Query<T, M> {
    return this.wrap(this.builder.filter(where));
  }

  order(...fields: string[]): Query<T, M> {
    return this.wrap(this.builder.order(...fields));
  }

  limit(n: number | null): Query<T, M> {
    return this.wrap(this.builder.limit(n));
  }

  /* ---------- terminal ---------- */

  /** Lazy; each iteration runs the SELECT again. */
  records(): Stream<M, Entity<T>> {
    return this.strategy.stream(() => this.builder.entitiesPlan());
  }

  all(): Out<M, Entity<T>[]> {
    return this.strategy.run(this.builder.entitiesPlan());
  }

  count(): Out<M, number> {
    return this.strategy.run(this.builder.countPlan());
  }

  /** Returns the number of rows changed. With no filters every row is updated. */
  update(values: Partial<T>): Out<M, number> {
    return this.strategy.run(this.builder.updatePlan(values));
  }

  values(): Out<M, Partial<T>[]>;
  values<F extends FieldName<T>>(
    fields: readonly F[],
    options?: { lists?: false; flat?: false }
  ): Out<M, Pick<T, F>[]>;
  values<F extends FieldName<T>>(
    fields: readonly F[],
    options: { lists: true; flat?: false }
  ): Out<M, T[F][][]>;
  values<F extends FieldName<T>>(
    fields: readonly F[],
    options: { lists: true; flat: true }
  ): Out<M, T[F][]>;
  values<F extends FieldName<T>>(
    fields: readonly F[],
    options: { lists?: false; flat: true }
  ): Out<M, Partial<Pick<T, F>>[]>;
  values(fields: readonly string[] = [], options: ValuesOptions = {}): Out<M, unknown[]> {
    return this.strategy.run(this.builder.valuesPlan(fields, options));
  }

  get(options?: GetOptions<Entity<T>>): Out<M, Entity<T> | undefined>;
  get<F extends FieldName<T> | "pk">(
    field: F,
    options?: GetOptions<FieldValue<T, F>>
  ): Out<M, FieldValue<T, F> | undefined>;
  get(
    fieldOrOptions?: string | GetOptions<unknown>,
    options: GetOptions<unknown> = {}
  ): Out<M, unknown> {
    if (typeof fieldOrOptions === "string") {
      return this.strategy.run(this.builder.getPlan(fieldOrOptions, options));
    }
    return this.strategy.run(this.builder.getPlan(undefined, fieldOrOptions));
  }
}

type FieldValue<T, F> = F extends keyof T ? T[F] : unknown;
