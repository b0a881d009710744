// table.ts

import { diffTable } from "./migrations/diffTable.js";
import { tableExistsPlan } from "./migrations/introspect.js";
import { refreshPlan, savePlan } from "./persist.js";
import { Query } from "./query.js";
import { QueryBuilder } from "./query-builder.js";
import type { SchemaDiff } from "./migrations/diffTable.js";
import type { ModelDef } from "./model.js";
import type { Filters, Init, Mode, Out, Row } from "./model-types.js";
import type { SaveOptions } from "./persist.js";
import type { Strategy } from "./plan.js";
import type { Entity } from "./record.js";

/** A record type bound to a connection. */
export class Table<T, M extends Mode> {
  constructor(
    readonly model: ModelDef<T>,
    private readonly strategy: Strategy<M>
  ) {}

  get name(): string {
    return this.model.table;
  }

  query(where: Filters<T> = {}): Query<T, M> {
    return new Query(new QueryBuilder(this.model).filter(where), this.strategy);
  }

  /** New unsaved record. */
  create(init: Init<T> = {}): Entity<T> {
    return this.model.create(init);
  }

  hydrate(row: Row): Entity<T> {
    return this.model.hydrate(row);
  }

  /** Creates and inserts in one step, even when `pk` is given. */
  insert(init: Init<T> = {}): Out<M, Entity<T>> {
    return this.strategy.run(savePlan(this.model.create(init), { forceInsert: true }));
  }

  save(entity: Entity<T>, options: SaveOptions = {}): Out<M, Entity<T>> {
    return this.strategy.run(savePlan(entity, options));
  }

  refresh(entity: Entity<T>): Out<M, Entity<T>> {
    return this.strategy.run(refreshPlan(entity));
  }

  exists(): Out<M, boolean> {
    return this.strategy.run(tableExistsPlan(this.model.table));
  }

  /** What reconciling this table would do, without doing it. */
  schemaChanges(): Out<M, SchemaDiff> {
    return this.strategy.run(diffTable(this.model));
  }
}
