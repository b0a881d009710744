// litorm.ts

import { basename, resolve } from "node:path";

import { NotFound } from "./errors.js";
import { Executor, connect } from "./executor.js";
import { migratePlan, MigrationLedger } from "./migrations/ledger.js";
import { loadMigrations } from "./migrations/loadMigrations.js";
import { modelFromLive, tableInfoPlan } from "./migrations/introspect.js";
import { schemaChangesPlan, tableMigrations } from "./migrations/tableMigrations.js";
import { writeMigration } from "./migrations/writeMigration.js";
import { DeferredStrategy, DirectStrategy, task } from "./plan.js";
import { TableRegistry } from "./registry.js";
import { Table } from "./table.js";
import { logger } from "./utils/logger.js";
import type { ConnectOptions, Connection } from "./executor.js";
import type { SchemaDiff } from "./migrations/diffTable.js";
import type { MigrationScript } from "./migrations/ledger.js";
import type { ModelDef, ModelShape } from "./model.js";
import type { Mode, Out, Row } from "./model-types.js";
import type { Plan, Strategy } from "./plan.js";

export interface GenerateOptions {
  /** Write a script even when there is nothing to change. */
  force?: boolean;
  now?: Date;
}

/** Migration group for a script directory: its base name. */
export function groupOf(dir: string): string {
  return basename(resolve(dir));
}

/**
 * One connection and the record types bound to it. In "sync" mode every
 * operation returns its result; in "async" mode it returns a promise and
 * statements run one at a time off the caller's stack.
 */
export class Litorm<M extends Mode> {
  readonly registry = new TableRegistry();

  constructor(readonly strategy: Strategy<M>) {}

  /** --------------------------------------------------
   * Connections
   * -------------------------------------------------- */
  static open(path = ":memory:", options: ConnectOptions = {}): Litorm<"sync"> {
    return new Litorm(new DirectStrategy(new Executor(connect(path, options))));
  }

  static openAsync(path = ":memory:", options: ConnectOptions = {}): Litorm<"async"> {
    return new Litorm(new DeferredStrategy(new Executor(connect(path, options))));
  }

  get mode(): M {
    return this.strategy.mode;
  }

  /** The underlying better-sqlite3 handle. */
  get connection(): Connection {
    return this.strategy.executor.connection;
  }

  /** Waits for queued work, then closes the connection. */
  close(): Out<M, void> {
    const executor = this.strategy.executor;
    return this.strategy.run(task("close", () => executor.close()));
  }

  /** --------------------------------------------------
   * Binding
   * -------------------------------------------------- */
  register(...models: ModelShape[]): this {
    for (const model of models) this.registry.register(model);
    return this;
  }

  bind<T>(model: ModelDef<T>): Table<T, M> {
    this.registry.register(model);
    return new Table(model, this.strategy);
  }

  /** Handle for a model already bound here. */
  table<T>(model: ModelDef<T>): Table<T, M> {
    this.registry.require(model);
    return new Table(model, this.strategy);
  }

  /** Binds a record type read from an existing table's live columns. */
  inspect(table: string, name: string = table): Out<M, Table<Row, M>> {
    return this.strategy.run(this.inspectPlan(table, name));
  }

  *inspectPlan(table: string, name: string = table): Plan<Table<Row, M>> {
    const live = yield* tableInfoPlan(table);
    if (live.length === 0) throw new NotFound(`Table "${table}" does not exist.`);
    return this.bind(modelFromLive(name, table, live));
  }

  /** --------------------------------------------------
   * Schema
   * -------------------------------------------------- */
  private schemaModels(): ModelShape[] {
    return this.registry.models().filter((m) => m.table !== MigrationLedger.table);
  }

  /** Per-table diff of every bound model; nothing is applied. */
  schemaChanges(): Out<M, SchemaDiff[]> {
    return this.strategy.run(schemaChangesPlan(this.schemaModels()));
  }

  /** Applies additive changes directly, without the ledger. */
  reconcile(): Out<M, string[]> {
    return this.strategy.run(this.reconcilePlan());
  }

  reconcilePlan(): Plan<string[]> {
    return tableMigrations(this.schemaModels());
  }

  /** --------------------------------------------------
   * Migrations
   * -------------------------------------------------- */
  migrate(scripts: readonly MigrationScript[], group: string): Out<M, string[]> {
    return this.strategy.run(migratePlan(scripts, group));
  }

  async migrateFrom(dir: string, group: string = groupOf(dir)): Promise<string[]> {
    const scripts = await loadMigrations(dir);
    const applied = await this.strategy.settle(migratePlan(scripts, group));
    logger.info("MIGRATIONS", "Applied", `${applied.length} in ${group}`);
    return applied;
  }

  /** Writes a script for the pending changes; null when there are none and force is off. */
  async generate(dir: string, options: GenerateOptions = {}): Promise<string | null> {
    const diffs = await this.strategy.settle(schemaChangesPlan(this.schemaModels()));
    const statements = diffs.flatMap((d) => d.statements);

    if (statements.length === 0 && !options.force) {
      logger.info("MIGRATIONS", "No changes", dir);
      return null;
    }
    return writeMigration(dir, statements, { now: options.now });
  }
}
