// setup.ts

import { Litorm } from "./litorm.js";
import type { ConnectOptions } from "./executor.js";
import type { ModelShape } from "./model.js";
import type { Mode } from "./model-types.js";

export interface SetupOptions extends ConnectOptions {
  /** Defaults to an in-memory database. */
  database?: string;
  models?: readonly ModelShape[];
  /** Script directory. Without one, schema changes are applied directly. */
  migrations?: string;
  group?: string;
  /** Run pending scripts now; defaults to true. */
  migrate?: boolean;
}

async function prepare<M extends Mode>(orm: Litorm<M>, options: SetupOptions): Promise<void> {
  orm.register(...(options.models ?? []));

  if (options.migrations === undefined) {
    await orm.strategy.settle(orm.reconcilePlan());
    return;
  }
  if (options.migrate ?? true) {
    await orm.migrateFrom(options.migrations, options.group);
  }
}

/** Opens a connection, binds the models and brings the schema up to date. */
export async function setup(options: SetupOptions = {}): Promise<Litorm<"sync">> {
  const orm = Litorm.open(options.database, options);
  try {
    await prepare(orm, options);
  } catch (err) {
    orm.close();
    throw err;
  }
  return orm;
}

export async function setupAsync(options: SetupOptions = {}): Promise<Litorm<"async">> {
  const orm = Litorm.openAsync(options.database, options);
  try {
    await prepare(orm, options);
  } catch (err) {
    await orm.close();
    throw err;
  }
  return orm;
}
