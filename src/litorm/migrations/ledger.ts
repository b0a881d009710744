// migrations/ledger.ts

import { Text, Timestamp } from "../column.js";
import { MigrationError } from "../errors.js";
import { defineModel } from "../model.js";
import { insertPlan } from "../persist.js";
import { task } from "../plan.js";
import { QueryBuilder } from "../query-builder.js";
import { logger } from "../utils/logger.js";
import { tableExistsPlan } from "./introspect.js";
import { tableMigrations } from "./tableMigrations.js";
import type { Connection } from "../executor.js";
import type { Plan } from "../plan.js";

export interface MigrationScript {
  /** Sort key; scripts run in ascending name order. */
  name: string;
  forward(connection: Connection): unknown;
}

/** One row per applied script. */
export const MigrationLedger = defineModel("Migration", {
  table: "litorm_migrations",
  columns: {
    group: Text,
    name: Text,
    applied: Timestamp,
  },
});

/** Most recently applied script of a group, if any. */
export function* latestAppliedPlan(group: string): Plan<string | undefined> {
  const exists = yield* tableExistsPlan(MigrationLedger.table);
  if (!exists) return undefined;

  const latest = yield* new QueryBuilder(MigrationLedger)
    .filter({ group })
    .order("-applied", "-name")
    .getPlan("name");

  return typeof latest === "string" ? latest : undefined;
}

/** Scripts sorted by name, keeping those after `latest`. */
export function pendingScripts(
  scripts: readonly MigrationScript[],
  latest: string | undefined
): MigrationScript[] {
  const seen = new Set<string>();
  for (const script of scripts) {
    if (seen.has(script.name)) {
      throw new MigrationError(`Duplicate migration name "${script.name}".`);
    }
    seen.add(script.name);
  }

  // TODO: warn about scripts sorting before `latest` that were never applied (merged out of order).
  return [...scripts]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .filter((script) => latest === undefined || script.name > latest);
}

/**
 * Runs each pending script in order and records it in the ledger right
 * after it succeeds. A failing script stops the run; the ones before it
 * stay recorded.
 */
export function* migratePlan(
  scripts: readonly MigrationScript[],
  group: string
): Plan<string[]> {
  const latest = yield* latestAppliedPlan(group);
  const pending = pendingScripts(scripts, latest);
  const applied: string[] = [];

  if (pending.length === 0) {
    logger.info("MIGRATIONS", "Up to date", group);
    return applied;
  }

  yield* tableMigrations([MigrationLedger]);

  for (const script of pending) {
    logger.info("MIGRATIONS", "Running", `${group}/${script.name}`);
    try {
      yield* task(script.name, (connection) => script.forward(connection));
    } catch (err) {
      logger.error("MIGRATIONS", "Failed", `${group}/${script.name}`);
      throw err;
    }
    yield* insertPlan(MigrationLedger.create({ group, name: script.name }));
    applied.push(script.name);
  }

  return applied;
}
