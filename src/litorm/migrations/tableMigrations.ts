// migrations/tableMigrations.ts

import { statement } from "../plan.js";
import { logger } from "../utils/logger.js";
import { diffTable } from "./diffTable.js";
import type { SchemaDiff, SchemaWarning } from "./diffTable.js";
import type { ModelShape } from "../model.js";
import type { Plan } from "../plan.js";

function describeWarning(table: string, w: SchemaWarning): [string, string] {
  switch (w.kind) {
    case "type-mismatch":
      return [
        "Type mismatch",
        `${table}.${w.column} (live ${w.live}, declared ${w.declared})`,
      ];
    case "orphaned-column":
      return ["Orphaned column", `${table}.${w.column}`];
  }
}

export function reportWarnings(diff: SchemaDiff): void {
  for (const w of diff.warnings) {
    const [action, subject] = describeWarning(diff.table, w);
    logger.warn("SCHEMA", action, subject);
  }
}

/** Diffs every model without touching the schema; warnings are logged. */
export function* schemaChangesPlan(
  models: readonly ModelShape[]
): Plan<SchemaDiff[]> {
  const diffs: SchemaDiff[] = [];
  for (const model of models) {
    const diff = yield* diffTable(model);
    reportWarnings(diff);
    diffs.push(diff);
  }
  return diffs;
}

/** Applies each model's additive DDL directly; returns the statements run. */
export function* tableMigrations(models: readonly ModelShape[]): Plan<string[]> {
  const applied: string[] = [];
  const diffs = yield* schemaChangesPlan(models);

  for (const diff of diffs) {
    for (const sql of diff.statements) {
      yield* statement(sql);
      logger.info("SCHEMA", "Applied", sql);
      applied.push(sql);
    }
  }
  return applied;
}
