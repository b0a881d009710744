// migrations/diffTable.ts

import { DescriptorError } from "../errors.js";
import { q } from "../sql/quote.js";
import { sameStorageType } from "../utils/canonicalType.js";
import { tableInfoPlan } from "./introspect.js";
import type { ModelShape } from "../model.js";
import type { Plan } from "../plan.js";

/* ===================================================== */
/* TYPES                                                 */
/* ===================================================== */

export type SchemaWarning =
  | { kind: "type-mismatch"; column: string; live: string; declared: string }
  | { kind: "orphaned-column"; column: string };

export interface SchemaDiff {
  table: string;
  /** Additive DDL, in the order it must run. */
  statements: string[];
  /** Drift that is reported and never acted on. */
  warnings: SchemaWarning[];
}

/* ===================================================== */
/* DDL                                                   */
/* ===================================================== */

export function createTableSQL(model: ModelShape): string {
  const entries = model.entries();
  if (entries.length === 0) {
    throw new DescriptorError(`${model.name} declares no columns to create.`);
  }
  const defs = entries.map(([name, col]) => col.typedef(name));
  return `CREATE TABLE ${q(model.table)} (${defs.join(", ")})`;
}

export function addColumnSQL(model: ModelShape, name: string): string {
  const col = model.column(name);
  if (!col) throw new DescriptorError(`${model.name} has no column "${name}".`);
  return `ALTER TABLE ${q(model.table)} ADD COLUMN ${col.typedef(name)}`;
}

/**
 * Compares the declaration against the live table. Missing tables and
 * columns become CREATE TABLE / ADD COLUMN; type changes and columns the
 * declaration no longer has only produce warnings.
 */
export function* diffTable(model: ModelShape): Plan<SchemaDiff> {
  const diff: SchemaDiff = { table: model.table, statements: [], warnings: [] };
  const live = yield* tableInfoPlan(model.table);

  if (live.length === 0) {
    diff.statements.push(createTableSQL(model));
    return diff;
  }

  const liveByName = new Map(live.map((c) => [c.name, c]));
  const declared = model.entries();

  for (const [name, col] of declared) {
    const current = liveByName.get(name);
    if (!current) {
      diff.statements.push(addColumnSQL(model, name));
      continue;
    }
    if (!sameStorageType(current.type, col.storageType)) {
      diff.warnings.push({
        kind: "type-mismatch",
        column: name,
        live: current.type,
        declared: col.storageType,
      });
    }
  }

  const declaredNames = new Set(declared.map(([name]) => name));
  for (const c of live) {
    if (!declaredNames.has(c.name)) {
      diff.warnings.push({ kind: "orphaned-column", column: c.name });
    }
  }

  return diff;
}
