// migrations/introspect.ts

import { column } from "../column.js";
import { defineModel } from "../model.js";
import { statement } from "../plan.js";
import { q } from "../sql/quote.js";
import { isRowIdType } from "../utils/canonicalType.js";
import type { ModelDef } from "../model.js";
import type { Columns, Row } from "../model-types.js";
import type { Plan } from "../plan.js";

/** One column as the engine reports it. */
export type LiveColumn = {
  name: string;
  type: string;
  notNull: boolean;
  default: string | null;
  primaryKey: boolean;
};

function toLiveColumn(row: Row): LiveColumn {
  return {
    name: String(row.name),
    type: row.type === null ? "" : String(row.type),
    notNull: Number(row.notnull) === 1,
    default: row.dflt_value === null ? null : String(row.dflt_value),
    primaryKey: Number(row.pk) > 0,
  };
}

/** Empty when the table does not exist. */
export function* tableInfoPlan(table: string): Plan<LiveColumn[]> {
  const cursor = yield* statement(`PRAGMA table_info(${q(table)})`);
  return cursor.rows.map(toLiveColumn);
}

export function* tableExistsPlan(table: string): Plan<boolean> {
  const cursor = yield* statement(
    `SELECT 1 AS "found" FROM sqlite_master WHERE type = 'table' AND name = ?`,
    [table]
  );
  return cursor.rows.length > 0;
}

/* ===================================================== */
/* LIVE MODELS                                           */
/* ===================================================== */

/**
 * Record type mirroring a live table. A single-column INTEGER primary key
 * is declared as such; any other single-column key is still used as the
 * primary-key field (the engine never fills it in), and composite keys fall
 * back to rowid.
 */
export function modelFromLive(
  name: string,
  table: string,
  live: readonly LiveColumn[]
): ModelDef<Row> {
  const keys = live.filter((c) => c.primaryKey);
  const pk = keys.length === 1 ? keys[0] : undefined;

  const columns: Columns<Row> = {};
  for (const c of live) {
    columns[c.name] = column(c.type, {
      notNull: c.notNull,
      default: c.default ?? undefined,
      primaryKey: c === pk && isRowIdType(c.type),
    });
  }

  return defineModel<Row>(name, { table, primaryKey: pk?.name, columns });
}
