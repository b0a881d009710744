// sql/buildDefaultSQL.ts

import type { ColumnDefault } from "../model-types.js";

/**
 * Renders the DEFAULT clause body. Literals are embedded verbatim, so a text
 * default carries its own quotes (`"''"`, `"'{}'"`); generators are called
 * each time DDL is produced.
 */
export function buildDefaultSQL(def: ColumnDefault | undefined): string | null {
  if (def === undefined) return null;
  const value = typeof def === "function" ? def() : def;
  return String(value);
}
