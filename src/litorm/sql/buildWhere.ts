// sql/buildWhere.ts

import { q } from "./quote.js";
import type { SqlValue } from "../model-types.js";

export type WhereResult = {
  sql: string;
  params: SqlValue[];
};

/** Equality conjunction over already-converted storage values. */
export function buildWhere(filters: ReadonlyMap<string, SqlValue>): WhereResult {
  const conditions: string[] = [];
  const params: SqlValue[] = [];

  for (const [key, value] of filters) {
    conditions.push(`${q(key)} = ?`);
    params.push(value);
  }

  return { sql: conditions.join(" AND "), params };
}
