// sql/buildColumnSQL.ts

import { buildDefaultSQL } from "./buildDefaultSQL.js";
import { q } from "./quote.js";
import type { ColumnOptions } from "../model-types.js";

/** `"name" type [NOT NULL] [UNIQUE] [PRIMARY KEY] [DEFAULT d]` */
export function buildColumnSQL(
  name: string,
  col: { storageType: string } & ColumnOptions
): string {
  const parts: string[] = [q(name)];

  if (col.storageType) parts.push(col.storageType);
  if (col.notNull) parts.push("NOT NULL");
  if (col.unique) parts.push("UNIQUE");
  if (col.primaryKey) parts.push("PRIMARY KEY");

  const def = buildDefaultSQL(col.default);
  if (def !== null) parts.push(`DEFAULT ${def}`);

  return parts.join(" ");
}
