// utils/canonicalType.ts

/** First word of a declared storage type, upper-cased: "varchar(20) collate nocase" -> "VARCHAR(20)". */
export function canonicalType(t: string): string {
  const [head = ""] = t.trim().split(/\s+/);
  return head.toUpperCase();
}

export function sameStorageType(live: string, declared: string): boolean {
  return canonicalType(live) === canonicalType(declared);
}

/** Only a key declared exactly INTEGER becomes an alias for the rowid. */
export function isRowIdType(t: string): boolean {
  return canonicalType(t) === "INTEGER";
}
