// column.ts

import { DescriptorError } from "./errors.js";
import { buildColumnSQL } from "./sql/buildColumnSQL.js";
import { isRowIdType } from "./utils/canonicalType.js";
import type {
  Codec,
  ColumnDefault,
  ColumnOptions,
  JsonValue,
  SqlValue,
} from "./model-types.js";

/**
 * Declares one column: its storage type, constraints, default and the
 * conversion between native values and stored ones.
 */
export class Column<N> {
  readonly storageType: string;
  readonly unique: boolean;
  readonly notNull: boolean;
  readonly primaryKey: boolean;
  readonly default: ColumnDefault | undefined;
  private readonly codec: Codec<N>;

  constructor(storageType: string, options: ColumnOptions, codec: Codec<N>) {
    this.storageType = storageType.trim();
    this.unique = options.unique ?? false;
    this.notNull = options.notNull ?? false;
    this.primaryKey = options.primaryKey ?? false;
    this.default = options.default;
    this.codec = codec;

    if (this.primaryKey && !isRowIdType(this.storageType)) {
      throw new DescriptorError(
        `Primary key must be declared "integer" to alias the rowid, got "${this.storageType}".`
      );
    }
  }

  toNative(stored: SqlValue): N {
    return this.codec.toNative(stored);
  }

  toStorage(native: N): SqlValue {
    return this.codec.toStorage(native);
  }

  /** Column definition clause used in CREATE TABLE and ADD COLUMN. */
  typedef(name: string): string {
    return buildColumnSQL(name, this);
  }

  /** Same conversion under different constraints. */
  with(options: ColumnOptions): Column<N> {
    return new Column(
      this.storageType,
      {
        unique: this.unique,
        notNull: this.notNull,
        primaryKey: this.primaryKey,
        default: this.default,
        ...options,
      },
      this.codec
    );
  }
}

/* ---------- codecs ---------- */

const identity: Codec<SqlValue> = {
  toNative: (stored) => stored,
  toStorage: (native) => native,
};

function asText(stored: SqlValue): string {
  if (stored === null) return "";
  if (Buffer.isBuffer(stored)) return stored.toString("utf8");
  return String(stored);
}

const MAX_ROW_ID = BigInt(Number.MAX_SAFE_INTEGER);

/** Row ids come back as bigint only when they no longer fit a double. */
export function toRowId(stored: SqlValue): number | bigint {
  if (typeof stored === "bigint" && (stored > MAX_ROW_ID || stored < -MAX_ROW_ID)) {
    return stored;
  }
  return Number(stored);
}

const pkCodec: Codec<number | bigint> = {
  toNative: toRowId,
  toStorage: (native) => native,
};

const integerCodec: Codec<number | null> = {
  toNative: (stored) => (stored === null ? null : Number(stored)),
  toStorage: (native) => native,
};

const textCodec: Codec<string> = {
  toNative: asText,
  toStorage: (native) => native,
};

export function normalizeEmail(address: string): string {
  return address.trim().toLowerCase();
}

const emailCodec: Codec<string> = {
  toNative: asText,
  toStorage: normalizeEmail,
};

/** UTC `YYYY-MM-DD HH:MM:SS.SSS`; the engine's date functions read it like CURRENT_TIMESTAMP. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 23).replace("T", " ");
}

export function parseTimestamp(stored: SqlValue): Date | null {
  if (stored === null) return null;
  if (typeof stored === "number" || typeof stored === "bigint") {
    return new Date(Number(stored));
  }
  const text = asText(stored).trim();
  const iso = text.includes("T") ? text : text.replace(" ", "T");
  return new Date(/(Z|[+-]\d\d:?\d\d)$/.test(iso) ? iso : `${iso}Z`);
}

const timestampCodec: Codec<Date | null> = {
  toNative: parseTimestamp,
  toStorage: (native) => (native === null ? null : formatTimestamp(native)),
};

const binaryCodec: Codec<Buffer | null> = {
  toNative: (stored) => {
    if (stored === null || Buffer.isBuffer(stored)) return stored;
    return Buffer.from(String(stored), "utf8");
  },
  toStorage: (native) => native,
};

const jsonCodec: Codec<JsonValue> = {
  toNative: (stored) => (stored === null ? null : JSON.parse(asText(stored))),
  toStorage: (native) => JSON.stringify(native),
};

/* ---------- factory ---------- */

/** Column whose values pass through unconverted. */
export function column(storageType: string, options?: ColumnOptions): Column<SqlValue>;
/** Column with its own native/storage conversion. */
export function column<N>(
  storageType: string,
  options: ColumnOptions,
  codec: Codec<N>
): Column<N>;
export function column<N>(
  storageType: string,
  options: ColumnOptions = {},
  codec?: Codec<N>
): Column<N> | Column<SqlValue> {
  return codec
    ? new Column(storageType, options, codec)
    : new Column(storageType, options, identity);
}

/* ===================================================== */
/* BUILT-IN KINDS                                        */
/* ===================================================== */

export const PK = column("integer", { primaryKey: true }, pkCodec);

export const Integer = column("integer", {}, integerCodec);

export const Text = column("text", { notNull: true, default: "''" }, textCodec);

export const UniqueText = column(
  "text",
  { notNull: true, unique: true },
  textCodec
);

export const Timestamp = column(
  "timestamp",
  { notNull: true, default: "CURRENT_TIMESTAMP" },
  timestampCodec
);

export const Binary = column("blob", {}, binaryCodec);

export const Email = column(
  "text",
  { notNull: true, default: "''" },
  emailCodec
);

export const UniqueEmail = column(
  "text",
  { notNull: true, unique: true },
  emailCodec
);

export const Json = column("text", { notNull: true, default: "'{}'" }, jsonCodec);
