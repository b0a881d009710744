// executor.ts

import Database from "better-sqlite3";

import { logger } from "./utils/logger.js";
import type { Row, SqlValue } from "./model-types.js";

export type Connection = Database.Database;

/* ===================================================== */
/* INSTRUCTIONS                                          */
/* ===================================================== */

export interface Statement {
  kind: "statement";
  sql: string;
  params: readonly SqlValue[];
}

/** Arbitrary work against the raw connection, e.g. a migration script. */
export interface Task {
  kind: "task";
  label: string;
  run: (connection: Connection) => unknown;
}

export type Instruction = Statement | Task;

/** Result of one statement. */
export interface Cursor {
  rows: Row[];
  rowCount: number;
  lastInsertId: number | bigint | null;
}

const EMPTY_CURSOR: Cursor = { rows: [], rowCount: 0, lastInsertId: null };

/* ===================================================== */
/* CONNECTION                                            */
/* ===================================================== */

export interface ConnectOptions {
  readonly?: boolean;
  fileMustExist?: boolean;
  /** Milliseconds to wait on a locked database. */
  timeout?: number;
}

export function connect(path: string, options: ConnectOptions = {}): Connection {
  const connection = new Database(path, {
    readonly: options.readonly ?? false,
    fileMustExist: options.fileMustExist ?? false,
    timeout: options.timeout ?? 5000,
  });
  logger.info("CONNECTION", "Opened", path);
  return connection;
}

/** Runs instructions against one connection, in autocommit mode. */
export class Executor {
  constructor(readonly connection: Connection) {}

  execute(statement: Statement): Cursor {
    const params = [...statement.params];
    logger.sql(statement.sql, params);

    const prepared = this.connection.prepare<SqlValue[], Row>(statement.sql);
    if (prepared.reader) {
      const rows = prepared.all(...params);
      return { rows, rowCount: rows.length, lastInsertId: null };
    }

    const info = prepared.run(...params);
    return {
      rows: [],
      rowCount: info.changes,
      lastInsertId: info.lastInsertRowid,
    };
  }

  /** A task that returns a promise yields a promise of the empty cursor. */
  dispatch(instruction: Instruction): Cursor | Promise<Cursor> {
    if (instruction.kind === "statement") return this.execute(instruction);

    const result = instruction.run(this.connection);
    if (result instanceof Promise) return result.then(() => EMPTY_CURSOR);
    return EMPTY_CURSOR;
  }

  close(): void {
    if (!this.connection.open) return;
    this.connection.close();
    logger.info("CONNECTION", "Closed", this.connection.name);
  }
}
