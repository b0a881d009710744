// migrations/writeMigration.ts

import { mkdir, readdir, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";

import { logger } from "../utils/logger.js";
import { version } from "../../version.js";

export interface WriteOptions {
  /** Clock for the script name; defaults to now. */
  now?: Date;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** UTC `YYYYMMDD_HHMMSS_mmm`, which sorts in creation order. */
export function migrationName(at: Date): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `${date}_${time}_${pad(at.getUTCMilliseconds(), 3)}`;
}

/** Module source for a script that runs `statements`, or a stub that refuses to run. */
export function migrationSource(name: string, statements: readonly string[]): string {
  const body = statements.length
    ? statements.map((sql) => `  connection.exec(${JSON.stringify(sql)});`)
    : [`  throw new Error(${JSON.stringify(`Migration ${name} has no body yet.`)});`];

  return [
    `// ${name}: generated by litorm ${version}`,
    "",
    `/** @param {import("better-sqlite3").Database} connection */`,
    "export function forward(connection) {",
    ...body,
    "}",
    "",
  ].join("\n");
}

/** Writes a new script into `dir` (created if needed) and returns its path. */
export async function writeMigration(
  dir: string,
  statements: readonly string[],
  options: WriteOptions = {}
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const taken = new Set((await readdir(dir)).map((f) => basename(f, extname(f))));

  let at = options.now ?? new Date();
  let name = migrationName(at);
  while (taken.has(name)) {
    at = new Date(at.getTime() + 1);
    name = migrationName(at);
  }

  const path = join(dir, `${name}.mjs`);
  await writeFile(path, migrationSource(name, statements), "utf8");
  logger.info("MIGRATIONS", statements.length ? "Generated" : "Created stub", path);
  return path;
}
