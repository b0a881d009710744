// migrations/loadMigrations.ts

import { readdir } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import { pathToFileURL } from "node:url";

import { MigrationError } from "../errors.js";
import { logger } from "../utils/logger.js";
import type { Connection } from "../executor.js";
import type { MigrationScript } from "./ledger.js";

/** Modules plain Node loads without a TypeScript-aware loader. */
const SCRIPT_EXTENSIONS = new Set([".mjs", ".js", ".cjs"]);

type Forward = (connection: Connection) => unknown;

function isForward(value: unknown): value is Forward {
  return typeof value === "function";
}

function isScriptFile(file: string): boolean {
  if (file.startsWith("_") || file.startsWith("~")) return false;
  return SCRIPT_EXTENSIONS.has(extname(file));
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Imports every migration module in `dir`. The file name without its
 * extension is the script name; each module must export `forward`.
 */
export async function loadMigrations(dir: string): Promise<MigrationScript[]> {
  let files: string[];
  try {
    files = await readdir(dir);
  } catch (err) {
    if (!isMissing(err)) throw err;
    logger.warn("MIGRATIONS", "No directory", dir);
    return [];
  }

  const scripts: MigrationScript[] = [];
  for (const file of files.filter(isScriptFile).sort()) {
    const path = resolve(join(dir, file));
    const mod: unknown = await import(/* @vite-ignore */ pathToFileURL(path).href);
    const forward: unknown =
      typeof mod === "object" && mod !== null ? Reflect.get(mod, "forward") : undefined;

    if (!isForward(forward)) {
      throw new MigrationError(`Migration ${file} does not export a forward function.`);
    }
    scripts.push({ name: basename(file, extname(file)), forward });
  }

  logger.info("MIGRATIONS", "Loaded", `${scripts.length} from ${dir}`);
  return scripts;
}
