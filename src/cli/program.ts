// cli/program.ts

import { existsSync } from "node:fs";
import { pathToFileURL } from "node:url";

import { Command } from "commander";

import {
  CONFIG_FILE,
  loadConfig,
  resolveConfig,
  saveConfig,
} from "../litorm/config.js";
import { ConfigError } from "../litorm/errors.js";
import { Litorm, groupOf } from "../litorm/litorm.js";
import { writeMigration } from "../litorm/migrations/writeMigration.js";
import { isModel } from "../litorm/model.js";
import { logger, setLogLevel } from "../litorm/utils/logger.js";
import { version } from "../version.js";
import type { ModelShape } from "../litorm/model.js";

interface GlobalOptions {
  config: string;
  verbose: boolean;
}

/**
 * Imports the configured models module and returns the record types it
 * lists under `models` (or as its default export).
 */
export async function loadModels(path: string): Promise<ModelShape[]> {
  if (!existsSync(path)) {
    logger.warn("MODELS", "Not found", path);
    return [];
  }

  const mod: unknown = await import(/* @vite-ignore */ pathToFileURL(path).href);
  const listed: unknown =
    typeof mod === "object" && mod !== null
      ? Reflect.get(mod, "models") ?? Reflect.get(mod, "default")
      : undefined;

  if (!Array.isArray(listed)) {
    throw new ConfigError(`${path} must export a "models" array.`);
  }

  const entries: unknown[] = listed;
  return entries.map((entry, i) => {
    if (!isModel(entry)) {
      throw new ConfigError(`${path}: models[${i}] is not a record type.`);
    }
    return entry;
  });
}

function migrationsDir(migrations: string | null, configPath: string): string {
  if (!migrations) {
    throw new ConfigError(`No migrations directory configured in ${configPath}.`);
  }
  return migrations;
}

/** Opens the configured database with its models bound, runs `fn`, then closes. */
async function withOrm<R>(
  configPath: string,
  fn: (orm: Litorm<"sync">, dir: string) => Promise<R>
): Promise<R> {
  const resolved = resolveConfig(loadConfig(configPath));
  const dir = migrationsDir(resolved.migrations, configPath);
  const orm = Litorm.open(resolved.database);

  try {
    orm.register(...(await loadModels(resolved.models)));
    return await fn(orm, dir);
  } finally {
    orm.close();
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("litorm")
    .description("Schema migrations for litorm record types")
    .version(version)
    .option("-c, --config <path>", "config file", CONFIG_FILE)
    .option("-v, --verbose", "log every statement", false);

  program.hook("preAction", (thisCommand) => {
    const options = thisCommand.opts<GlobalOptions>();
    setLogLevel(options.verbose ? "debug" : "info");
  });

  const configPath = () => program.opts<GlobalOptions>().config;

  program
    .command("init")
    .description("write a config file with the current settings")
    .action(() => {
      const path = configPath();
      saveConfig(loadConfig(path), path);
      logger.info("CONFIG", "Wrote", path);
    });

  program
    .command("migrate")
    .description("apply pending migration scripts")
    .action(async () => {
      await withOrm(configPath(), (orm, dir) => orm.migrateFrom(dir, groupOf(dir)));
    });

  program
    .command("generate")
    .description("write a migration script for the current schema changes")
    .option("-f, --force", "write a script even when nothing changed", false)
    .action(async (options: { force: boolean }) => {
      await withOrm(configPath(), (orm, dir) => orm.generate(dir, { force: options.force }));
    });

  program
    .command("new")
    .description("write an empty migration script")
    .action(async () => {
      const path = configPath();
      const { migrations } = resolveConfig(loadConfig(path));
      await writeMigration(migrationsDir(migrations, path), []);
    });

  return program;
}
