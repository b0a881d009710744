// config.ts

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";

import dotenv from "dotenv";
import { z } from "zod";

import { ConfigError } from "./errors.js";

export const CONFIG_FILE = "litorm.cfg";

export const configSchema = z.object({
  database: z.string().trim().min(1).default(":memory:"),
  /** Module exporting the record types to bind, as `models`. */
  models: z.string().trim().min(1).default("models.js"),
  /** Script directory; empty means schema changes are applied directly. */
  migrations: z.string().trim().default("migrations"),
  root: z.string().trim().min(1).default("."),
});

export type LitormConfig = z.infer<typeof configSchema>;

export type ResolvedConfig = {
  database: string;
  models: string;
  migrations: string | null;
};

const KEYS = Object.keys(configSchema.shape);

function envName(key: string): string {
  return `LITORM_${key.toUpperCase()}`;
}

/**
 * Reads `key = value` lines from the config file (when present), then
 * LITORM_* environment variables on top.
 */
export function loadConfig(
  path: string = CONFIG_FILE,
  env: NodeJS.ProcessEnv = process.env
): LitormConfig {
  const fromFile = existsSync(path) ? dotenv.parse(readFileSync(path)) : {};

  const fromEnv: Record<string, string> = {};
  for (const key of KEYS) {
    const value = env[envName(key)];
    if (value !== undefined) fromEnv[key] = value;
  }

  const parsed = configSchema.safeParse({ ...fromFile, ...fromEnv });
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration (${path}): ${problems}`, parsed.error.issues);
  }
  return parsed.data;
}

/** Paths relative to `root`, itself relative to `cwd`. */
export function resolveConfig(config: LitormConfig, cwd: string = process.cwd()): ResolvedConfig {
  const root = resolve(cwd, config.root);
  return {
    database: config.database === ":memory:" ? config.database : resolve(root, config.database),
    models: resolve(root, config.models),
    migrations: config.migrations ? resolve(root, config.migrations) : null,
  };
}

export function formatConfig(config: LitormConfig): string {
  const lines = Object.entries(config)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key} = ${value}`);
  return ["# litorm", ...lines, ""].join("\n");
}

export function saveConfig(config: LitormConfig, path: string = CONFIG_FILE): void {
  writeFileSync(path, formatConfig(config), "utf8");
}

export function defaultConfig(): LitormConfig {
  return configSchema.parse({});
}
