#!/usr/bin/env node
// cli/index.ts

import "dotenv/config";

import { CommanderError } from "commander";

import { logger } from "../litorm/utils/logger.js";
import { createProgram } from "./program.js";

async function main(): Promise<void> {
  const program = createProgram();
  program.exitOverride();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    const message = err instanceof Error ? err.message : String(err);
    logger.error("LITORM", "Error", message);
    process.exit(1);
  }
}

void main();
