#!/usr/bin/env node
// cli.ts

import "dotenv/config";

import { createProgram } from "./tablewright/cli/program.js";
import { logger } from "./tablewright/utils/logger.js";

const program = createProgram({
  env: process.env,
  write: (text) => process.stdout.write(text),
});

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.fail(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
