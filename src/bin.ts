#!/usr/bin/env node

import { run } from "./cli";
import { logger } from "./services/logger";

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error("Error:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
