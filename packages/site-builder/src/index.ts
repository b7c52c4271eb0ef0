#!/usr/bin/env node

import { createProgram } from "./cli.js";
import { logger } from "./utils/logger.js";

process.on("uncaughtException", (error) => {
  logger.fatal({ group: "Process", err: error }, "Uncaught exception");
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ group: "Process", reason }, "Unhandled rejection");
  process.exit(1);
});

await createProgram().parseAsync(process.argv);
