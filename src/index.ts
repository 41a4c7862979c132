#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import { describeError } from "./errors.js";
import { exitCodeFor } from "./exit.js";
import { logger } from "./logger.js";
import { main } from "./main.js";

loadDotenv();

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error(`Fatal: ${describeError(err)}`, err);
    process.exitCode = exitCodeFor("internal_error");
  });
