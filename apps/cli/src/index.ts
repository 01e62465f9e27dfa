#!/usr/bin/env tsx
import { toError } from "@peerchat/session";

import { ConfigError } from "./config.js";
import { logger } from "./logger.js";
import { printFailure } from "./output.js";
import { buildProgram } from "./program.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const err = toError(error);
    if (!(err instanceof ConfigError)) {
      logger.error({ err }, "peerchat failed");
    }
    printFailure(err);
    process.exitCode = 1;
  });
