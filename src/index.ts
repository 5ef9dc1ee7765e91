#!/usr/bin/env node
import { runCli } from "./cli";
import { errorMessage } from "./core/errors";
import { Logger } from "./observability";

runCli(process.argv.slice(2), process.env)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    new Logger({ component: "main", runId: "none" }).error("unhandled_error", {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = 1;
  });
