#!/usr/bin/env node

import { consoleOutput } from "./context.js";
import { runCli } from "./cli/run.js";
import { LocalExecutor } from "./execution/executor.js";
import { captureEnvironment } from "./shared/environment.js";
import { logger } from "./logger.js";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    env: captureEnvironment(__filename),
    executor: new LocalExecutor(),
    out: consoleOutput,
  });
}

main().catch((error: unknown) => {
  logger.error({ error }, "Fatal error");
  process.exitCode = 1;
});
