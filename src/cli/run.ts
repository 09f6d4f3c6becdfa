import type { Output, ToolContext } from "../context.js";
import type { Executor } from "../execution/executor.js";
import type { EnvironmentSnapshot } from "../types/env.js";
import { loadConfig } from "../config/loader.js";
import { enableVerboseLogging, logger } from "../logger.js";
import { ToolError, exitCodeFor } from "../shared/errors.js";
import { dispatch } from "./dispatcher.js";
import { parseInvocation, type ParseIo, type ParseOutcome } from "./program.js";

export interface CliDeps {
  readonly env: EnvironmentSnapshot;
  readonly executor: Executor;
  readonly out: Output;
  /** Sink for commander's help and usage text; process streams when omitted. */
  readonly io?: ParseIo;
}

/** Parse, build the context, dispatch. Resolves to the process exit status. */
export async function runCli(args: readonly string[], deps: CliDeps): Promise<number> {
  let outcome: ParseOutcome;
  try {
    outcome = parseInvocation(args, deps.io);
  } catch (err) {
    if (err instanceof ToolError) {
      logger.debug({ code: err.code, context: err.context }, "Rejected command line");
      return exitCodeFor(err);
    }
    throw err;
  }
  if (outcome.status === "exit") return outcome.exitCode;

  const { invocation } = outcome;
  if (invocation.options.verbose) enableVerboseLogging();

  const { config } = await loadConfig(deps.env);
  const ctx: ToolContext = {
    env: deps.env,
    config,
    executor: deps.executor,
    out: deps.out,
    verbose: invocation.options.verbose,
  };
  return dispatch(ctx, invocation);
}
