import type { ToolContext } from "../context.js";
import type { ParsedInvocation } from "../types/options.js";
import { detectOs } from "../distro/detector.js";
import { checkDependencies, suggestInstall } from "../dependencies/advisor.js";
import { handleConfigs } from "../units/manager.js";
import { adviseTimerInstall, runSchedulerIntent } from "../scheduler/bridge.js";
import { runTarget } from "../runner/runner.js";
import { ToolError, exitCodeFor } from "../shared/errors.js";
import { logger } from "../logger.js";

/**
 * Run the one branch the parser selected and return the exit status.
 * Only input errors raised by a handler produce a non-zero status.
 */
export async function dispatch(ctx: ToolContext, invocation: ParsedInvocation): Promise<number> {
  const { options, action, ignored } = invocation;

  const family = await detectOs(options.os, ctx.env);
  if (ctx.verbose) ctx.out.line(`Detected/Selected OS: ${family}`);

  if (ignored.length > 0) {
    logger.warn({ selected: action.kind, ignored }, "Flags shadowed by a higher-priority action were ignored");
  }

  try {
    switch (action.kind) {
      case "dependencies":
        if (action.mode === "check") await checkDependencies(ctx);
        else await suggestInstall(ctx);
        break;
      case "configs":
        await handleConfigs(ctx, action.mode, options);
        break;
      case "install-timer":
        adviseTimerInstall(ctx, action.cadence);
        break;
      case "scheduler":
        await runSchedulerIntent(ctx, action.intent);
        break;
      case "run":
        await runTarget(ctx, action.target, action.dryRun);
        break;
      case "none":
        if (ctx.verbose) ctx.out.line("No run or dry-run argument provided. Doing nothing.");
        break;
    }
  } catch (err) {
    if (err instanceof ToolError) {
      ctx.out.line(`Error: ${err.message}`);
      return exitCodeFor(err);
    }
    throw err;
  }
  return 0;
}
