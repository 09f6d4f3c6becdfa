// Runs a target: every executable file of a directory, a single script, or a
// raw shell command line. Children run one after another; their exit codes
// are logged by the executor and never aggregated.
import { readdir } from "node:fs/promises";
import { join, sep } from "node:path";
import type { ToolContext } from "../context.js";
import type { Command } from "../types/command.js";
import { classifyTarget, isExecutable } from "./classifier.js";

/**
 * Direct exec, no shell in between. A bare file name gets a "./" prefix so
 * it is taken from the working directory instead of being looked up on PATH.
 */
export function directCommand(path: string): Command {
  return { argv: [path.includes(sep) ? path : `.${sep}${path}`] };
}

/** A file without the execute bit is handed to bash as a script. */
export function shellScriptCommand(path: string): Command {
  return { argv: ["bash", path] };
}

/**
 * Untrusted passthrough: the whole target string goes to /bin/sh as is.
 * Nothing is quoted, so shell metacharacters in the target are interpreted.
 */
export function shellPassthroughCommand(commandLine: string): Command {
  return { argv: [commandLine], shell: true };
}

export async function runTarget(ctx: ToolContext, target: string, dryRun: boolean): Promise<void> {
  const kind = await classifyTarget(target);

  switch (kind) {
    case "directory":
      await runDirectory(ctx, target, dryRun);
      return;

    case "executable-file":
      if (dryRun) {
        ctx.out.line(`[DRYRUN] Would run file: '${target}'`);
        return;
      }
      ctx.out.line(`Running file: '${target}'`);
      await ctx.executor.execute(directCommand(target));
      return;

    case "non-executable-file":
      if (ctx.verbose) {
        ctx.out.line(`'${target}' is a file but probably not executable. Attempting to run in shell.`);
      }
      if (dryRun) {
        ctx.out.line(`[DRYRUN] Would run via shell: '${target}'`);
        return;
      }
      await ctx.executor.execute(shellScriptCommand(target));
      return;

    case "opaque-command":
      if (dryRun) {
        ctx.out.line(`[DRYRUN] Would run command: ${target}`);
        return;
      }
      await ctx.executor.execute(shellPassthroughCommand(target));
      return;
  }
}

async function runDirectory(ctx: ToolContext, dir: string, dryRun: boolean): Promise<void> {
  const entries = (await readdir(dir)).sort();

  for (const entry of entries) {
    const joined = join(dir, entry);
    const fullPath = joined.includes(sep) ? joined : `.${sep}${joined}`;
    if (!(await isExecutable(fullPath))) {
      if (ctx.verbose) ctx.out.line(`Skipping: '${fullPath}' is not an executable file`);
      continue;
    }

    if (ctx.verbose) ctx.out.line(`Found executable script: ${fullPath}`);
    if (dryRun) {
      ctx.out.line(`[DRYRUN] Would run: '${fullPath}'`);
      continue;
    }
    ctx.out.line(`Running: '${fullPath}'`);
    await ctx.executor.execute(directCommand(fullPath));
  }
}
