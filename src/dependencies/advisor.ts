import type { ToolContext } from "../context.js";
import { detectOs } from "../distro/detector.js";
import { createPackageCommands } from "../distro/commands/factory.js";
import { describeCommand } from "../types/command.js";
import { which } from "../shared/which.js";

/** Programs the run and scheduler paths rely on. */
export const REQUIRED_PROGRAMS = ["systemctl", "bash", "nano"] as const;

/** Required programs that do not resolve on PATH, in list order. */
export async function findMissing(ctx: ToolContext): Promise<string[]> {
  const missing: string[] = [];
  for (const program of REQUIRED_PROGRAMS) {
    if ((await which(program, ctx.env)) === null) missing.push(program);
  }
  return missing;
}

export async function checkDependencies(ctx: ToolContext): Promise<void> {
  for (const program of REQUIRED_PROGRAMS) {
    const resolved = await which(program, ctx.env);
    if (resolved) ctx.out.line(`[OK]   ${program} found at ${resolved}`);
    else ctx.out.line(`[MISS] ${program} NOT found`);
  }
  if (ctx.verbose) ctx.out.line("Dependency check finished.");
}

/**
 * Print one install command per missing program. Always auto-detects the
 * family, regardless of any --os override.
 */
export async function suggestInstall(ctx: ToolContext): Promise<void> {
  const family = await detectOs("auto", ctx.env);
  const missing = await findMissing(ctx);

  if (missing.length === 0) {
    ctx.out.line("All essential commands appear to be installed.");
    return;
  }

  const commands = createPackageCommands(family);
  ctx.out.line("Suggested installation commands (based on detected OS):");
  for (const program of missing) {
    ctx.out.line(`  ${describeCommand(commands.packageInstall([program]))}`);
  }
  if (ctx.verbose) ctx.out.line("Suggested install script generation completed.");
}
