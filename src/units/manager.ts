// Lifecycle of the service/timer pair under <config-root>/systemd/user.
// create overwrites both files unconditionally; edit hands the file to an
// editor; delete removes whichever of the two exists.
import { access, mkdir, rm, writeFile } from "node:fs/promises";
import type { ToolContext } from "../context.js";
import type { ConfigsMode, InvocationOptions } from "../types/options.js";
import { ToolError, ToolErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";
import { openInEditor } from "./editor.js";
import { TIMER_UNIT, unitPaths } from "./paths.js";
import { coercePersistent, renderService, renderTimer, type UnitTemplateParams } from "./templates.js";

type UnitSettings = Pick<InvocationOptions, "runArg" | "description" | "onCalendar" | "persistent">;

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Fill in defaults for every template value; throws when there is no run-arg. */
export function buildTemplateParams(ctx: ToolContext, settings: UnitSettings): UnitTemplateParams {
  if (!settings.runArg) {
    throw new ToolError(ToolErrorCode.MISSING_RUN_ARG, "--configs create requires --run-arg");
  }
  return {
    description: settings.description || `Daily User Run of ${ctx.env.toolPath}`,
    onCalendar: settings.onCalendar || ctx.config.schedule.on_calendar,
    persistent: coercePersistent(settings.persistent, ctx.config.schedule.persistent),
    nodePath: ctx.env.nodePath,
    toolPath: ctx.env.toolPath,
    runArg: settings.runArg,
  };
}

export async function createUnits(ctx: ToolContext, settings: UnitSettings): Promise<void> {
  const params = buildTemplateParams(ctx, settings);
  const paths = unitPaths(ctx.env);

  await mkdir(paths.dir, { recursive: true });
  await writeFile(paths.service, renderService(params), "utf-8");
  await writeFile(paths.timer, renderTimer(params), "utf-8");
  logger.debug({ service: paths.service, timer: paths.timer, runArg: params.runArg }, "Unit files written");

  ctx.out.line(`Created service file: ${paths.service}`);
  ctx.out.line(`Created timer file:   ${paths.timer}`);
  ctx.out.line("You can now enable and start the timer with:");
  ctx.out.line(`  $ systemctl --user enable ${TIMER_UNIT}`);
  ctx.out.line(`  $ systemctl --user start ${TIMER_UNIT}`);
}

export function printPaths(ctx: ToolContext): void {
  const paths = unitPaths(ctx.env);
  ctx.out.line(paths.service);
  ctx.out.line(paths.timer);
}

export async function editUnit(ctx: ToolContext, which: "service" | "timer"): Promise<void> {
  const paths = unitPaths(ctx.env);
  const target = which === "service" ? paths.service : paths.timer;
  if (!(await fileExists(target))) {
    ctx.out.line(`${which === "service" ? "Service" : "Timer"} file not found: ${target}`);
    return;
  }
  await openInEditor(ctx, target);
}

/** Remove both unit files; a file that is already gone is skipped. */
export async function deleteUnits(ctx: ToolContext): Promise<void> {
  const paths = unitPaths(ctx.env);
  for (const [label, path] of [["service", paths.service], ["timer", paths.timer]] as const) {
    if (!(await fileExists(path))) continue;
    await rm(path);
    ctx.out.line(`Deleted ${label} file: ${path}`);
  }
}

export async function handleConfigs(ctx: ToolContext, mode: ConfigsMode, settings: UnitSettings): Promise<void> {
  switch (mode) {
    case "paths":
      printPaths(ctx);
      return;
    case "create":
      await createUnits(ctx, settings);
      return;
    case "edit-service":
      await editUnit(ctx, "service");
      return;
    case "edit-timer":
      await editUnit(ctx, "timer");
      return;
    case "delete":
      await deleteUnits(ctx);
      return;
  }
}
