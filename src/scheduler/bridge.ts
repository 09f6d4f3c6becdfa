import type { ToolContext } from "../context.js";
import { describeCommand, type Command } from "../types/command.js";
import type { SchedulerIntent, TimerCadence } from "../types/options.js";
import { SERVICE_UNIT, TIMER_UNIT } from "../units/paths.js";

/** The fixed control invocation behind each lifecycle intent. */
export function schedulerCommand(intent: SchedulerIntent, logsSince: string): Command {
  switch (intent) {
    case "status":
      return { argv: ["systemctl", "--user", "status", TIMER_UNIT] };
    case "enable_and_start":
      return { argv: ["systemctl", "--user", "enable", "--now", TIMER_UNIT] };
    case "disable_and_stop":
      return { argv: ["systemctl", "--user", "disable", "--now", TIMER_UNIT] };
    case "logs":
      return { argv: ["journalctl", "--user-unit", SERVICE_UNIT, "--since", logsSince] };
  }
}

/** Echo the control command, then run it and wait. Its exit status is not inspected. */
export async function runSchedulerIntent(ctx: ToolContext, intent: SchedulerIntent): Promise<void> {
  const command = schedulerCommand(intent, ctx.config.logs.since);
  ctx.out.line(`Running: ${describeCommand(command)}`);
  await ctx.executor.execute(command);
}

/** --install-systemd-timer only points at the create/enable workflow. */
export function adviseTimerInstall(ctx: ToolContext, cadence: TimerCadence): void {
  ctx.out.line(`You requested to install a systemd timer: ${cadence}`);
  ctx.out.line("But the recommended way is to run: --configs create, then --enable_and_start.");
}
