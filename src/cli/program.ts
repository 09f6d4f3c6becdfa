// Command-line surface. commander owns the flag grammar (choices, --help,
// --version, conflicting intents); zod turns its untyped option bag into
// InvocationOptions; selectAction applies the dispatch priority.
import { Command, CommanderError, Option } from "commander";
import { z } from "zod";
import { OS_SELECTIONS } from "../types/distro.js";
import {
  CONFIGS_MODES,
  DEPENDENCY_MODES,
  SCHEDULER_INTENTS,
  TIMER_CADENCES,
  type InvocationOptions,
  type ParsedInvocation,
  type SchedulerIntent,
  type SelectedAction,
} from "../types/options.js";
import { ToolError, ToolErrorCode } from "../shared/errors.js";
import { DEFAULT_ON_CALENDAR } from "../config/schema.js";

export const PROGRAM_NAME = "daily-by-hostname";
export const PROGRAM_VERSION = "0.1.0";

/** Where commander writes help, version and usage errors. */
export interface ParseIo {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

export type ParseOutcome =
  | { readonly status: "parsed"; readonly invocation: ParsedInvocation }
  | { readonly status: "exit"; readonly exitCode: number };

const RawOptionsSchema = z.object({
  os: z.enum(OS_SELECTIONS).default("auto"),
  run: z.string().optional(),
  dryRun: z.string().optional(),
  verbose: z.boolean().default(false),
  dependencies: z.enum(DEPENDENCY_MODES).optional(),
  configs: z.enum(CONFIGS_MODES).optional(),
  runArg: z.string().optional(),
  installSystemdTimer: z.enum(TIMER_CADENCES).optional(),
  Persistent: z.string().optional(),
  OnCalendar: z.string().optional(),
  Description: z.string().optional(),
  status: z.boolean().default(false),
  enable_and_start: z.boolean().default(false),
  disable_and_stop: z.boolean().default(false),
  logs: z.boolean().default(false),
});

function intentOption(intent: SchedulerIntent, description: string): Option {
  return new Option(`--${intent}`, description).conflicts(SCHEDULER_INTENTS.filter((other) => other !== intent));
}

export function buildProgram(io?: ParseIo): Command {
  const program = new Command()
    .name(PROGRAM_NAME)
    .description("Daily script by hostname that can be run by a systemd user timer.")
    .version(PROGRAM_VERSION)
    .addOption(new Option("--os <os>", "select OS or auto-detect from /etc/os-release").choices(OS_SELECTIONS).default("auto"))
    .addOption(
      new Option("-f, --run <target>", "run the scripts in a directory, a single script, or a shell command")
        .conflicts("dryRun"),
    )
    .addOption(new Option("-n, --dry-run <target>", "print what --run would do without doing it"))
    .option("-v, --verbose", "enable verbose output")
    .addOption(new Option("--dependencies <mode>", "check required commands, or print install commands for missing ones").choices(DEPENDENCY_MODES))
    .addOption(new Option("--configs <mode>", "create, locate, edit or delete the systemd service/timer files").choices(CONFIGS_MODES))
    .option("--run-arg <target>", "target the timer passes to --run (required by --configs create)")
    .addOption(new Option("--install-systemd-timer <cadence>", "print guidance for installing a daily or hourly timer").choices(TIMER_CADENCES))
    .option("--Persistent <bool>", "set [Timer] Persistent= (default true)")
    .option("--OnCalendar <expr>", `set [Timer] OnCalendar= (default '${DEFAULT_ON_CALENDAR}')`)
    .option("--Description <text>", "set [Unit] Description= (default uses this tool's path)")
    .addOption(intentOption("status", "show the systemd user timer status"))
    .addOption(intentOption("enable_and_start", "enable and start the systemd user timer"))
    .addOption(intentOption("disable_and_stop", "disable and stop the systemd user timer"))
    .addOption(intentOption("logs", "show today's logs of the timer's service"))
    .allowExcessArguments(false)
    .exitOverride();

  if (io) program.configureOutput({ writeOut: io.writeOut, writeErr: io.writeErr });
  return program;
}

function toInvocationOptions(raw: z.infer<typeof RawOptionsSchema>): InvocationOptions {
  return {
    os: raw.os,
    run: raw.run,
    dryRun: raw.dryRun,
    verbose: raw.verbose,
    dependencies: raw.dependencies,
    configs: raw.configs,
    runArg: raw.runArg,
    installSystemdTimer: raw.installSystemdTimer,
    persistent: raw.Persistent,
    onCalendar: raw.OnCalendar,
    description: raw.Description,
    status: raw.status,
    enableAndStart: raw.enable_and_start,
    disableAndStop: raw.disable_and_stop,
    logs: raw.logs,
  };
}

function selectedIntent(options: InvocationOptions): SchedulerIntent | undefined {
  if (options.status) return "status";
  if (options.enableAndStart) return "enable_and_start";
  if (options.disableAndStop) return "disable_and_stop";
  if (options.logs) return "logs";
  return undefined;
}

/**
 * Pick the branch for this invocation, first match wins:
 * dependencies, configs, install-systemd-timer, scheduler intent, run/dry-run.
 * Returns the action and the branch flags it shadows.
 */
export function selectAction(options: InvocationOptions): { action: SelectedAction; ignored: string[] } {
  const candidates: Array<readonly [flag: string, action: SelectedAction]> = [];
  if (options.dependencies) candidates.push(["--dependencies", { kind: "dependencies", mode: options.dependencies }]);
  if (options.configs) candidates.push(["--configs", { kind: "configs", mode: options.configs }]);
  if (options.installSystemdTimer) {
    candidates.push(["--install-systemd-timer", { kind: "install-timer", cadence: options.installSystemdTimer }]);
  }
  const intent = selectedIntent(options);
  if (intent) candidates.push([`--${intent}`, { kind: "scheduler", intent }]);
  if (options.run) candidates.push(["--run", { kind: "run", target: options.run, dryRun: false }]);
  if (options.dryRun) candidates.push(["--dry-run", { kind: "run", target: options.dryRun, dryRun: true }]);

  const [chosen, ...shadowed] = candidates;
  if (chosen === undefined) return { action: { kind: "none" }, ignored: [] };
  return { action: chosen[1], ignored: shadowed.map(([flag]) => flag) };
}

function toolErrorFrom(err: CommanderError): ToolError {
  const code = err.code === "commander.conflictingOption"
    ? ToolErrorCode.CONFLICTING_ACTIONS
    : ToolErrorCode.INVALID_ARGUMENT;
  return new ToolError(code, err.message, { commanderCode: err.code });
}

/**
 * Parse user arguments (without the node and script entries).
 * Help and version end the invocation with status 0; malformed input
 * throws a ToolError after commander has printed its usage message.
 */
export function parseInvocation(args: readonly string[], io?: ParseIo): ParseOutcome {
  const program = buildProgram(io);
  try {
    program.parse([...args], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.exitCode === 0) return { status: "exit", exitCode: 0 };
      throw toolErrorFrom(err);
    }
    throw err;
  }

  const raw = RawOptionsSchema.safeParse(program.opts());
  if (!raw.success) {
    throw new ToolError(ToolErrorCode.INVALID_ARGUMENT, raw.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }

  const options = toInvocationOptions(raw.data);
  const { action, ignored } = selectAction(options);
  return { status: "parsed", invocation: { options, action, ignored } };
}
