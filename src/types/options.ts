import type { OsSelection } from "./distro.js";

export type DependencyMode = "check" | "script";
export type ConfigsMode = "create" | "paths" | "edit-timer" | "edit-service" | "delete";
export type TimerCadence = "daily" | "hourly";
export type SchedulerIntent = "status" | "enable_and_start" | "disable_and_stop" | "logs";

export const DEPENDENCY_MODES = ["check", "script"] as const satisfies readonly DependencyMode[];
export const CONFIGS_MODES = ["create", "paths", "edit-timer", "edit-service", "delete"] as const satisfies readonly ConfigsMode[];
export const TIMER_CADENCES = ["daily", "hourly"] as const satisfies readonly TimerCadence[];
export const SCHEDULER_INTENTS = ["status", "enable_and_start", "disable_and_stop", "logs"] as const satisfies readonly SchedulerIntent[];

/** Parsed command-line flags. Unset optional flags are undefined. */
export interface InvocationOptions {
  readonly os: OsSelection;
  readonly run?: string;
  readonly dryRun?: string;
  readonly verbose: boolean;
  readonly dependencies?: DependencyMode;
  readonly configs?: ConfigsMode;
  readonly runArg?: string;
  readonly installSystemdTimer?: TimerCadence;
  /** Raw --Persistent value; coerced when the timer file is rendered. */
  readonly persistent?: string;
  readonly onCalendar?: string;
  readonly description?: string;
  readonly status: boolean;
  readonly enableAndStart: boolean;
  readonly disableAndStop: boolean;
  readonly logs: boolean;
}

/** The one branch an invocation takes, in dispatch priority order. */
export type SelectedAction =
  | { readonly kind: "dependencies"; readonly mode: DependencyMode }
  | { readonly kind: "configs"; readonly mode: ConfigsMode }
  | { readonly kind: "install-timer"; readonly cadence: TimerCadence }
  | { readonly kind: "scheduler"; readonly intent: SchedulerIntent }
  | { readonly kind: "run"; readonly target: string; readonly dryRun: boolean }
  | { readonly kind: "none" };

export interface ParsedInvocation {
  readonly options: InvocationOptions;
  readonly action: SelectedAction;
  /** Flags given alongside the selected action that it shadows. */
  readonly ignored: readonly string[];
}
