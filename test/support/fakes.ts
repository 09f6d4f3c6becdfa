import type { Output, ToolContext } from "../../src/context.js";
import type { ExecResult, Executor } from "../../src/execution/executor.js";
import type { Command } from "../../src/types/command.js";
import type { EnvironmentSnapshot } from "../../src/types/env.js";
import { DEFAULT_CONFIG, type ToolConfig } from "../../src/config/schema.js";

/** Records every command instead of spawning it. */
export class RecordingExecutor implements Executor {
  readonly commands: Command[] = [];

  constructor(private readonly exitCode = 0) {}

  async execute(command: Command): Promise<ExecResult> {
    this.commands.push(command);
    return { stdout: "", stderr: "", exitCode: this.exitCode, durationMs: 0 };
  }
}

export class BufferOutput implements Output {
  readonly lines: string[] = [];

  line(text: string): void {
    this.lines.push(text);
  }
}

export function makeEnv(overrides: Partial<EnvironmentSnapshot> = {}): EnvironmentSnapshot {
  return {
    vars: { PATH: "" },
    homeDir: "/home/tester",
    toolPath: "/opt/daily-by-hostname/dist/src/cli.js",
    nodePath: "/usr/bin/node",
    osReleasePath: "/nonexistent/os-release",
    ...overrides,
  };
}

export interface TestContext extends ToolContext {
  readonly executor: RecordingExecutor;
  readonly out: BufferOutput;
}

export function makeContext(
  options: { env?: Partial<EnvironmentSnapshot>; config?: ToolConfig; verbose?: boolean; executor?: RecordingExecutor } = {}
): TestContext {
  return {
    env: makeEnv(options.env),
    config: options.config ?? DEFAULT_CONFIG,
    executor: options.executor ?? new RecordingExecutor(),
    out: new BufferOutput(),
    verbose: options.verbose ?? false,
  };
}
