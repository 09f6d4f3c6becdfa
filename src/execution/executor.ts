// Process delegation layer: every script, shell line, editor and scheduler
// control call passes through here. Results are reported, never thrown:
// a failing child does not change this tool's own exit status.
import execa from "execa";
import { describeCommand, type Command } from "../types/command.js";
import { logger } from "../logger.js";

/** Exit code reported when the process could not be started at all. */
export const SPAWN_FAILED_EXIT_CODE = 127;

/** Result of command execution. stdout/stderr are empty unless piped. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

/** Executor interface, faked in tests. */
export interface Executor {
  execute(command: Command): Promise<ExecResult>;
}

export interface LocalExecutorOptions {
  /** "inherit" hands the terminal to the child; "pipe" captures its output. */
  stdio?: "inherit" | "pipe";
}

/** Local executor using execa; waits for each child to finish. */
export class LocalExecutor implements Executor {
  private readonly stdio: "inherit" | "pipe";

  constructor(options: LocalExecutorOptions = {}) {
    this.stdio = options.stdio ?? "inherit";
  }

  async execute(command: Command): Promise<ExecResult> {
    const start = performance.now();
    const [file, ...args] = command.argv;
    if (file === undefined) {
      logger.warn("Refusing to execute an empty command");
      return { stdout: "", stderr: "", exitCode: SPAWN_FAILED_EXIT_CODE, durationMs: 0 };
    }

    const result = await execa(file, args, {
      shell: command.shell === true,
      stdio: this.stdio,
      reject: false,
    });
    const durationMs = Math.round(performance.now() - start);
    // exitCode is absent when the child never started (ENOENT, EACCES)
    const exitCode = typeof result.exitCode === "number" ? result.exitCode : SPAWN_FAILED_EXIT_CODE;

    if (result.failed) {
      logger.debug(
        { command: describeCommand(command), exitCode, signal: result.signal, durationMs },
        "Delegated process failed",
      );
    } else {
      logger.debug({ command: describeCommand(command), exitCode, durationMs }, "Delegated process finished");
    }

    return {
      stdout: typeof result.stdout === "string" ? result.stdout : "",
      stderr: typeof result.stderr === "string" ? result.stderr : "",
      exitCode,
      durationMs,
    };
  }
}
