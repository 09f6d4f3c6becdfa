import type { ToolConfig } from "./config/schema.js";
import type { Executor } from "./execution/executor.js";
import type { EnvironmentSnapshot } from "./types/env.js";

/** Line-oriented sink for the text a user reads on standard output. */
export interface Output {
  line(text: string): void;
}

/**
 * Shared invocation context, the glue between the handlers.
 * Created once per invocation in the entry point and passed to every handler.
 */
export interface ToolContext {
  readonly env: EnvironmentSnapshot;
  readonly config: ToolConfig;
  readonly executor: Executor;
  readonly out: Output;
  readonly verbose: boolean;
}

export const consoleOutput: Output = {
  line(text: string): void {
    process.stdout.write(`${text}\n`);
  },
};
