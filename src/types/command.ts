/**
 * A structured command ready for execution.
 * With `shell: true` the single argv entry is handed to /bin/sh verbatim:
 * untrusted passthrough, no quoting or escaping is applied.
 */
export interface Command {
  readonly argv: readonly string[];
  readonly shell?: boolean;
}

/** Render a command the way it is echoed to the user. */
export function describeCommand(command: Command): string {
  return command.argv.join(" ");
}
