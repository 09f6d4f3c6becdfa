/**
 * Everything a handler may learn about its surroundings.
 * Captured once in the entry point so handlers stay free of global lookups.
 */
export interface EnvironmentSnapshot {
  /** Process variables (PATH, EDITOR, XDG_CONFIG_HOME, ...). */
  readonly vars: Readonly<Record<string, string | undefined>>;
  readonly homeDir: string;
  /** Absolute path of this tool's entry script. */
  readonly toolPath: string;
  /** Absolute path of the Node.js executable running the tool. */
  readonly nodePath: string;
  /** System identification file consulted by OS auto-detection. */
  readonly osReleasePath: string;
}
