import type { Command } from "../../types/command.js";

/**
 * Family-specific package manager commands.
 * The dependency advisor expresses intent here; implementations pick the tool.
 */
export interface PackageCommands {
  packageInstall(packages: readonly string[]): Command;
}
