import type { Command } from "../../types/command.js";
import type { PackageCommands } from "./interface.js";

const PLACEHOLDER = "<your_package_manager_install_command>";

/** Unrecognized systems: the user substitutes their own package manager. */
export class GenericCommands implements PackageCommands {
  packageInstall(packages: readonly string[]): Command {
    return { argv: [PLACEHOLDER, ...packages] };
  }
}
