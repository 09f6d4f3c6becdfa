import type { Command } from "../../types/command.js";
import type { PackageCommands } from "./interface.js";

/** Arch Linux (pacman). */
export class ArchCommands implements PackageCommands {
  packageInstall(packages: readonly string[]): Command {
    return { argv: ["sudo", "pacman", "-S", ...packages] };
  }
}
