import type { Command } from "../../types/command.js";
import type { PackageCommands } from "./interface.js";

/** Ubuntu and other apt-based systems. */
export class UbuntuCommands implements PackageCommands {
  packageInstall(packages: readonly string[]): Command {
    return { argv: ["sudo", "apt-get", "install", ...packages] };
  }
}
