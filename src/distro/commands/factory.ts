// Adding a family requires a new PackageCommands class, a case here,
// and a marker in the detector.
import type { OsFamily } from "../../types/distro.js";
import type { PackageCommands } from "./interface.js";
import { ArchCommands } from "./arch.js";
import { UbuntuCommands } from "./ubuntu.js";
import { GenericCommands } from "./generic.js";

export function createPackageCommands(family: OsFamily): PackageCommands {
  switch (family) {
    case "arch": return new ArchCommands();
    case "ubuntu": return new UbuntuCommands();
    case "unknown": return new GenericCommands();
  }
}
