import { homedir } from "node:os";
import { resolve } from "node:path";
import type { EnvironmentSnapshot } from "../types/env.js";

export const OS_RELEASE_PATH = "/etc/os-release";

/**
 * Snapshot the live process for the handlers, which never read process
 * globals themselves.
 */
export function captureEnvironment(entryPath: string): EnvironmentSnapshot {
  return {
    vars: { ...process.env },
    homeDir: homedir(),
    toolPath: resolve(entryPath),
    nodePath: process.execPath,
    osReleasePath: OS_RELEASE_PATH,
  };
}
