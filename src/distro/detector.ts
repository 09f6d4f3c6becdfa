import { readFile } from "node:fs/promises";
import type { OsFamily, OsSelection } from "../types/distro.js";
import type { EnvironmentSnapshot } from "../types/env.js";
import { logger } from "../logger.js";

/** Markers searched in the system identification file, in priority order. */
const FAMILY_MARKERS: ReadonlyArray<readonly [marker: string, family: OsFamily]> = [
  ["arch linux", "arch"],
  ["ubuntu", "ubuntu"],
];

/** Resolve a family from the raw os-release text (case-insensitive substring match). */
export function resolveFamily(osRelease: string): OsFamily {
  const content = osRelease.toLowerCase();
  for (const [marker, family] of FAMILY_MARKERS) {
    if (content.includes(marker)) return family;
  }
  return "unknown";
}

/**
 * Detect the OS family. An explicit selection wins without touching the
 * filesystem; "auto" reads the identification file and maps a missing or
 * unreadable file to "unknown".
 */
export async function detectOs(selection: OsSelection, env: EnvironmentSnapshot): Promise<OsFamily> {
  if (selection !== "auto") return selection;

  let content: string;
  try {
    content = await readFile(env.osReleasePath, "utf-8");
  } catch (err) {
    logger.debug({ path: env.osReleasePath, error: err }, "Could not read os-release");
    return "unknown";
  }

  const family = resolveFamily(content);
  logger.debug({ family }, "OS detection complete");
  return family;
}
