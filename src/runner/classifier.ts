import { constants, type Stats } from "node:fs";
import { stat } from "node:fs/promises";

/** What the runner found at a target path. */
export type TargetKind = "directory" | "executable-file" | "non-executable-file" | "opaque-command";

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch {
    return null;
  }
}

function ownerExecutable(st: Stats): boolean {
  return (st.mode & constants.S_IXUSR) !== 0;
}

/** True for a regular file with the owner-execute bit set. */
export async function isExecutable(path: string): Promise<boolean> {
  const st = await statOrNull(path);
  return st !== null && st.isFile() && ownerExecutable(st);
}

/** Classify a run target; anything that is neither a file nor a directory is a command line. */
export async function classifyTarget(target: string): Promise<TargetKind> {
  const st = await statOrNull(target);
  if (st?.isDirectory()) return "directory";
  if (st?.isFile()) return ownerExecutable(st) ? "executable-file" : "non-executable-file";
  return "opaque-command";
}
