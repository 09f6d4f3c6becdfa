import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import { delimiter, join } from "node:path";
import type { EnvironmentSnapshot } from "../types/env.js";

/** Resolve a program name against the snapshot's PATH; null when not found. */
export async function which(program: string, env: EnvironmentSnapshot): Promise<string | null> {
  const dirs = (env.vars.PATH ?? "").split(delimiter).filter(Boolean);
  for (const dir of dirs) {
    const candidate = join(dir, program);
    try {
      const st = await stat(candidate);
      if (!st.isFile()) continue;
      await access(candidate, constants.X_OK);
      return candidate;
    } catch {
      continue;
    }
  }
  return null;
}
