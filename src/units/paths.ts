import { join } from "node:path";
import { userConfigRoot } from "../config/loader.js";
import type { EnvironmentSnapshot } from "../types/env.js";

/** Fixed base name of the generated units; independent of the run target. */
export const UNIT_BASE_NAME = "daily_by_hostname";
export const SERVICE_UNIT = `${UNIT_BASE_NAME}.service`;
export const TIMER_UNIT = `${UNIT_BASE_NAME}.timer`;

export interface UnitPaths {
  readonly dir: string;
  readonly service: string;
  readonly timer: string;
}

export function unitPaths(env: EnvironmentSnapshot): UnitPaths {
  const dir = join(userConfigRoot(env), "systemd", "user");
  return { dir, service: join(dir, SERVICE_UNIT), timer: join(dir, TIMER_UNIT) };
}
