/** OS selection accepted on the command line. */
export type OsSelection = "auto" | "arch" | "ubuntu";

/** Distribution family resolved once per invocation. */
export type OsFamily = "arch" | "ubuntu" | "unknown";

export const OS_SELECTIONS = ["auto", "arch", "ubuntu"] as const satisfies readonly OsSelection[];
