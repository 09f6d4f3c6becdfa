/** Values substituted into the service/timer pair. */
export interface UnitTemplateParams {
  readonly description: string;
  readonly onCalendar: string;
  readonly persistent: "true" | "false";
  readonly nodePath: string;
  readonly toolPath: string;
  readonly runArg: string;
}

/**
 * Coerce a raw --Persistent value. The exact strings "true" and "false" are
 * kept, an unset flag takes the configured default, and any other value
 * becomes "true".
 */
export function coercePersistent(raw: string | undefined, fallback: boolean): "true" | "false" {
  if (raw === undefined) return fallback ? "true" : "false";
  if (raw === "false") return "false";
  return "true";
}

export function renderService(params: UnitTemplateParams): string {
  return [
    "[Unit]",
    `Description=${params.description}`,
    "After=network.target",
    "",
    "[Service]",
    "Type=oneshot",
    `ExecStart=${params.nodePath} ${params.toolPath} --run "${params.runArg}"`,
    "",
    "# End of service file\n",
  ].join("\n");
}

export function renderTimer(params: UnitTemplateParams): string {
  return [
    "[Unit]",
    `Description=Timer for: ${params.description}`,
    "",
    "[Timer]",
    `OnCalendar=${params.onCalendar}`,
    `Persistent=${params.persistent}`,
    "",
    "[Install]",
    "WantedBy=default.target",
    "",
    "# End of timer file\n",
  ].join("\n");
}
