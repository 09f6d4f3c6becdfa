import { adviseTimerInstall, runSchedulerIntent, schedulerCommand } from "../../../src/scheduler/bridge.js";
import { DEFAULT_CONFIG } from "../../../src/config/schema.js";
import { makeContext } from "../../support/fakes.js";

describe("scheduler control bridge", () => {
  it.each([
    ["status", ["systemctl", "--user", "status", "daily_by_hostname.timer"]],
    ["enable_and_start", ["systemctl", "--user", "enable", "--now", "daily_by_hostname.timer"]],
    ["disable_and_stop", ["systemctl", "--user", "disable", "--now", "daily_by_hostname.timer"]],
    ["logs", ["journalctl", "--user-unit", "daily_by_hostname.service", "--since", "today"]],
  ] as const)("maps %s to a fixed control command", (intent, argv) => {
    expect(schedulerCommand(intent, "today").argv).toEqual(argv);
  });

  it("echoes the command before running it", async () => {
    const ctx = makeContext();
    await runSchedulerIntent(ctx, "enable_and_start");

    expect(ctx.out.lines).toEqual(["Running: systemctl --user enable --now daily_by_hostname.timer"]);
    expect(ctx.executor.commands).toEqual([
      { argv: ["systemctl", "--user", "enable", "--now", "daily_by_hostname.timer"] },
    ]);
  });

  it("takes the log window from the config", async () => {
    const ctx = makeContext({ config: { ...DEFAULT_CONFIG, logs: { since: "yesterday" } } });
    await runSchedulerIntent(ctx, "logs");

    expect(ctx.out.lines).toEqual(["Running: journalctl --user-unit daily_by_hostname.service --since yesterday"]);
  });

  it("only advises on --install-systemd-timer", () => {
    const ctx = makeContext();
    adviseTimerInstall(ctx, "hourly");

    expect(ctx.out.lines).toEqual([
      "You requested to install a systemd timer: hourly",
      "But the recommended way is to run: --configs create, then --enable_and_start.",
    ]);
    expect(ctx.executor.commands).toEqual([]);
  });
});
