import { LocalExecutor } from "../../../src/execution/executor.js";
import { shellPassthroughCommand } from "../../../src/runner/runner.js";

describe("LocalExecutor", () => {
  const executor = new LocalExecutor({ stdio: "pipe" });

  it("runs a command line through the shell", async () => {
    const result = await executor.execute(shellPassthroughCommand("echo hello"));
    expect(result.stdout).toBe("hello");
    expect(result.exitCode).toBe(0);
  });

  it("passes shell metacharacters through unescaped", async () => {
    const result = await executor.execute(shellPassthroughCommand("echo one; echo two"));
    expect(result.stdout).toBe("one\ntwo");
  });

  it("reports a non-zero exit instead of throwing", async () => {
    const result = await executor.execute(shellPassthroughCommand("exit 3"));
    expect(result.exitCode).toBe(3);
  });

  it("resolves when the program cannot be started", async () => {
    const result = await executor.execute({ argv: ["/nonexistent/dbh-missing-program"] });
    expect(result.exitCode).not.toBe(0);
  });
});
