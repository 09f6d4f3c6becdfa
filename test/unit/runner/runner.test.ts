import fs from "fs/promises";
import os from "os";
import path from "path";
import { LocalExecutor } from "../../../src/execution/executor.js";
import { directCommand, runTarget } from "../../../src/runner/runner.js";
import { makeContext, RecordingExecutor } from "../../support/fakes.js";

describe("runTarget", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "dbh-run-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function writeScript(name: string, mode: number): Promise<string> {
    const file = path.join(tmpDir, name);
    await fs.writeFile(file, "#!/bin/sh\necho ran\n");
    await fs.chmod(file, mode);
    return file;
  }

  describe("directory", () => {
    let plain: string;
    let exec: string;
    let sub: string;

    beforeEach(async () => {
      plain = await writeScript("a-plain", 0o644);
      exec = await writeScript("b-exec", 0o755);
      sub = path.join(tmpDir, "c-sub");
      await fs.mkdir(sub);
    });

    it("traces every entry in lexicographic order on a verbose dry run", async () => {
      const ctx = makeContext({ verbose: true });
      await runTarget(ctx, tmpDir, true);

      expect(ctx.out.lines).toEqual([
        `Skipping: '${plain}' is not an executable file`,
        `Found executable script: ${exec}`,
        `[DRYRUN] Would run: '${exec}'`,
        `Skipping: '${sub}' is not an executable file`,
      ]);
      expect(ctx.executor.commands).toEqual([]);
    });

    it("spawns only the executable entry, without a shell", async () => {
      const ctx = makeContext();
      await runTarget(ctx, tmpDir, false);

      expect(ctx.out.lines).toEqual([`Running: '${exec}'`]);
      expect(ctx.executor.commands).toEqual([{ argv: [exec] }]);
    });

    it("keeps going after an entry fails", async () => {
      const second = await writeScript("d-exec", 0o700);
      const ctx = makeContext({ executor: new RecordingExecutor(1) });
      await runTarget(ctx, tmpDir, false);

      expect(ctx.executor.commands).toEqual([{ argv: [exec] }, { argv: [second] }]);
    });
  });

  describe("relative to the working directory", () => {
    const originalCwd = process.cwd();

    beforeEach(async () => {
      await fs.writeFile(path.join(tmpDir, "job.sh"), "#!/bin/sh\ntouch ran.marker\n");
      await fs.chmod(path.join(tmpDir, "job.sh"), 0o755);
      process.chdir(tmpDir);
    });

    afterEach(() => {
      process.chdir(originalCwd);
    });

    it("runs the directory's scripts, not programs of the same name on PATH", async () => {
      const ctx = { ...makeContext({ verbose: true }), executor: new LocalExecutor({ stdio: "pipe" }) };
      await runTarget(ctx, ".", false);

      expect(ctx.out.lines).toEqual(["Found executable script: ./job.sh", "Running: './job.sh'"]);
      expect(await fs.access(path.join(tmpDir, "ran.marker")).then(() => true, () => false)).toBe(true);
    });

    it("runs a bare file name from the working directory", async () => {
      const ctx = makeContext();
      await runTarget(ctx, "job.sh", false);

      expect(ctx.out.lines).toEqual(["Running file: 'job.sh'"]);
      expect(ctx.executor.commands).toEqual([{ argv: ["./job.sh"] }]);
    });
  });

  it("leaves paths that already name a directory untouched", () => {
    expect(directCommand("/srv/jobs/a").argv).toEqual(["/srv/jobs/a"]);
    expect(directCommand("jobs/a").argv).toEqual(["jobs/a"]);
    expect(directCommand("b").argv).toEqual(["./b"]);
  });

  it("runs an executable file directly", async () => {
    const exec = await writeScript("job", 0o755);
    const dry = makeContext();
    await runTarget(dry, exec, true);
    expect(dry.out.lines).toEqual([`[DRYRUN] Would run file: '${exec}'`]);
    expect(dry.executor.commands).toEqual([]);

    const real = makeContext();
    await runTarget(real, exec, false);
    expect(real.out.lines).toEqual([`Running file: '${exec}'`]);
    expect(real.executor.commands).toEqual([{ argv: [exec] }]);
  });

  it("hands a non-executable file to bash", async () => {
    const plain = await writeScript("job.sh", 0o644);
    const dry = makeContext({ verbose: true });
    await runTarget(dry, plain, true);
    expect(dry.out.lines).toEqual([
      `'${plain}' is a file but probably not executable. Attempting to run in shell.`,
      `[DRYRUN] Would run via shell: '${plain}'`,
    ]);
    expect(dry.executor.commands).toEqual([]);

    const real = makeContext();
    await runTarget(real, plain, false);
    expect(real.out.lines).toEqual([]);
    expect(real.executor.commands).toEqual([{ argv: ["bash", plain] }]);
  });

  it("treats anything else as a shell command line", async () => {
    const dry = makeContext();
    await runTarget(dry, "echo hello", true);
    expect(dry.out.lines).toEqual(["[DRYRUN] Would run command: echo hello"]);
    expect(dry.executor.commands).toEqual([]);

    const real = makeContext();
    await runTarget(real, "echo hello", false);
    expect(real.out.lines).toEqual([]);
    expect(real.executor.commands).toEqual([{ argv: ["echo hello"], shell: true }]);
  });
});
