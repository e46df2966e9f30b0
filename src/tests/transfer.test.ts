import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { TransferError } from "../errors.js";
import type { CommandResult, CommandRunner, RunOptions } from "../exec.js";
import type { HostRecord } from "../host-registry.js";
import { TransferDriver } from "../transfer.js";

const host: HostRecord = ["hpc", "bob", "hpc.example.org", 2222];

function fakeRunner(result: Partial<CommandResult> = {}) {
  const calls: { command: string; args: string[]; options?: RunOptions }[] = [];
  const runner: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    return { code: 0, stdout: "", stderr: "", ...result };
  };
  return { calls, runner };
}

function ticking(...values: number[]): () => number {
  let i = 0;
  return () => values[Math.min(i++, values.length - 1)] ?? 0;
}

describe("TransferDriver", () => {
  it("plans an scp upload into a remote directory", () => {
    const driver = new TransferDriver({ host, platform: "linux" });
    const plan = driver.planUpload(["data.csv", "jobs"], "/scratch/run1");
    expect(plan.command).toBe("scp");
    expect(plan.args).toEqual([
      "-pr",
      "-P",
      "2222",
      "data.csv",
      "jobs",
      "bob@hpc.example.org:/scratch/run1/",
    ]);
    expect(plan.display).toBe(
      "scp -pr -P 2222 data.csv jobs bob@hpc.example.org:/scratch/run1/",
    );
  });

  it("plans an rsync download and quotes the ssh option for display", () => {
    const driver = new TransferDriver({ host, platform: "linux" });
    const plan = driver.planDownload(["/scratch/out.txt"], "results/", { rsync: true });
    expect(plan.args).toEqual([
      "-azP",
      "-e",
      "ssh -p 2222",
      "bob@hpc.example.org:/scratch/out.txt",
      "results/",
    ]);
    expect(plan.display).toBe(
      "rsync -azP -e 'ssh -p 2222' bob@hpc.example.org:/scratch/out.txt results/",
    );
  });

  it("refuses rsync on Windows", () => {
    const driver = new TransferDriver({ host, platform: "win32" });
    const attempt = () => driver.planUpload(["a"], "/tmp", { rsync: true });
    expect(attempt).toThrow(TransferError);
    expect(attempt).toThrow("rsync is disabled on Windows; use scp");
  });

  it("uploads with the terminal attached and reports the elapsed time", async () => {
    const { calls, runner } = fakeRunner();
    const printed: string[] = [];
    const driver = new TransferDriver({
      host,
      runner,
      platform: "linux",
      print: (line) => printed.push(line),
      clock: ticking(1000, 3500),
    });
    const summary = await driver.upload(["a.txt"], "/tmp");
    expect(calls).toEqual([
      {
        command: "scp",
        args: ["-pr", "-P", "2222", "a.txt", "bob@hpc.example.org:/tmp/"],
        options: { stdio: "inherit" },
      },
    ]);
    expect(printed).toEqual(["=> Starting uploading...", "=> Finished uploading in 2.5s"]);
    expect(summary.elapsedMs).toBe(2500);
  });

  it("raises the tool's exit code and skips the finished line", async () => {
    const { runner } = fakeRunner({ code: 1 });
    const printed: string[] = [];
    const driver = new TransferDriver({
      host,
      runner,
      platform: "linux",
      print: (line) => printed.push(line),
    });
    const err = await driver.upload(["missing.txt"], "/tmp").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransferError);
    if (err instanceof TransferError) {
      expect(err.code).toBe(1);
      expect(err.exitCode).toBe(1);
      expect(err.message).toBe("scp exited with code 1");
    }
    expect(printed).toEqual(["=> Starting uploading..."]);
  });

  it("creates the local directory before downloading", async () => {
    const tmp = await fsp.mkdtemp(path.join(os.tmpdir(), "rpbs-dl-"));
    try {
      const target = path.join(tmp, "out", "nested");
      const { calls, runner } = fakeRunner();
      const printed: string[] = [];
      const driver = new TransferDriver({
        host,
        runner,
        platform: "linux",
        print: (line) => printed.push(line),
        clock: ticking(0, 100),
      });
      await driver.download(["/scratch/a.log"], target);
      expect((await fsp.stat(target)).isDirectory()).toBe(true);
      expect(calls[0]?.args).toEqual([
        "-pr",
        "-P",
        "2222",
        "bob@hpc.example.org:/scratch/a.log",
        `${target}/`,
      ]);
      expect(printed).toEqual([
        "=> Starting downloading...",
        "=> Finished downloading in 0.1s",
      ]);
    } finally {
      await fsp.rm(tmp, { recursive: true, force: true });
    }
  });
});
