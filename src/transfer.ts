// src/transfer.ts
import fsp from "node:fs/promises";
import { TransferError } from "./errors.js";
import { argsJoin, defaultCommandRunner, type CommandRunner } from "./exec.js";
import type { HostRecord } from "./host-registry.js";
import { NullLogger, type Logger } from "./logger.js";
import { expandHome } from "./settings.js";

export type TransferDirection = "upload" | "download";

export type TransferOptions = {
  rsync?: boolean;
};

export type TransferPlan = {
  direction: TransferDirection;
  command: "scp" | "rsync";
  args: string[];
  destination: string;
  display: string;
};

export type TransferSummary = TransferPlan & {
  elapsedMs: number;
};

export type TransferDriverParams = {
  host: HostRecord;
  runner?: CommandRunner;
  logger?: Logger;
  print?: (line: string) => void;
  platform?: NodeJS.Platform;
  clock?: () => number;
};

/** scp/rsync need a trailing separator to treat the target as a directory. */
export function asDirectory(p: string): string {
  return p.endsWith("/") ? p : `${p}/`;
}

function fmtSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export class TransferDriver {
  private readonly host: HostRecord;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly print: (line: string) => void;
  private readonly platform: NodeJS.Platform;
  private readonly clock: () => number;

  constructor(params: TransferDriverParams) {
    this.host = params.host;
    this.runner = params.runner ?? defaultCommandRunner;
    this.logger = params.logger ?? new NullLogger();
    this.print = params.print ?? ((line) => console.log(line));
    this.platform = params.platform ?? process.platform;
    this.clock = params.clock ?? Date.now;
  }

  private get target(): string {
    const [, username, address] = this.host;
    return `${username}@${address}`;
  }

  private baseArgs(rsync: boolean): { command: "scp" | "rsync"; args: string[] } {
    const port = String(this.host[3]);
    if (!rsync) {
      return { command: "scp", args: ["-pr", "-P", port] };
    }
    if (this.platform === "win32") {
      throw new TransferError("rsync is disabled on Windows; use scp", 1);
    }
    return { command: "rsync", args: ["-azP", "-e", `ssh -p ${port}`] };
  }

  planUpload(
    sources: string[],
    destination: string,
    opts: TransferOptions = {},
  ): TransferPlan {
    const { command, args } = this.baseArgs(!!opts.rsync);
    const remoteDir = asDirectory(destination);
    const full = [
      ...args,
      ...sources.map((s) => expandHome(s)),
      `${this.target}:${remoteDir}`,
    ];
    return {
      direction: "upload",
      command,
      args: full,
      destination: remoteDir,
      display: argsJoin([command, ...full]),
    };
  }

  planDownload(
    sources: string[],
    destination: string,
    opts: TransferOptions = {},
  ): TransferPlan {
    const { command, args } = this.baseArgs(!!opts.rsync);
    const localDir = asDirectory(expandHome(destination));
    const full = [
      ...args,
      ...sources.map((s) => `${this.target}:${s}`),
      localDir,
    ];
    return {
      direction: "download",
      command,
      args: full,
      destination: localDir,
      display: argsJoin([command, ...full]),
    };
  }

  async upload(
    sources: string[],
    destination: string,
    opts: TransferOptions = {},
  ): Promise<TransferSummary> {
    return await this.execute(this.planUpload(sources, destination, opts));
  }

  async download(
    sources: string[],
    destination: string,
    opts: TransferOptions = {},
  ): Promise<TransferSummary> {
    const plan = this.planDownload(sources, destination, opts);
    await fsp.mkdir(plan.destination, { recursive: true });
    return await this.execute(plan);
  }

  private async execute(plan: TransferPlan): Promise<TransferSummary> {
    const verb = plan.direction === "upload" ? "uploading" : "downloading";
    this.print(`=> Starting ${verb}...`);
    this.logger.info(`running ${plan.display}`);
    const started = this.clock();
    const result = await this.runner(plan.command, plan.args, {
      stdio: "inherit",
    });
    this.logger.info("transfer finished", {
      command: plan.command,
      code: result.code,
    });
    if (result.code !== 0) {
      throw new TransferError(
        `${plan.command} exited with code ${result.code}`,
        result.code,
        { command: plan.display },
      );
    }
    const elapsedMs = this.clock() - started;
    this.print(`=> Finished ${verb} in ${fmtSeconds(elapsedMs)}`);
    return { ...plan, elapsedMs };
  }
}
