// src/submitter.ts
import fsp from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { QUEUE_STATUS_COMMAND, QUEUE_SUBMIT_COMMAND } from "./constants.js";
import type { CommandDispatcher } from "./dispatcher.js";
import { MissingFileError, SubmissionError } from "./errors.js";
import { argsJoin, defaultCommandRunner, type CommandRunner } from "./exec.js";
import { NullLogger, type Logger } from "./logger.js";
import { expandHome } from "./settings.js";
import type { TransferDriver, TransferOptions } from "./transfer.js";

export type SubmitReport = {
  files: string[];
  commands: string[];
};

export type LocalSubmitOptions = {
  workdir?: string;
  dryRun?: boolean;
};

export type RemoteSubmitOptions = {
  workdir: string;
  dryRun?: boolean;
};

export type JobSubmitterParams = {
  runner?: CommandRunner;
  logger?: Logger;
  print?: (line: string) => void;
};

/** `ls -p` marks directories with `/`; multi-dir listings add `name:` headers. */
export function filterListing(listing: string): string[] {
  return listing
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "")
    .filter((line) => !(line.length > 1 && (line.endsWith("/") || line.endsWith(":"))));
}

export function remoteSubmitCommand(workdir: string, files: string[]): string {
  return `cd ${workdir}; for i in ${files.join(" ")}; do ${QUEUE_SUBMIT_COMMAND} $i; done`;
}

export function statusCommand(jobId?: string): string {
  return jobId ? `${QUEUE_STATUS_COMMAND} ${jobId}` : QUEUE_STATUS_COMMAND;
}

/** Submits job files found on this machine with the local queue command. */
export class JobSubmitter {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly print: (line: string) => void;

  constructor(params: JobSubmitterParams = {}) {
    this.runner = params.runner ?? defaultCommandRunner;
    this.logger = params.logger ?? new NullLogger();
    this.print = params.print ?? ((line) => console.log(line));
  }

  async resolveLocal(patterns: string[]): Promise<string[]> {
    const files: string[] = [];
    for (const pattern of patterns) {
      const expanded = expandHome(pattern);
      const matches = fg.isDynamicPattern(expanded)
        ? (await fg(expanded, { onlyFiles: false, dot: true })).sort()
        : [expanded];
      let found = false;
      for (const match of matches) {
        const st = await fsp.stat(match).catch(() => null);
        if (!st) continue;
        found = true;
        if (st.isDirectory()) {
          this.logger.warn(`directory ${match} is skipped; nothing in it will be submitted`);
        } else {
          files.push(match);
        }
      }
      if (!found) throw new MissingFileError(pattern);
    }
    return files;
  }

  async submitLocal(
    patterns: string[],
    opts: LocalSubmitOptions = {},
  ): Promise<SubmitReport> {
    const workdir = path.resolve(expandHome(opts.workdir ?? process.cwd()));
    const files = await this.resolveLocal(patterns);
    const commands: string[] = [];
    for (const file of files) {
      const target = path.resolve(file);
      const display = `cd ${workdir}; ${argsJoin([QUEUE_SUBMIT_COMMAND, target])}`;
      commands.push(display);
      if (opts.dryRun) {
        this.print(display);
        continue;
      }
      this.logger.info(`running ${display}`);
      const result = await this.runner(QUEUE_SUBMIT_COMMAND, [target], {
        cwd: workdir,
      });
      if (result.code !== 0) {
        throw new SubmissionError(
          `${QUEUE_SUBMIT_COMMAND} ${target} failed: ${result.stderr.trim() || `exit code ${result.code}`}`,
          result.code,
          { file: target },
        );
      }
      const jobId = result.stdout.trim();
      this.print(jobId ? `${path.basename(target)}: ${jobId}` : path.basename(target));
    }
    return { files, commands };
  }
}

export async function listRemoteJobs(
  dispatcher: CommandDispatcher,
  patterns: string[],
): Promise<string[]> {
  const listing = await dispatcher.runInline(`ls -p ${patterns.join(" ")}`, false);
  return filterListing(listing);
}

/**
 * Submits job files that live on the active host in one remote shell loop.
 * A dry run prints the loop over the raw patterns without connecting; the
 * remote shell expands them the same way.
 */
export async function submitRemote(
  dispatcher: CommandDispatcher | null,
  patterns: string[],
  opts: RemoteSubmitOptions,
  print: (line: string) => void = (line) => console.log(line),
): Promise<SubmitReport> {
  if (opts.dryRun || !dispatcher) {
    const command = remoteSubmitCommand(opts.workdir, patterns);
    print(command);
    return { files: [], commands: [command] };
  }
  const files = await listRemoteJobs(dispatcher, patterns);
  if (!files.length) {
    throw new MissingFileError(patterns.join(" "), "remote job file");
  }
  const command = remoteSubmitCommand(opts.workdir, files);
  await dispatcher.runInline(command);
  return { files, commands: [command] };
}

export type DeployParams = {
  transfer: Pick<TransferDriver, "upload" | "planUpload">;
  withDispatcher: <T>(fn: (dispatcher: CommandDispatcher) => Promise<T>) => Promise<T>;
  source: string;
  destination: string;
  transferOptions?: TransferOptions;
  dryRun?: boolean;
  print?: (line: string) => void;
};

/**
 * Uploads a local directory of job files and submits every `*.pbs` inside
 * the uploaded copy from that directory.
 */
export async function deploy(params: DeployParams): Promise<SubmitReport> {
  const print = params.print ?? ((line) => console.log(line));
  const local = expandHome(params.source).replace(/[\\/]+$/, "");
  const st = await fsp.stat(local).catch(() => null);
  if (!st?.isDirectory()) {
    throw new MissingFileError(params.source, "directory");
  }
  const jobDir = path.posix.join(params.destination, path.basename(local));
  const patterns = [`${jobDir}/*.pbs`];
  if (params.dryRun) {
    print(params.transfer.planUpload([local], params.destination, params.transferOptions).display);
    return await submitRemote(null, patterns, { workdir: jobDir, dryRun: true }, print);
  }
  await params.transfer.upload([local], params.destination, params.transferOptions);
  return await params.withDispatcher((dispatcher) =>
    submitRemote(dispatcher, patterns, { workdir: jobDir }, print),
  );
}

export async function checkJobs(
  dispatcher: CommandDispatcher,
  jobId?: string,
): Promise<string> {
  return await dispatcher.runInline(statusCommand(jobId));
}
