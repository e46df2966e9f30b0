// src/dispatcher.ts
import fsp from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { MissingFileError, RemoteCommandError } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import type { ChannelOutput, RemoteSession } from "./session.js";
import { expandHome } from "./settings.js";
import type { TransferDriver, TransferOptions } from "./transfer.js";

// the remote shell expands these; `{}` is matched as a literal pair
const WILDCARDS = /\*|\?|\{\}/;

export type Uploader = Pick<TransferDriver, "upload">;

export type RunFilesOptions = {
  interpreter?: string;
  echo?: boolean;
};

export type RunLocalFilesOptions = RunFilesOptions &
  TransferOptions & {
    remoteDir: string;
    dataDir?: string;
  };

export type LocalRunPlan = {
  uploads: { sources: string[]; destination: string }[];
  remoteScripts: string[];
  command: string;
};

export type DispatcherParams = {
  session: RemoteSession;
  transfer?: Uploader;
  logger?: Logger;
  write?: (text: string) => void;
};

export function hasWildcard(p: string): boolean {
  return WILDCARDS.test(p);
}

/** `chmod u+x a;chmod u+x b;a;b`, or `prog a;prog b` with an interpreter. */
export function buildRunCommand(scripts: string[], interpreter?: string): string {
  if (interpreter) {
    return scripts.map((s) => `${interpreter} ${s}`).join(";");
  }
  const chmod = scripts.map((s) => `chmod u+x ${s}`).join(";");
  return `${chmod};${scripts.join(";")}`;
}

export function splitLines(text: string): string[] {
  return text.split("\n").filter((line) => line !== "");
}

async function statKind(p: string): Promise<"file" | "dir" | "other" | null> {
  try {
    const st = await fsp.stat(p);
    if (st.isDirectory()) return "dir";
    return st.isFile() ? "file" : "other";
  } catch {
    return null;
  }
}

async function expandLocal(input: string): Promise<string[]> {
  const expanded = expandHome(input);
  if (!fg.isDynamicPattern(expanded)) {
    return (await statKind(expanded)) ? [expanded] : [];
  }
  const matches = await fg(expanded, { onlyFiles: false, dot: true });
  return matches.sort();
}

export type LocalScripts = {
  remoteDir: string;
  // basenames of the scripts, as they will sit in `remoteDir`
  files: string[];
  // expanded local paths handed to scp/rsync
  sources: string[];
};

/**
 * Resolves local script inputs to the remote paths they will have after
 * upload. A lone directory input uploads as `<remoteDir>/<name>` and runs
 * everything directly inside it.
 */
export async function resolveLocalScripts(
  inputs: string[],
  remoteDir: string,
  logger: Logger = new NullLogger(),
): Promise<LocalScripts> {
  let dir = remoteDir;
  let patterns = inputs;
  let directory: string | null = null;
  const first = inputs[0];
  if (inputs.length === 1 && first && (await statKind(expandHome(first))) === "dir") {
    directory = expandHome(first).replace(/[\\/]+$/, "");
    dir = path.posix.join(remoteDir, path.basename(directory));
    patterns = [`${fg.convertPathToPattern(directory)}/*`];
  }

  const files: string[] = [];
  for (const pattern of patterns) {
    const matches = await expandLocal(pattern);
    if (!matches.length) {
      throw new MissingFileError(pattern);
    }
    for (const match of matches) {
      const kind = await statKind(match);
      if (kind === "dir") {
        logger.warn(`directory ${match} is skipped; nothing in it will be executed`);
      } else if (kind === "file") {
        files.push(match);
      } else {
        throw new MissingFileError(match);
      }
    }
  }
  return {
    remoteDir: dir,
    files: files.map((f) => path.basename(f)),
    sources: directory ? [directory] : files,
  };
}

/** Upload list and command line for running local scripts; touches no remote. */
export async function planLocalRun(
  paths: string[],
  opts: RunLocalFilesOptions,
  logger: Logger = new NullLogger(),
): Promise<LocalRunPlan> {
  const { remoteDir, files, sources } = await resolveLocalScripts(
    paths,
    opts.remoteDir,
    logger,
  );
  const remoteScripts = files.map((f) => path.posix.join(remoteDir, f));
  const uploads = [{ sources, destination: opts.remoteDir }];
  if (opts.dataDir) {
    uploads.push({ sources: [expandHome(opts.dataDir)], destination: opts.remoteDir });
  }
  return {
    uploads,
    remoteScripts,
    command: buildRunCommand(remoteScripts, opts.interpreter),
  };
}

export class CommandDispatcher {
  private readonly session: RemoteSession;
  private readonly transfer?: Uploader;
  private readonly logger: Logger;
  private readonly write: (text: string) => void;

  constructor(params: DispatcherParams) {
    this.session = params.session;
    this.transfer = params.transfer;
    this.logger = params.logger ?? new NullLogger();
    this.write = params.write ?? ((text) => process.stdout.write(text));
  }

  /**
   * Stderr decides: any bytes there fail the whole command and no stdout is
   * returned. Otherwise stdout chunks are echoed in order (when asked) and
   * concatenated.
   */
  readResult(output: ChannelOutput, command?: string, echo = true): string {
    if (output.stderr.length > 0) {
      throw new RemoteCommandError(output.stderr, command);
    }
    const parts: string[] = [];
    for (const chunk of output.stdout) {
      if (echo) this.write(chunk);
      parts.push(chunk);
    }
    return parts.join("");
  }

  async runInline(command: string, echo = true): Promise<string> {
    this.logger.info(`running ${command}`);
    const output = await this.session.exec(command);
    return this.readResult(output, command, echo);
  }

  /** Expands remote wildcards with `ls`; other paths pass through. */
  async expandRemote(paths: string[]): Promise<string[]> {
    if (!paths.some(hasWildcard)) return paths;
    const listing = await this.runInline(
      paths.map((p) => `ls ${p}`).join(";"),
      false,
    );
    return splitLines(listing);
  }

  async runRemoteFiles(
    paths: string[],
    opts: RunFilesOptions = {},
  ): Promise<string> {
    const scripts = await this.expandRemote(paths);
    this.logger.debug("remote scripts", { scripts });
    return await this.runInline(
      buildRunCommand(scripts, opts.interpreter),
      opts.echo ?? true,
    );
  }

  async runLocalFiles(
    paths: string[],
    opts: RunLocalFilesOptions,
  ): Promise<string> {
    const transfer = this.transfer;
    if (!transfer) {
      throw new Error("running local files needs a transfer driver");
    }
    const plan = await planLocalRun(paths, opts, this.logger);
    for (const upload of plan.uploads) {
      await transfer.upload(upload.sources, upload.destination, {
        rsync: opts.rsync,
      });
    }
    return await this.runInline(plan.command, opts.echo ?? true);
  }
}
