// src/cli-util.ts
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command, InvalidArgumentError } from "commander";
import { CommandDispatcher } from "./dispatcher.js";
import {
  RemoteCommandError,
  RpbsError,
  errorMessage,
  errorStack,
  exitCodeFor,
} from "./errors.js";
import { defaultCommandRunner, type CommandRunner } from "./exec.js";
import {
  HostRegistry,
  type HostLookup,
  type HostRecord,
} from "./host-registry.js";
import { ConsoleLogger, type Logger } from "./logger.js";
import {
  connectSession,
  withSession,
  type SessionConnector,
} from "./session.js";
import { resolveSettings, type Settings } from "./settings.js";
import { TransferDriver } from "./transfer.js";

function samePath(a: string, b: string) {
  const A = path.resolve(a);
  const B = path.resolve(b);
  // Windows is case-insensitive
  return process.platform === "win32"
    ? A.toLowerCase() === B.toLowerCase()
    : A === B;
}

/**
 * True when `moduleFile` is the script node was started with. Symlinks are
 * resolved, so a package bin link still counts.
 */
export function isDirectRun(
  moduleFile: string,
  argv1 = process.argv[1] ?? "",
): boolean {
  if (!argv1) return false;
  try {
    // allow either raw path or file:// URL in argv[1] (some loaders)
    const inv = argv1.startsWith("file:") ? fileURLToPath(argv1) : argv1;
    return samePath(fs.realpathSync(moduleFile), fs.realpathSync(inv));
  } catch {
    return false;
  }
}

export type GlobalOptions = {
  logLevel?: string;
  hostFile?: string;
  privateKey?: string;
  passphrase?: string;
  remoteDir?: string;
  dryRun?: boolean;
};

/** Seams the tests replace; production leaves them all unset. */
export type CliDeps = {
  env?: Record<string, string | undefined>;
  logger?: Logger;
  runner?: CommandRunner;
  connector?: (settings: Settings, logger: Logger) => SessionConnector;
  print?: (line: string) => void;
  write?: (text: string) => void;
  printError?: (line: string) => void;
};

export type CliContext = {
  settings: Settings;
  logger: Logger;
  runner: CommandRunner;
  print: (line: string) => void;
  write: (text: string) => void;
  loadRegistry(): Promise<HostRegistry>;
  activeHost(): Promise<HostRecord>;
  transferFor(host: HostRecord): TransferDriver;
  withDispatcher<T>(
    host: HostRecord,
    fn: (dispatcher: CommandDispatcher) => Promise<T>,
  ): Promise<T>;
};

const defaultConnector =
  (settings: Settings, logger: Logger): SessionConnector =>
  (host) =>
    connectSession(host, {
      privateKeyPath: settings.privateKey,
      passphrase: settings.passphrase,
      logger: logger.child("ssh"),
    });

export function createContext(command: Command, deps: CliDeps = {}): CliContext {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const settings = resolveSettings(
    {
      hostFile: globals.hostFile,
      privateKey: globals.privateKey,
      passphrase: globals.passphrase,
      remoteDir: globals.remoteDir,
      logLevel: globals.logLevel,
      dryRun: globals.dryRun,
    },
    deps.env,
  );
  const logger = deps.logger ?? new ConsoleLogger(settings.logLevel);
  const runner = deps.runner ?? defaultCommandRunner;
  const print = deps.print ?? ((line: string) => console.log(line));
  const write = deps.write ?? ((text: string) => process.stdout.write(text));
  const connector = (deps.connector ?? defaultConnector)(settings, logger);

  const loadRegistry = () =>
    HostRegistry.load(settings.hostFile, { logger: logger.child("hosts") });
  const transferFor = (host: HostRecord) =>
    new TransferDriver({
      host,
      runner,
      print,
      logger: logger.child("transfer"),
    });

  return {
    settings,
    logger,
    runner,
    print,
    write,
    loadRegistry,
    async activeHost() {
      return (await loadRegistry()).requireActive();
    },
    transferFor,
    withDispatcher<T>(
      host: HostRecord,
      fn: (dispatcher: CommandDispatcher) => Promise<T>,
    ): Promise<T> {
      return withSession(connector, host, (session) =>
        fn(
          new CommandDispatcher({
            session,
            transfer: transferFor(host),
            logger: logger.child("remote"),
            write,
          }),
        ),
      );
    },
  };
}

export function reportError(
  err: unknown,
  logger: Logger,
  printError: (line: string) => void = (line) => console.error(line),
): number {
  if (err instanceof RemoteCommandError) {
    printError("An error is raised by remote host, please read the info:");
    printError(err.stderr.replace(/\n$/, ""));
  } else if (err instanceof RpbsError) {
    printError(`error: ${err.message}`);
  } else {
    printError(`error: ${errorMessage(err)}`);
    const stack = errorStack(err);
    if (stack) logger.debug(stack);
  }
  return exitCodeFor(err);
}

/**
 * Runs one command body with a fresh context; failures are reported and
 * turned into the process exit code instead of escaping to commander.
 */
export async function runCommand(
  command: Command,
  deps: CliDeps,
  body: (ctx: CliContext) => Promise<void>,
): Promise<void> {
  const ctx = createContext(command, deps);
  try {
    await body(ctx);
  } catch (err) {
    process.exitCode = reportError(err, ctx.logger, deps.printError);
  }
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value.trim()) || port < 1 || port > 65535) {
    throw new InvalidArgumentError("port must be an integer in 1..65535");
  }
  return port;
}

export type LookupOptions = {
  username?: string;
  address?: string;
  port: number;
};

export function lookupFrom(alias: string | undefined, opts: LookupOptions): HostLookup {
  if (alias) return { alias };
  if (opts.username && opts.address) {
    return { username: opts.username, address: opts.address, port: opts.port };
  }
  throw new RpbsError("give a host alias, or --username and --address");
}

export function describeHost([alias, username, address, port]: HostRecord): string {
  return `${alias} (${username}@${address}:${port})`;
}
