// src/session.ts
import fsp from "node:fs/promises";
import readline from "node:readline";
import { Writable } from "node:stream";
import { Client, type ClientChannel } from "ssh2";
import { ConnectionError, errnoCode, errorMessage } from "./errors.js";
import type { HostRecord } from "./host-registry.js";
import { NullLogger, type Logger } from "./logger.js";

/** What one command channel produced once it closed. */
export type ChannelOutput = {
  stdout: string[];
  stderr: string;
  code: number | null;
};

export interface RemoteSession {
  readonly host: HostRecord;
  exec(command: string): Promise<ChannelOutput>;
  close(): Promise<void>;
}

export type SessionConnector = (host: HostRecord) => Promise<RemoteSession>;

export type DialConfig = {
  host: string;
  port: number;
  username: string;
  privateKey?: Buffer;
  passphrase?: string;
  password?: string;
  readyTimeout?: number;
};

/** An authenticated transport; one per dial. */
export interface SshConnection {
  exec(command: string): Promise<ChannelOutput>;
  end(): void;
}

export type Dialer = (config: DialConfig) => Promise<SshConnection>;

export type ConnectOptions = {
  privateKeyPath: string;
  passphrase?: string;
  promptPassword?: (prompt: string) => Promise<string>;
  readyTimeoutMs?: number;
  dialer?: Dialer;
  logger?: Logger;
};

const SOCKET_LEVELS = new Set(["client-socket", "client-timeout"]);
const SOCKET_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EAI_AGAIN",
]);

export function isSocketFailure(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  if ("level" in err && typeof err.level === "string") {
    if (SOCKET_LEVELS.has(err.level)) return true;
  }
  const code = errnoCode(err);
  return code !== undefined && SOCKET_CODES.has(code);
}

function collectChannel(
  stream: ClientChannel,
  resolve: (output: ChannelOutput) => void,
): void {
  const stdout: string[] = [];
  let stderr = "";
  stream.setEncoding("utf8");
  stream.stderr.setEncoding("utf8");
  stream.on("data", (chunk: string) => {
    stdout.push(chunk);
  });
  stream.stderr.on("data", (chunk: string) => {
    stderr += chunk;
  });
  stream.on("close", (...args: unknown[]) => {
    const code = args[0];
    resolve({ stdout, stderr, code: typeof code === "number" ? code : null });
  });
}

export const dialSsh2: Dialer = (config) =>
  new Promise<SshConnection>((resolve, reject) => {
    const client = new Client();
    let failure: Error | null = null;
    const onConnectError = (err: Error) => {
      client.end();
      reject(err);
    };
    client.once("error", onConnectError);
    client.once("ready", () => {
      client.removeListener("error", onConnectError);
      client.on("error", (err: Error) => {
        failure = err;
      });
      resolve({
        exec: (command) =>
          new Promise<ChannelOutput>((resolveExec, rejectExec) => {
            if (failure) {
              rejectExec(failure);
              return;
            }
            client.exec(command, (err, stream) => {
              if (err) {
                rejectExec(err);
                return;
              }
              collectChannel(stream, resolveExec);
            });
          }),
        end: () => client.end(),
      });
    });
    client.connect({
      host: config.host,
      port: config.port,
      username: config.username,
      privateKey: config.privateKey,
      passphrase: config.passphrase || undefined,
      password: config.password,
      readyTimeout: config.readyTimeout,
    });
  });

/** Reads a line from the terminal without echoing it. */
export function promptHidden(prompt: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const muted = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    process.stderr.write(prompt);
    const rl = readline.createInterface({
      input: process.stdin,
      output: muted,
      terminal: Boolean(process.stdin.isTTY),
    });
    let answered = false;
    rl.question("", (answer) => {
      answered = true;
      process.stderr.write("\n");
      rl.close();
      resolve(answer);
    });
    rl.once("close", () => {
      if (!answered) reject(new ConnectionError("password prompt aborted"));
    });
  });
}

/**
 * One authenticated connection to the active host. Every `exec` opens a
 * fresh channel; only one channel may be open at a time.
 */
export class SshSession implements RemoteSession {
  private busy = false;
  private closed = false;

  constructor(
    readonly host: HostRecord,
    private readonly connection: SshConnection,
    private readonly logger: Logger = new NullLogger(),
  ) {}

  async exec(command: string): Promise<ChannelOutput> {
    if (this.closed) {
      throw new ConnectionError("session is closed");
    }
    if (this.busy) {
      throw new ConnectionError("a command channel is already open");
    }
    this.busy = true;
    this.logger.debug("exec", { host: this.host[0], command });
    try {
      return await this.connection.exec(command);
    } catch (err) {
      throw new ConnectionError(`channel failed: ${errorMessage(err)}`, {
        host: this.host[0],
      });
    } finally {
      this.busy = false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.connection.end();
    this.logger.debug("session closed", { host: this.host[0] });
  }
}

async function readKey(file: string, logger: Logger): Promise<Buffer | null> {
  try {
    return await fsp.readFile(file);
  } catch (err) {
    logger.debug("private key unreadable", { file, error: errorMessage(err) });
    return null;
  }
}

export async function connectSession(
  host: HostRecord,
  opts: ConnectOptions,
): Promise<RemoteSession> {
  const [alias, username, address, port] = host;
  const logger = opts.logger ?? new NullLogger();
  const dial = opts.dialer ?? dialSsh2;
  const prompt = opts.promptPassword ?? promptHidden;
  const base: DialConfig = {
    host: address,
    port,
    username,
    readyTimeout: opts.readyTimeoutMs,
  };
  const wrapSocketError = (err: unknown) =>
    new ConnectionError(
      `cannot connect to ${alias} (${address}:${port}): ${errorMessage(err)}`,
      { host: alias },
    );

  const key = await readKey(opts.privateKeyPath, logger);
  if (key) {
    try {
      const connection = await dial({
        ...base,
        privateKey: key,
        passphrase: opts.passphrase,
      });
      logger.info("authenticated with private key", { host: alias });
      return new SshSession(host, connection, logger);
    } catch (err) {
      if (isSocketFailure(err)) throw wrapSocketError(err);
      logger.debug("key authentication failed", {
        host: alias,
        error: errorMessage(err),
      });
    }
  }

  const password = await prompt(
    `${key ? "Key authentication failed" : "No private key found"}.\nEnter your password for ${username}: `,
  );
  try {
    const connection = await dial({ ...base, password });
    logger.info("authenticated with password", { host: alias });
    return new SshSession(host, connection, logger);
  } catch (err) {
    if (isSocketFailure(err)) throw wrapSocketError(err);
    throw new ConnectionError(
      `authentication failed for ${username}@${address}: ${errorMessage(err)}`,
      { host: alias },
    );
  }
}

/** Connect, run `fn`, and close the session on every path. */
export async function withSession<T>(
  connect: SessionConnector,
  host: HostRecord,
  fn: (session: RemoteSession) => Promise<T>,
): Promise<T> {
  const session = await connect(host);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
