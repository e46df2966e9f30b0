// Error taxonomy shared by the library and the CLI. Library code throws these;
// only the CLI turns them into messages and exit codes.

export class RpbsError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "RpbsError";
  }
}

/** Host file unreadable or malformed. */
export class ConfigError extends RpbsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 1, context);
    this.name = "ConfigError";
  }
}

export class NotFoundError extends RpbsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 1, context);
    this.name = "NotFoundError";
  }
}

export class DuplicateAliasError extends RpbsError {
  constructor(public readonly alias: string) {
    super(`alias '${alias}' is already used by another host`, 1, { alias });
    this.name = "DuplicateAliasError";
  }
}

/** Socket, handshake or authentication failure. */
export class ConnectionError extends RpbsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 1, context);
    this.name = "ConnectionError";
  }
}

export class RemoteCommandError extends RpbsError {
  constructor(
    public readonly stderr: string,
    public readonly command?: string,
  ) {
    super("remote host reported an error", 1, command ? { command } : undefined);
    this.name = "RemoteCommandError";
  }
}

export class TransferError extends RpbsError {
  constructor(
    message: string,
    public readonly code: number,
    context?: Record<string, unknown>,
  ) {
    super(message, code > 0 ? code : 1, context);
    this.name = "TransferError";
  }
}

export class SubmissionError extends RpbsError {
  constructor(
    message: string,
    public readonly code: number,
    context?: Record<string, unknown>,
  ) {
    super(message, code > 0 ? code : 1, context);
    this.name = "SubmissionError";
  }
}

export class MissingFileError extends RpbsError {
  constructor(public readonly path: string, what = "file") {
    super(`${what} ${path} does not exist`, 1, { path });
    this.name = "MissingFileError";
  }
}

/** Bad sample or mapping table. */
export class JobTableError extends RpbsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 1, context);
    this.name = "JobTableError";
  }
}

export function exitCodeFor(err: unknown): number {
  return err instanceof RpbsError ? err.exitCode : 1;
}

// node internals can throw errors from another realm; read fields structurally
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  if (typeof err === "object" && err !== null && "message" in err) {
    if (typeof err.message === "string") return err.message;
  }
  return String(err);
}

export function errorStack(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "stack" in err) {
    return typeof err.stack === "string" ? err.stack : undefined;
  }
  return undefined;
}
