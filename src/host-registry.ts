// src/host-registry.ts
import fsp from "node:fs/promises";
import path from "node:path";
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import { z } from "zod";
import {
  ConfigError,
  DuplicateAliasError,
  NotFoundError,
  errnoCode,
  errorMessage,
} from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";

export type HostRecord = [
  alias: string,
  username: string,
  address: string,
  port: number,
];

export type HostLookup =
  | { alias: string }
  | { username: string; address: string; port: number };

export interface HostFile {
  active: HostRecord | [];
  available: HostRecord[];
}

export interface HostListRow {
  alias: string;
  username: string;
  address: string;
  port: number;
  active: boolean;
}

export type AddResult = "added" | "unchanged";

const hostRecordSchema = z.tuple([
  z.string().min(1),
  z.string().min(1),
  z.string().min(1),
  z.number().int().min(1).max(65535),
]);

const hostFileSchema = z.object({
  active: z.union([z.tuple([]), hostRecordSchema]),
  available: z.array(hostRecordSchema),
});

export function sameRecord(a: HostRecord, b: HostRecord): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2] && a[3] === b[3];
}

function matchesLookup(record: HostRecord, lookup: HostLookup): boolean {
  if ("alias" in lookup) return record[0] === lookup.alias;
  return (
    record[1] === lookup.username &&
    record[2] === lookup.address &&
    record[3] === lookup.port
  );
}

function describeLookup(lookup: HostLookup): string {
  return "alias" in lookup
    ? lookup.alias
    : `${lookup.username}@${lookup.address}:${lookup.port}`;
}

export function dedupeRecords(records: HostRecord[]): {
  unique: HostRecord[];
  removed: number;
} {
  const unique: HostRecord[] = [];
  for (const record of records) {
    if (!unique.some((seen) => sameRecord(seen, record))) {
      unique.push(record);
    }
  }
  return { unique, removed: records.length - unique.length };
}

function parseHostFile(raw: string, file: string): HostFile {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${file} is not valid JSON`, {
      file,
      error: errorMessage(err),
    });
  }
  if (
    json &&
    typeof json === "object" &&
    "active" in json &&
    Array.isArray(json.active) &&
    json.active.some((entry: unknown) => Array.isArray(entry))
  ) {
    throw new ConfigError(
      `more than one active host in ${file}; fix or remove the file`,
      { file },
    );
  }
  const parsed = hostFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? issue.path.join(".") : "root";
    throw new ConfigError(
      `${file} is not a host file (${where}: ${issue?.message ?? "invalid"})`,
      { file },
    );
  }
  return parsed.data;
}

/**
 * The roster of remote hosts and the active one, backed by a JSON file that
 * is rewritten whole after every mutation.
 */
export class HostRegistry {
  private activeHost: HostRecord | null;
  private hosts: HostRecord[];
  private readonly logger: Logger;

  constructor(
    readonly file: string,
    data: HostFile = { active: [], available: [] },
    logger: Logger = new NullLogger(),
  ) {
    this.activeHost = data.active.length === 4 ? [...data.active] : null;
    this.hosts = data.available.map((record): HostRecord => [...record]);
    this.logger = logger;
  }

  static async load(
    file: string,
    { logger = new NullLogger() }: { logger?: Logger } = {},
  ): Promise<HostRegistry> {
    let raw: string;
    try {
      raw = await fsp.readFile(file, "utf8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        logger.debug("host file absent; starting empty", { file });
        return new HostRegistry(file, undefined, logger);
      }
      throw new ConfigError(`cannot read ${file}`, {
        file,
        error: errorMessage(err),
      });
    }

    const data = parseHostFile(raw, file);
    const { unique, removed } = dedupeRecords(data.available);
    if (data.active.length === 4) {
      const active: HostRecord = data.active;
      if (!unique.some((r) => sameRecord(r, active))) {
        throw new ConfigError(
          `active host '${active[0]}' is not in the available list of ${file}`,
          { file },
        );
      }
    }
    const registry = new HostRegistry(
      file,
      { active: data.active, available: unique },
      logger,
    );
    if (removed > 0) {
      logger.info("removed duplicate hosts", { file, removed });
      await registry.save();
    }
    return registry;
  }

  get active(): HostRecord | null {
    return this.activeHost ? [...this.activeHost] : null;
  }

  get available(): HostRecord[] {
    return this.hosts.map((record): HostRecord => [...record]);
  }

  requireActive(): HostRecord {
    const active = this.active;
    if (!active) {
      throw new NotFoundError("no active host; add one with `add` first");
    }
    return active;
  }

  find(lookup: HostLookup): HostRecord | undefined {
    const found = this.hosts.find((record) => matchesLookup(record, lookup));
    return found ? [...found] : undefined;
  }

  private require(lookup: HostLookup): HostRecord {
    const found = this.find(lookup);
    if (!found) {
      throw new NotFoundError(
        `host '${describeLookup(lookup)}' does not exist; check the list command`,
        { lookup },
      );
    }
    return found;
  }

  private isActive(record: HostRecord): boolean {
    return this.activeHost !== null && sameRecord(this.activeHost, record);
  }

  async add(record: HostRecord): Promise<AddResult> {
    if (this.hosts.some((r) => sameRecord(r, record))) {
      this.logger.warn("host already exists; nothing changed", {
        alias: record[0],
      });
      return "unchanged";
    }
    if (this.hosts.some((r) => r[0] === record[0])) {
      throw new DuplicateAliasError(record[0]);
    }
    this.hosts.push([...record]);
    if (!this.activeHost) {
      this.activeHost = [...record];
    }
    await this.save();
    return "added";
  }

  /** Returns the new active host (null when the roster is now empty). */
  async delete(lookup: HostLookup): Promise<HostRecord | null> {
    const target = this.require(lookup);
    const wasActive = this.isActive(target);
    this.hosts = this.hosts.filter((r) => !sameRecord(r, target));
    if (wasActive) {
      const next = this.hosts[0];
      this.activeHost = next ? [...next] : null;
      this.logger.info(
        next ? `active host changed to ${next[0]}` : "active host reset",
      );
    }
    await this.save();
    return this.active;
  }

  async switch(lookup: HostLookup): Promise<HostRecord> {
    const target = this.require(lookup);
    this.activeHost = target;
    await this.save();
    return [...target];
  }

  async rename(oldAlias: string, newAlias: string): Promise<HostRecord> {
    const target = this.require({ alias: oldAlias });
    if (oldAlias !== newAlias && this.hosts.some((r) => r[0] === newAlias)) {
      throw new DuplicateAliasError(newAlias);
    }
    const wasActive = this.isActive(target);
    const renamed: HostRecord = [newAlias, target[1], target[2], target[3]];
    this.hosts = this.hosts.map((r) => (sameRecord(r, target) ? renamed : r));
    if (wasActive) {
      this.activeHost = [...renamed];
    }
    await this.save();
    return renamed;
  }

  list(): HostListRow[] {
    return this.hosts.map(([alias, username, address, port]) => ({
      alias,
      username,
      address,
      port,
      active: this.isActive([alias, username, address, port]),
    }));
  }

  toJSON(): HostFile {
    return {
      active: this.activeHost ? [...this.activeHost] : [],
      available: this.available,
    };
  }

  /** Write to a sibling temp file, then rename over the host file. */
  async save(): Promise<void> {
    const dir = path.dirname(this.file);
    await fsp.mkdir(dir, { recursive: true });
    const tmp = `${this.file}.${process.pid}.tmp`;
    await fsp.writeFile(tmp, `${JSON.stringify(this.toJSON())}\n`, "utf8");
    try {
      await fsp.rename(tmp, this.file);
    } catch (err) {
      await fsp.rm(tmp, { force: true });
      throw err;
    }
    this.logger.debug("host file saved", { file: this.file });
  }
}

export function renderHostTable(rows: HostListRow[]): string {
  if (!rows.length) return "no hosts";
  const table = new AsciiTable3("Hosts")
    .setHeading("Alias", "Username", "IP address", "Port")
    .setStyle("unicode-round");
  [1, 2, 3, 4].forEach((idx) => table.setAlign(idx, AlignmentEnum.LEFT));
  for (const row of rows) {
    table.addRow(
      row.active ? `<${row.alias}>` : row.alias,
      row.username,
      row.address,
      String(row.port),
    );
  }
  return `${table.toString().trimEnd()}\n<active host>`;
}
