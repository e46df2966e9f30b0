// src/pbs.ts
import fsp from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { JobTableError, MissingFileError } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";

export const DATA_DIR = path.resolve(__dirname, "../data");

export const BUNDLED = {
  header: path.join(DATA_DIR, "PBS_HEADER.txt"),
  commands: path.join(DATA_DIR, "PBS_CMDS.txt"),
  template: path.join(DATA_DIR, "pbs-template.pbs"),
  sampleFile: path.join(DATA_DIR, "samplefile.csv"),
  mapFile: path.join(DATA_DIR, "mapping.csv"),
} as const;

export type MappingEntry = {
  label: string;
  column: number;
};

export type PbsBatch = {
  template: string;
  sampleRows: string[][];
  mapping: MappingEntry[];
};

export type GenerateParams = {
  template: string;
  sampleFile: string;
  mapFile: string;
  outDir: string;
  // false: name outputs after the job id alone, without `.pbs`
  pbsMode?: boolean;
  logger?: Logger;
};

export type WriteTemplateParams = {
  input?: string;
  output?: string;
  logger?: Logger;
};

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fsp.stat(p)).isFile();
  } catch {
    return false;
  }
}

async function requireFile(p: string): Promise<void> {
  if (!(await isFile(p))) throw new MissingFileError(p);
}

export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

export function parseTable(text: string, source = "table"): string[][] {
  const parsed: unknown = parse(text, {
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!Array.isArray(parsed)) {
    throw new JobTableError(`${source} did not parse as CSV`);
  }
  return parsed.map((row: unknown, idx) => {
    if (!Array.isArray(row) || !row.every((cell) => typeof cell === "string")) {
      throw new JobTableError(`${source} row ${idx + 1} is malformed`);
    }
    return row.map((cell) => String(cell));
  });
}

export async function readTable(file: string): Promise<string[][]> {
  await requireFile(file);
  return parseTable(await fsp.readFile(file, "utf8"), file);
}

export function parseMapping(rows: string[][], source = "mapping"): MappingEntry[] {
  return rows.map((row, idx) => {
    const where = `${source} row ${idx + 1}`;
    if (row.length !== 2) {
      throw new JobTableError(
        `${where}: expected 2 columns (label,column), got ${row.length}`,
        { row: idx + 1 },
      );
    }
    const [label = "", rawColumn = ""] = row;
    if (!label) {
      throw new JobTableError(`${where}: label is empty`, { row: idx + 1 });
    }
    if (!/^\d+$/.test(rawColumn.trim())) {
      throw new JobTableError(
        `${where}: column '${rawColumn}' is not a non-negative integer`,
        { row: idx + 1, label },
      );
    }
    return { label, column: Number(rawColumn.trim()) };
  });
}

/**
 * Checks the whole batch before anything is written: unique, file-safe job
 * ids and every mapping column present in every sample row.
 */
export function validateBatch(batch: PbsBatch): void {
  const seen = new Set<string>();
  for (const [idx, row] of batch.sampleRows.entries()) {
    const id = row[0] ?? "";
    if (!id || /[\\/]/.test(id) || id === "." || id === "..") {
      throw new JobTableError(
        `sample row ${idx + 1}: '${id}' cannot be used as a job file name`,
        { row: idx + 1 },
      );
    }
    if (seen.has(id)) {
      throw new JobTableError(`the first column is not unique ('${id}' repeats)`, {
        row: idx + 1,
      });
    }
    seen.add(id);
    for (const { label, column } of batch.mapping) {
      if (column >= row.length) {
        throw new JobTableError(
          `column ${column} is out of range for label ${label} in sample '${id}' (${row.length} columns)`,
          { row: idx + 1, label },
        );
      }
    }
  }
}

/** Literal replacement of every label, in mapping order. */
export function renderJob(template: string, row: string[], mapping: MappingEntry[]): string {
  let content = normalizeNewlines(template);
  for (const { label, column } of mapping) {
    content = content.split(label).join(row[column] ?? "");
  }
  return content;
}

export async function generateJobs(params: GenerateParams): Promise<string[]> {
  const logger = params.logger ?? new NullLogger();
  const pbsMode = params.pbsMode ?? true;
  await requireFile(params.template);
  const sampleRows = await readTable(params.sampleFile);
  const mapping = parseMapping(await readTable(params.mapFile), params.mapFile);
  const template = await fsp.readFile(params.template, "utf8");
  const batch: PbsBatch = { template, sampleRows, mapping };
  validateBatch(batch);

  await fsp.mkdir(params.outDir, { recursive: true });
  const written: string[] = [];
  for (const row of batch.sampleRows) {
    const id = row[0] ?? "";
    const file = path.join(params.outDir, pbsMode ? `${id}.pbs` : id);
    logger.debug(`generating ${file}`);
    await fsp.writeFile(file, renderJob(batch.template, row, batch.mapping), "utf8");
    written.push(file);
  }
  logger.info("generated jobs", { count: written.length, outDir: params.outDir });
  return written;
}

/**
 * Writes a starting job script: a copy of `input`, or the bundled header and
 * command sections. Returns the output path.
 */
export async function writeTemplate(params: WriteTemplateParams = {}): Promise<string> {
  const logger = params.logger ?? new NullLogger();
  const output = params.output ?? path.join(process.cwd(), "work.pbs");
  let content: string;
  if (params.input) {
    await requireFile(params.input);
    content = await fsp.readFile(params.input, "utf8");
  } else {
    const header = await fsp.readFile(BUNDLED.header, "utf8");
    const commands = await fsp.readFile(BUNDLED.commands, "utf8");
    content = header + commands;
  }
  if (await isFile(output)) {
    logger.warn(`${output} exists and will be overwritten`);
  }
  await fsp.mkdir(path.dirname(output), { recursive: true });
  await fsp.writeFile(output, normalizeNewlines(content), "utf8");
  return output;
}

/** Copies the bundled template, sample and mapping files into `outDir`. */
export async function writeExamples(outDir: string): Promise<string[]> {
  await fsp.mkdir(outDir, { recursive: true });
  const sources = [BUNDLED.template, BUNDLED.sampleFile, BUNDLED.mapFile];
  const written: string[] = [];
  for (const source of sources) {
    const target = path.join(outDir, path.basename(source));
    await fsp.copyFile(source, target);
    written.push(target);
  }
  return written;
}
