import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { JobTableError, MissingFileError } from "../errors.js";
import { MemoryLogger } from "../logger.js";
import {
  BUNDLED,
  generateJobs,
  parseMapping,
  parseTable,
  renderJob,
  validateBatch,
  writeExamples,
  writeTemplate,
} from "../pbs.js";

describe("parseTable", () => {
  it("splits rows and honours quoted commas", () => {
    expect(parseTable('s1,"a,b",c\n\ns2,d,e\n')).toEqual([
      ["s1", "a,b", "c"],
      ["s2", "d", "e"],
    ]);
  });

  it("accepts rows of different lengths", () => {
    expect(parseTable("x,1\r\ny\r\n")).toEqual([["x", "1"], ["y"]]);
  });
});

describe("parseMapping", () => {
  it("reads label and column pairs", () => {
    expect(parseMapping([["<sample>", "0"], ["<read1>", " 2"]])).toEqual([
      { label: "<sample>", column: 0 },
      { label: "<read1>", column: 2 },
    ]);
  });

  it("rejects rows that are not label,column", () => {
    expect(() => parseMapping([["<sample>", "0", "x"]], "map.csv")).toThrow(
      "map.csv row 1: expected 2 columns (label,column), got 3",
    );
    expect(() => parseMapping([["<x>", "-1"]], "map.csv")).toThrow(
      "map.csv row 1: column '-1' is not a non-negative integer",
    );
    expect(() => parseMapping([["", "1"]], "map.csv")).toThrow(JobTableError);
  });
});

describe("validateBatch", () => {
  const mapping = [
    { label: "<sample>", column: 0 },
    { label: "<read1>", column: 1 },
  ];

  it("requires unique job ids", () => {
    expect(() =>
      validateBatch({
        template: "",
        sampleRows: [
          ["s1", "r1"],
          ["s1", "r2"],
        ],
        mapping,
      }),
    ).toThrow("the first column is not unique ('s1' repeats)");
  });

  it("requires every mapped column in every row", () => {
    expect(() =>
      validateBatch({ template: "", sampleRows: [["s1", "r1"], ["s2"]], mapping }),
    ).toThrow("column 1 is out of range for label <read1> in sample 's2' (1 columns)");
  });

  it("rejects ids that cannot name a file", () => {
    expect(() =>
      validateBatch({ template: "", sampleRows: [["../s1", "r1"]], mapping }),
    ).toThrow("sample row 1: '../s1' cannot be used as a job file name");
  });
});

describe("renderJob", () => {
  it("replaces every occurrence of each label", () => {
    const out = renderJob(
      "#PBS -N <s>\r\necho <s> <r>\r\n",
      ["s1", "reads.fq"],
      [
        { label: "<s>", column: 0 },
        { label: "<r>", column: 1 },
      ],
    );
    expect(out).toBe("#PBS -N s1\necho s1 reads.fq\n");
  });
});

describe("job files on disk", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await fsp.mkdtemp(path.join(os.tmpdir(), "rpbs-pbs-"));
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  async function writeInputs(samples: string) {
    const template = path.join(tmp, "t.pbs");
    const sampleFile = path.join(tmp, "samples.csv");
    const mapFile = path.join(tmp, "map.csv");
    await fsp.writeFile(template, "#PBS -N {id}\nrun {id} {in}\n");
    await fsp.writeFile(sampleFile, samples);
    await fsp.writeFile(mapFile, "{id},0\n{in},1\n");
    return { template, sampleFile, mapFile };
  }

  it("writes one .pbs per sample row", async () => {
    const inputs = await writeInputs("s1,a.fq\ns2,b.fq\n");
    const outDir = path.join(tmp, "jobs");
    const logger = new MemoryLogger();
    const written = await generateJobs({ ...inputs, outDir, logger });
    expect(written).toEqual([path.join(outDir, "s1.pbs"), path.join(outDir, "s2.pbs")]);
    expect(await fsp.readFile(path.join(outDir, "s2.pbs"), "utf8")).toBe(
      "#PBS -N s2\nrun s2 b.fq\n",
    );
  });

  it("names plain scripts after the job id", async () => {
    const inputs = await writeInputs("s1,a.fq\n");
    const written = await generateJobs({ ...inputs, outDir: tmp, pbsMode: false });
    expect(written).toEqual([path.join(tmp, "s1")]);
  });

  it("writes nothing when any row is invalid", async () => {
    const inputs = await writeInputs("s1,a.fq\ns2\n");
    const outDir = path.join(tmp, "jobs");
    await expect(generateJobs({ ...inputs, outDir })).rejects.toBeInstanceOf(JobTableError);
    await expect(fsp.stat(outDir)).rejects.toThrow();
  });

  it("reports a missing sample file", async () => {
    const inputs = await writeInputs("s1,a.fq\n");
    const sampleFile = path.join(tmp, "nope.csv");
    await expect(
      generateJobs({ ...inputs, sampleFile, outDir: tmp }),
    ).rejects.toThrow(new MissingFileError(sampleFile).message);
  });

  it("renders the bundled example into three jobs", async () => {
    const outDir = path.join(tmp, "jobs");
    const written = await generateJobs({
      template: BUNDLED.template,
      sampleFile: BUNDLED.sampleFile,
      mapFile: BUNDLED.mapFile,
      outDir,
    });
    expect(written.map((f) => path.basename(f))).toEqual([
      "sample-a.pbs",
      "sample-b.pbs",
      "sample-c.pbs",
    ]);
    const job = await fsp.readFile(path.join(outDir, "sample-b.pbs"), "utf8");
    expect(job.split("\n")).toContain(
      "bash scripts/align.sh reads/sample-b_R1.fq.gz reads/sample-b_R2.fq.gz results/sample-b",
    );
    expect(job).not.toContain("<sample>");
  });

  it("builds the default template from the bundled header and commands", async () => {
    const output = path.join(tmp, "work.pbs");
    await expect(writeTemplate({ output })).resolves.toBe(output);
    const header = await fsp.readFile(BUNDLED.header, "utf8");
    const commands = await fsp.readFile(BUNDLED.commands, "utf8");
    expect(await fsp.readFile(output, "utf8")).toBe(header + commands);
  });

  it("copies a given template with LF endings and warns on overwrite", async () => {
    const input = path.join(tmp, "mine.pbs");
    const output = path.join(tmp, "work.pbs");
    await fsp.writeFile(input, "#PBS -N x\r\necho x\r\n");
    await fsp.writeFile(output, "old\n");
    const logger = new MemoryLogger();
    await writeTemplate({ input, output, logger });
    expect(await fsp.readFile(output, "utf8")).toBe("#PBS -N x\necho x\n");
    expect(logger.messages("warn")).toEqual([`${output} exists and will be overwritten`]);
  });

  it("copies the three example files", async () => {
    const written = await writeExamples(path.join(tmp, "ex"));
    expect(written.map((f) => path.basename(f))).toEqual([
      "pbs-template.pbs",
      "samplefile.csv",
      "mapping.csv",
    ]);
  });
});
