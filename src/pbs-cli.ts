// src/pbs-cli.ts
import path from "node:path";
import { Command } from "commander";
import { describeHost, runCommand, type CliDeps } from "./cli-util.js";
import type { CommandDispatcher } from "./dispatcher.js";
import { generateJobs, writeExamples, writeTemplate, BUNDLED } from "./pbs.js";
import {
  JobSubmitter,
  checkJobs,
  deploy,
  statusCommand,
  submitRemote,
} from "./submitter.js";

function banner(print: (line: string) => void, rows: [string, string][]) {
  print("=====================");
  for (const [label, value] of rows) print(`${label.padEnd(12)}: ${value}`);
  print("=====================");
}

export function registerPbsCommands(program: Command, deps: CliDeps = {}) {
  program
    .command("pbstemp")
    .description("Write a PBS job template to start from")
    .option("-i, --input <file>", "template to copy instead of the bundled one")
    .option("-o, --output <file>", "output file", "work.pbs")
    .action((opts: { input?: string; output: string }, command: Command) =>
      runCommand(command, deps, async (ctx) => {
        const output = path.resolve(opts.output);
        ctx.print(`=> Generating ${output}`);
        if (ctx.settings.dryRun) return;
        await writeTemplate({ input: opts.input, output, logger: ctx.logger });
        ctx.print("=> Done.");
      }),
    );

  program
    .command("pbsgen")
    .description("Generate one job script per sample row from a template")
    .argument("<template>", "template file with labels to replace")
    .argument("<samplefile>", "CSV of samples; first column names each job")
    .argument("<mapfile>", "CSV of label,column pairs")
    .option("-o, --outdir <dir>", "output directory", ".")
    .option("--no-pbs", "write plain scripts named after the job id")
    .action(
      (
        template: string,
        sampleFile: string,
        mapFile: string,
        opts: { outdir: string; pbs: boolean },
        command: Command,
      ) =>
        runCommand(command, deps, async (ctx) => {
          const outDir = path.resolve(opts.outdir);
          banner(ctx.print, [
            ["Output path", outDir],
            [opts.pbs ? "PBS Template" : "Template", template],
            ["Sample file", sampleFile],
            ["Mapping file", mapFile],
          ]);
          if (ctx.settings.dryRun) return;
          const written = await generateJobs({
            template,
            sampleFile,
            mapFile,
            outDir,
            pbsMode: opts.pbs,
            logger: ctx.logger.child("pbsgen"),
          });
          ctx.print(`=> Generated ${written.length} file${written.length === 1 ? "" : "s"}.`);
        }),
    );

  program
    .command("pbsexample")
    .description("Copy example template, sample and mapping files")
    .argument("[outdir]", "output directory", ".")
    .action((outdir: string, _opts: object, command: Command) =>
      runCommand(command, deps, async (ctx) => {
        const outDir = path.resolve(outdir);
        banner(ctx.print, [
          ["Output path", outDir],
          ["PBS Template", path.join(outDir, path.basename(BUNDLED.template))],
          ["Sample file", path.join(outDir, path.basename(BUNDLED.sampleFile))],
          ["Mapping file", path.join(outDir, path.basename(BUNDLED.mapFile))],
        ]);
        if (ctx.settings.dryRun) return;
        await writeExamples(outDir);
        ctx.print("=> Done.");
      }),
    );

  program
    .command("sub")
    .description("Submit PBS job files (glob patterns allowed)")
    .argument("<tasks...>", "job files or patterns")
    .option("-r, --remote", "job files are on the active host", false)
    .option("-w, --workdir <dir>", "directory to submit from")
    .action(
      (tasks: string[], opts: { remote: boolean; workdir?: string }, command: Command) =>
        runCommand(command, deps, async (ctx) => {
          ctx.print("NOTE: job files must use LF (Unix) line endings");
          if (!opts.remote) {
            const submitter = new JobSubmitter({
              runner: ctx.runner,
              logger: ctx.logger.child("sub"),
              print: ctx.print,
            });
            await submitter.submitLocal(tasks, {
              workdir: opts.workdir,
              dryRun: ctx.settings.dryRun,
            });
            return;
          }
          const workdir = opts.workdir ?? ctx.settings.remoteDir;
          if (ctx.settings.dryRun) {
            await submitRemote(null, tasks, { workdir, dryRun: true }, ctx.print);
            return;
          }
          const host = await ctx.activeHost();
          await ctx.withDispatcher(host, (dispatcher) =>
            submitRemote(dispatcher, tasks, { workdir }, ctx.print),
          );
        }),
    );

  program
    .command("deploy")
    .description("Upload a directory of job files and submit every *.pbs in it")
    .argument("<source>", "local directory")
    .argument("[destination]", "remote parent directory")
    .option("--rsync", "upload with rsync instead of scp", false)
    .action(
      (
        source: string,
        destination: string | undefined,
        opts: { rsync: boolean },
        command: Command,
      ) =>
        runCommand(command, deps, async (ctx) => {
          const host = await ctx.activeHost();
          if (ctx.settings.dryRun) {
            ctx.print(`=> Running deploy ${source} on ${describeHost(host)}`);
          }
          await deploy({
            transfer: ctx.transferFor(host),
            withDispatcher: <T>(fn: (dispatcher: CommandDispatcher) => Promise<T>) =>
              ctx.withDispatcher(host, fn),
            source,
            destination: destination ?? ctx.settings.remoteDir,
            transferOptions: opts,
            dryRun: ctx.settings.dryRun,
            print: ctx.print,
          });
        }),
    );

  program
    .command("check")
    .description("Show queue status on the active host")
    .argument("[jobId]", "a single job id")
    .action((jobId: string | undefined, _opts: object, command: Command) =>
      runCommand(command, deps, async (ctx) => {
        const host = await ctx.activeHost();
        if (ctx.settings.dryRun) {
          ctx.print(`=> Running ${statusCommand(jobId)} on ${describeHost(host)}`);
          return;
        }
        await ctx.withDispatcher(host, (dispatcher) => checkJobs(dispatcher, jobId));
      }),
    );
}
