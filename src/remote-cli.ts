// src/remote-cli.ts
import { Command } from "commander";
import { describeHost, runCommand, type CliDeps } from "./cli-util.js";
import { RpbsError } from "./errors.js";
import { buildRunCommand, hasWildcard, planLocalRun } from "./dispatcher.js";

type RunOpts = {
  file: boolean;
  remote: boolean;
  data?: string;
  prog?: string;
  rsync: boolean;
};

type TransferOpts = {
  rsync: boolean;
};

export function splitDestination(paths: string[]): {
  sources: string[];
  destination: string;
} {
  const destination = paths[paths.length - 1];
  if (paths.length < 2 || destination === undefined) {
    throw new RpbsError("give at least one source and a destination");
  }
  return { sources: paths.slice(0, -1), destination };
}

export function registerRemoteCommands(program: Command, deps: CliDeps = {}) {
  program
    .command("run")
    .description("Run commands or scripts on the active host")
    .argument("<commands...>", "a command line, or script paths with --file")
    .option("-f, --file", "treat arguments as script files", false)
    .option("-r, --remote", "script files are already on the active host", false)
    .option("--data <dir>", "local data directory to upload beside the scripts")
    .option("--prog <interpreter>", "run each script with this program")
    .option("--rsync", "upload with rsync instead of scp", false)
    .action((commands: string[], opts: RunOpts, command: Command) =>
      runCommand(command, deps, async (ctx) => {
        const remoteDir = ctx.settings.remoteDir;
        if (ctx.settings.dryRun) {
          if (!opts.file) {
            ctx.print(commands.join(" "));
          } else if (opts.remote) {
            ctx.print(
              commands.some(hasWildcard)
                ? `ls ${commands.join(" ")} | run each${opts.prog ? ` with ${opts.prog}` : ""}`
                : buildRunCommand(commands, opts.prog),
            );
          } else {
            const plan = await planLocalRun(
              commands,
              { remoteDir, dataDir: opts.data, interpreter: opts.prog },
              ctx.logger,
            );
            for (const upload of plan.uploads) {
              ctx.print(`upload ${upload.sources.join(" ")} -> ${upload.destination}`);
            }
            ctx.print(plan.command);
          }
          return;
        }

        const host = await ctx.activeHost();
        await ctx.withDispatcher(host, async (dispatcher) => {
          if (!opts.file) {
            await dispatcher.runInline(commands.join(" "));
          } else if (opts.remote) {
            await dispatcher.runRemoteFiles(commands, { interpreter: opts.prog });
          } else {
            await dispatcher.runLocalFiles(commands, {
              remoteDir,
              dataDir: opts.data,
              interpreter: opts.prog,
              rsync: opts.rsync,
            });
          }
        });
      }),
    );

  program
    .command("upload")
    .description("Upload files or directories to the active host")
    .argument("<paths...>", "local files or directories, then the remote directory")
    .option("--rsync", "use rsync instead of scp", false)
    .action(
      (paths: string[], opts: TransferOpts, command: Command) =>
        runCommand(command, deps, async (ctx) => {
          const { sources, destination } = splitDestination(paths);
          const host = await ctx.activeHost();
          const transfer = ctx.transferFor(host);
          if (ctx.settings.dryRun) {
            ctx.print(`=> Running upload to ${describeHost(host)}`);
            ctx.print(transfer.planUpload(sources, destination, opts).display);
            return;
          }
          await transfer.upload(sources, destination, opts);
        }),
    );

  program
    .command("download")
    .description("Download files or directories from the active host")
    .argument(
      "<paths...>",
      "remote files or directories, then the local directory (created if missing)",
    )
    .option("--rsync", "use rsync instead of scp", false)
    .action(
      (paths: string[], opts: TransferOpts, command: Command) =>
        runCommand(command, deps, async (ctx) => {
          const { sources, destination } = splitDestination(paths);
          const host = await ctx.activeHost();
          const transfer = ctx.transferFor(host);
          if (ctx.settings.dryRun) {
            ctx.print(`=> Running download from ${describeHost(host)}`);
            ctx.print(transfer.planDownload(sources, destination, opts).display);
            return;
          }
          await transfer.download(sources, destination, opts);
        }),
    );
}
