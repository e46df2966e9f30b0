#!/usr/bin/env node
// src/cli.ts
import fs from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { isDirectRun, reportError, type CliDeps } from "./cli-util.js";
import { CLI_NAME } from "./constants.js";
import { registerHostCommands } from "./host-cli.js";
import { ConsoleLogger, LOG_LEVELS } from "./logger.js";
import { registerPbsCommands } from "./pbs-cli.js";
import { registerRemoteCommands } from "./remote-cli.js";

function packageVersion(): string {
  const file = path.resolve(__dirname, "../package.json");
  const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  if (
    parsed &&
    typeof parsed === "object" &&
    "version" in parsed &&
    typeof parsed.version === "string"
  ) {
    return parsed.version;
  }
  return "0.0.0";
}

export function buildProgram(deps: CliDeps = {}): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description("Manage SSH hosts, run commands remotely and submit PBS jobs")
    .version(packageVersion());

  program
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
    )
    .option("--host-file <file>", "override path to host.json")
    .option("-k, --private-key <file>", "SSH private key (default ~/.ssh/id_rsa)")
    .option("--passphrase <text>", "passphrase of the private key")
    .option("--remote-dir <dir>", "remote work directory (default /tmp)")
    .option("--dry-run", "print what would run and exit", false);

  registerHostCommands(program, deps);
  registerRemoteCommands(program, deps);
  registerPbsCommands(program, deps);
  return program;
}

async function main(argv: string[]): Promise<void> {
  const program = buildProgram();
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

if (isDirectRun(__filename)) {
  main(process.argv).catch((err: unknown) => {
    process.exitCode = reportError(err, new ConsoleLogger());
  });
}
