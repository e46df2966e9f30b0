// src/host-cli.ts
import { Command } from "commander";
import {
  describeHost,
  lookupFrom,
  parsePort,
  runCommand,
  type CliDeps,
  type LookupOptions,
} from "./cli-util.js";
import { DEFAULT_SSH_PORT } from "./constants.js";
import { renderHostTable } from "./host-registry.js";

function addLookupOptions(cmd: Command): Command {
  return cmd
    .option("-u, --username <name>", "match by username (with --address)")
    .option("-H, --address <address>", "match by address (with --username)")
    .option("-p, --port <port>", "match by port", parsePort, DEFAULT_SSH_PORT);
}

export function registerHostCommands(program: Command, deps: CliDeps = {}) {
  program
    .command("add")
    .description("Add a remote host")
    .argument("<alias>", "short name for the host")
    .argument("<username>", "login name")
    .argument("<address>", "host name or IP address")
    .option("-p, --port <port>", "SSH port", parsePort, DEFAULT_SSH_PORT)
    .action(
      (
        alias: string,
        username: string,
        address: string,
        opts: { port: number },
        command: Command,
      ) =>
        runCommand(command, deps, async (ctx) => {
          if (ctx.settings.dryRun) {
            ctx.print(`=> Running add ${describeHost([alias, username, address, opts.port])}`);
            return;
          }
          const registry = await ctx.loadRegistry();
          const result = await registry.add([alias, username, address, opts.port]);
          ctx.print(
            result === "added"
              ? "=> Added successfully!"
              : "=> Input host exists. Will not change.",
          );
        }),
    );

  addLookupOptions(
    program
      .command("delete")
      .description("Delete a remote host")
      .argument("[alias]", "alias of the host to delete"),
  ).action((alias: string | undefined, opts: LookupOptions, command: Command) =>
    runCommand(command, deps, async (ctx) => {
      const lookup = lookupFrom(alias, opts);
      if (ctx.settings.dryRun) {
        ctx.print(`=> Running delete ${JSON.stringify(lookup)}`);
        return;
      }
      const registry = await ctx.loadRegistry();
      const wasActive = registry.active;
      const active = await registry.delete(lookup);
      ctx.print("=> Removed host from available list.");
      if (wasActive && (!active || active[0] !== wasActive[0])) {
        ctx.print(active ? `=> Active host is now ${active[0]}` : "=> No active host left");
      }
    }),
  );

  addLookupOptions(
    program
      .command("switch")
      .description("Switch the active host")
      .argument("[alias]", "alias of the host to activate"),
  ).action((alias: string | undefined, opts: LookupOptions, command: Command) =>
    runCommand(command, deps, async (ctx) => {
      const lookup = lookupFrom(alias, opts);
      if (ctx.settings.dryRun) {
        ctx.print(`=> Running switch ${JSON.stringify(lookup)}`);
        return;
      }
      const registry = await ctx.loadRegistry();
      const host = await registry.switch(lookup);
      ctx.print(`=> ${host[0]} activated.`);
    }),
  );

  program
    .command("rename")
    .description("Rename a host alias")
    .argument("<old>", "current alias")
    .argument("<new>", "new alias")
    .action((oldAlias: string, newAlias: string, _opts: object, command: Command) =>
      runCommand(command, deps, async (ctx) => {
        if (ctx.settings.dryRun) {
          ctx.print(`=> Running rename ${oldAlias} to ${newAlias}`);
          return;
        }
        const registry = await ctx.loadRegistry();
        await registry.rename(oldAlias, newAlias);
        ctx.print(`=> Renamed ${oldAlias} to ${newAlias}.`);
      }),
    );

  program
    .command("list")
    .description("List remote hosts")
    .option("--json", "emit JSON instead of a table", false)
    .action((opts: { json: boolean }, command: Command) =>
      runCommand(command, deps, async (ctx) => {
        const registry = await ctx.loadRegistry();
        if (opts.json) {
          ctx.print(JSON.stringify(registry.list(), null, 2));
          return;
        }
        ctx.print(renderHostTable(registry.list()));
      }),
    );
}
