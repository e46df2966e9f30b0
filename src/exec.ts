import { spawn } from "node:child_process";

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type RunOptions = {
  cwd?: string;
  // "inherit" hands the terminal to the child (progress bars, prompts);
  // stdout/stderr are then empty in the result.
  stdio?: "pipe" | "inherit";
};

/** Seam for every external program this tool drives (scp, rsync, qsub). */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunOptions,
) => Promise<CommandResult>;

export const defaultCommandRunner: CommandRunner = async (
  command,
  args,
  options = {},
) => {
  const inherit = options.stdio === "inherit";
  return await new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: inherit ? "inherit" : ["ignore", "pipe", "pipe"],
      env: process.env,
    });

    let stdout = "";
    let stderr = "";
    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.once("error", reject);
    child.once("close", (code) => {
      resolve({ code: code ?? 1, stdout, stderr });
    });
  });
};

// quote only what a shell would split, for display in logs and dry runs
export function argsJoin(args: string[]): string {
  return args
    .map((x) => (/[\s'"$]/.test(x) ? `'${x.replace(/'/g, `'\\''`)}'` : x))
    .join(" ");
}
