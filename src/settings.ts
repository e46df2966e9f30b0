// src/settings.ts
import os from "node:os";
import { join } from "node:path";
import {
  CLI_NAME,
  DEFAULT_PRIVATE_KEY,
  DEFAULT_REMOTE_DIR,
  HOST_FILE_NAME,
} from "./constants.js";
import { parseLogLevel, type LogLevel } from "./logger.js";

type Env = Record<string, string | undefined>;

export interface Settings {
  hostFile: string;
  privateKey: string;
  passphrase: string;
  remoteDir: string;
  logLevel: LogLevel;
  dryRun: boolean;
}

export interface SettingsInput {
  hostFile?: string;
  privateKey?: string;
  passphrase?: string;
  remoteDir?: string;
  logLevel?: string;
  dryRun?: boolean;
}

export function expandHome(p: string, home = os.homedir()): string {
  if (p === "~") return home;
  if (p.startsWith("~/") || p.startsWith("~\\")) {
    return join(home, p.slice(2));
  }
  return p;
}

function envValue(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

export function getConfigHome(
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  home = os.homedir(),
): string {
  const explicit = envValue(env, "RPBS_HOME");
  if (explicit) return expandHome(explicit, home);

  const xdg = envValue(env, "XDG_CONFIG_HOME");
  if (xdg) return join(expandHome(xdg, home), CLI_NAME);

  if (platform === "win32") {
    const appData = envValue(env, "APPDATA") ?? join(home, "AppData", "Roaming");
    return join(appData, CLI_NAME);
  }
  return join(home, ".config", CLI_NAME);
}

export function getHostFilePath(env: Env = process.env): string {
  return join(getConfigHome(env), HOST_FILE_NAME);
}

/** Flag > environment > default, with `~` expanded in local paths. */
export function resolveSettings(
  input: SettingsInput = {},
  env: Env = process.env,
): Settings {
  const hostFile =
    input.hostFile ?? envValue(env, "RPBS_HOST_FILE") ?? getHostFilePath(env);
  const privateKey =
    input.privateKey ?? envValue(env, "RPBS_PRIVATE_KEY") ?? DEFAULT_PRIVATE_KEY;
  return {
    hostFile: expandHome(hostFile),
    privateKey: expandHome(privateKey),
    passphrase: input.passphrase ?? env.RPBS_PASSPHRASE ?? "",
    remoteDir:
      input.remoteDir ?? envValue(env, "RPBS_REMOTE_DIR") ?? DEFAULT_REMOTE_DIR,
    logLevel: parseLogLevel(input.logLevel ?? envValue(env, "RPBS_LOG_LEVEL")),
    dryRun: input.dryRun ?? false,
  };
}
