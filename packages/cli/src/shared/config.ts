import { homedir } from "node:os";
import { posix, win32 } from "node:path";

export const LINKSHELF_VERSION = "0.1.0";

export const STORE_DIRECTORY_NAME = "linkshelf";
export const STORE_FILE_NAME = "store.json";
export const DEFAULT_USER_AGENT = `linkshelf/${LINKSHELF_VERSION}`;

export interface RuntimeConfig {
  storePath: string;
  userAgent: string;
}

export interface ConfigSources {
  env: Record<string, string | undefined>;
  platform: NodeJS.Platform;
  homeDir: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}

function expandHome(path: string, homeDir: string, join: (...parts: string[]) => string): string {
  if (path === "~") {
    return homeDir;
  }

  if (path.startsWith("~/") || path.startsWith("~\\")) {
    return join(homeDir, path.slice(2));
  }

  return path;
}

function resolveStorePath({ env, platform, homeDir }: ConfigSources): string {
  const join = platform === "win32" ? win32.join : posix.join;

  const explicit = nonEmpty(env.LINKSHELF_STORE);
  if (explicit) {
    return expandHome(explicit, homeDir, join);
  }

  const xdgConfigHome = nonEmpty(env.XDG_CONFIG_HOME);
  if (xdgConfigHome) {
    return join(xdgConfigHome, STORE_DIRECTORY_NAME, STORE_FILE_NAME);
  }

  const appData = nonEmpty(env.APPDATA);
  if (platform === "win32" && appData) {
    return join(appData, STORE_DIRECTORY_NAME, STORE_FILE_NAME);
  }

  return join(homeDir, ".config", STORE_DIRECTORY_NAME, STORE_FILE_NAME);
}

export function resolveRuntimeConfig(
  sources: ConfigSources = { env: process.env, platform: process.platform, homeDir: homedir() }
): RuntimeConfig {
  return {
    storePath: resolveStorePath(sources),
    userAgent: nonEmpty(sources.env.LINKSHELF_USER_AGENT) ?? DEFAULT_USER_AGENT
  };
}
