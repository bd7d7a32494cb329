/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string, home: string = homedir()): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return home;
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(home, rest);
}

/**
 * Per-user pack cache when nothing else is configured
 */
export function defaultPackRoot(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = homedir()
): string {
  if (platform === "win32") {
    const localAppData = env.LOCALAPPDATA || path.win32.join(home, "AppData", "Local");
    return path.win32.join(localAppData, "Arm", "Packs");
  }
  const cache = env.XDG_CACHE_HOME || path.join(home, ".cache");
  return path.join(cache, "arm", "packs");
}

/**
 * Resolve the pack root directory
 * Priority: CLI option > CMSIS_PACK_ROOT env var > per-user cache
 */
export function resolvePackRoot(cliRoot?: string, env: NodeJS.ProcessEnv = process.env): string {
  const root = cliRoot || env.CMSIS_PACK_ROOT || defaultPackRoot(env);
  return path.resolve(expandTilde(root));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.PACKDEPOT_CLI_DEBUG === "1";
}
