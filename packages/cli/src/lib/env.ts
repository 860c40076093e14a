/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Default manifest file name, looked up in the working directory
 */
export const DEFAULT_MANIFEST = "./treeorder.json";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the manifest path
 * Priority: CLI option > TREEORDER_MANIFEST env var > default "./treeorder.json"
 */
export function resolveManifestPath(cliManifest?: string): string {
  const manifest = cliManifest ?? process.env.TREEORDER_MANIFEST ?? DEFAULT_MANIFEST;
  return path.resolve(expandTilde(manifest));
}

/**
 * Resolve a project directory override
 * Priority: CLI option > TREEORDER_PROJECT_DIR env var; undefined keeps the manifest's own
 */
export function resolveProjectDir(cliProjectDir?: string): string | undefined {
  const dir = cliProjectDir ?? process.env.TREEORDER_PROJECT_DIR;
  return dir ? path.resolve(expandTilde(dir)) : undefined;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.TREEORDER_CLI_DEBUG === "1";
}
