/**
 * Order index adapter for CLI
 * Loads the manifest and builds the provider the commands query
 */

import {
  createOrderProvider,
  createPathRooter,
  loadManifest,
  type DisplayOrderPropertyProvider,
  type MakeRooted,
  type Manifest,
} from "@treeorder/sdk";
import { resolveManifestPath, resolveProjectDir } from "./env.js";

/**
 * Manifest-backed order index used by a single CLI invocation
 */
export interface CliIndex {
  /** Loaded manifest, with projectDir after overrides */
  manifest: Manifest;
  provider: DisplayOrderPropertyProvider;
  /** Rooter for the effective project directory */
  makeRooted: MakeRooted;
}

/**
 * Open the order index for the configured manifest
 */
export async function openCliIndex(options: {
  manifest?: string;
  projectDir?: string;
}): Promise<CliIndex> {
  const loaded = await loadManifest(resolveManifestPath(options.manifest));
  const manifest: Manifest = {
    ...loaded,
    projectDir: resolveProjectDir(options.projectDir) ?? loaded.projectDir,
  };

  const makeRooted = createPathRooter(manifest.projectDir);
  const provider = createOrderProvider({ items: manifest.items, makeRooted });

  return { manifest, provider, makeRooted };
}
