/**
 * treeorder SDK
 *
 * Display order for project trees, taken from the order items are listed in
 */

export const VERSION = "0.1.0";

// Re-export types
export type {
  ItemIdentity,
  OrderedItems,
  MakeRooted,
  TreeItemMetadata,
  TreeItemPropertyContext,
  TreeItemPropertyValues,
  DisplayOrderPropertyValues,
  TreeItemPropertiesProvider,
  OrderProviderOptions,
  Manifest,
  ManifestFormat,
} from "./types.js";

// Order index
export { OrderIndexComputer, MAX_DISPLAY_ORDER, FULL_PATH_PROPERTY } from "./order-index.js";
export {
  DisplayOrderPropertyProvider,
  createOrderProvider,
  supportsDisplayOrder,
  toItemIdentities,
} from "./provider.js";

// Path utilities
export { PATH_SEPARATORS, splitInclude, leafName, findDuplicateLeaves, foldKey } from "./paths.js";
export { createPathRooter } from "./rooting.js";

// Manifests
export { loadManifest, parseManifest, detectManifestFormat } from "./manifest.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";

// Re-export errors
export {
  TreeOrderError,
  InvalidPathError,
  ManifestNotFoundError,
  ManifestReadError,
  ManifestParseError,
} from "./errors.js";
