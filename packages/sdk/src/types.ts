/**
 * Core types for treeorder
 */

/**
 * One entry of the ordered item list
 */
export interface ItemIdentity {
  /** Item path as written in the project, possibly relative, `/` or `\` separated */
  evaluatedInclude: string;
}

/**
 * Ordered item list; position defines index assignment order
 */
export type OrderedItems = readonly ItemIdentity[];

/**
 * Resolves a possibly-relative include to its fully-qualified form.
 * Must be deterministic for a given project.
 */
export type MakeRooted = (path: string) => string;

/**
 * Node metadata supplied by the host tree (e.g. `FullPath`)
 */
export type TreeItemMetadata = Readonly<Record<string, string | undefined>>;

/**
 * Host description of the tree node being customized
 */
export interface TreeItemPropertyContext {
  /** Display name of the node (its own leaf name) */
  itemName: string;
  /** True for folder nodes */
  isFolder: boolean;
  /** Project item type; null or empty while the node is still being populated */
  itemType?: string | null;
  /** Node metadata, may carry `FullPath` */
  metadata: TreeItemMetadata;
}

/**
 * Mutable node properties handed out by the host; its write surface varies by host
 */
export type TreeItemPropertyValues = object;

/**
 * Extended write capability for hosts that support display ordering
 */
export interface DisplayOrderPropertyValues {
  setDisplayOrder(order: number): void;
}

/**
 * A tree properties provider invoked once per node by the host pipeline
 */
export interface TreeItemPropertiesProvider {
  calculatePropertyValues(context: TreeItemPropertyContext, values: TreeItemPropertyValues): void;
}

/**
 * Options for creating a display-order provider
 */
export interface OrderProviderOptions {
  /** Ordered includes, as plain strings or item identities */
  items: ReadonlyArray<string | ItemIdentity>;
  /** Directory relative includes are rooted against (default: process.cwd()) */
  projectDir?: string;
  /** Custom path rooting; overrides projectDir */
  makeRooted?: MakeRooted;
}

/**
 * Ordered item list loaded from a manifest file
 */
export interface Manifest {
  /** Absolute project directory */
  projectDir: string;
  items: ItemIdentity[];
}

/**
 * Manifest source format
 */
export type ManifestFormat = "json" | "lines";
