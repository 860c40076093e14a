/**
 * Display-order index computed from an ordered item list
 *
 * Invariants:
 * - Indices start at 1 and are unique across both maps
 * - First occurrence wins; keys are never updated or removed
 * - Both maps are read-only once the constructor returns
 */

import type { MakeRooted, OrderedItems, TreeItemMetadata } from "./types.js";
import { findDuplicateLeaves, foldKey, splitInclude } from "./paths.js";
import { logger } from "./observability/logs.js";

/**
 * Metadata key holding a node's fully-qualified path
 */
export const FULL_PATH_PROPERTY = "FullPath";

/**
 * Order given to unlisted non-folder nodes (largest 32-bit signed integer)
 */
export const MAX_DISPLAY_ORDER = 2_147_483_647;

interface OrderEntry {
  /** Key as first seen */
  key: string;
  index: number;
}

/**
 * Case-insensitive key → index map, insert-once
 */
class OrderMap {
  #entries = new Map<string, OrderEntry>();

  has(key: string): boolean {
    return this.#entries.has(foldKey(key));
  }

  get(key: string): number | undefined {
    return this.#entries.get(foldKey(key))?.index;
  }

  add(key: string, index: number): void {
    this.#entries.set(foldKey(key), { key, index });
  }

  get size(): number {
    return this.#entries.size;
  }

  snapshot(): ReadonlyMap<string, number> {
    const copy = new Map<string, number>();
    for (const { key, index } of this.#entries.values()) {
      copy.set(key, index);
    }
    return copy;
  }
}

/**
 * Computes display order for tree nodes from the order items appear in a list.
 *
 * Folder and file names are keyed by name. Leaf names shared by several items
 * cannot be told apart by name, so any segment matching one is keyed by the
 * rooted path of the item it appears in instead.
 *
 * @example
 * ```ts
 * const computer = new OrderIndexComputer(
 *   [{ evaluatedInclude: "src/a.ts" }, { evaluatedInclude: "src/b.ts" }],
 *   (p) => `/repo/${p}`
 * );
 * computer.evaluate("b.ts", false, "Compile", {}); // 3
 * ```
 */
export class OrderIndexComputer {
  readonly #names = new OrderMap();
  readonly #paths = new OrderMap();
  readonly #orderedItems: OrderedItems;

  constructor(orderedItems: OrderedItems, makeRooted: MakeRooted) {
    this.#orderedItems = orderedItems;
    this.#computeIndices(makeRooted);
  }

  /**
   * The ordered items this index was built from, unchanged
   */
  get orderedItems(): OrderedItems {
    return this.#orderedItems;
  }

  #computeIndices(makeRooted: MakeRooted): void {
    const duplicates = findDuplicateLeaves(this.#orderedItems);
    let index = 1;

    for (const item of this.#orderedItems) {
      let rootedPath: string | undefined;

      for (const part of splitInclude(item.evaluatedInclude)) {
        if (duplicates.has(foldKey(part))) {
          // Keyed by the whole item's path, even when `part` is a folder segment
          rootedPath ??= makeRooted(item.evaluatedInclude);
          if (!this.#paths.has(rootedPath)) {
            this.#paths.add(rootedPath, index++);
          }
        } else if (!this.#names.has(part)) {
          this.#names.add(part, index++);
        }
      }
    }

    logger.debug("order.build", {
      details: {
        items: this.#orderedItems.length,
        duplicateLeaves: duplicates.size,
        names: this.#names.size,
        paths: this.#paths.size,
      },
    });
  }

  /**
   * Display order for a tree node.
   *
   * Returns `undefined` ("no opinion") for listed nodes without an item type,
   * which the host reports while a node is still being populated, and for
   * unlisted folders. Unlisted files go to the end with {@link MAX_DISPLAY_ORDER}.
   */
  evaluate(
    itemName: string,
    isFolder: boolean,
    itemType: string | null | undefined,
    metadata: TreeItemMetadata
  ): number | undefined {
    const index = this.lookup(itemName, metadata[FULL_PATH_PROPERTY]);

    if (index !== undefined) {
      return itemType ? index : undefined;
    }

    return isFolder ? undefined : MAX_DISPLAY_ORDER;
  }

  /**
   * Raw index for a name, falling back to a full path
   */
  lookup(itemName: string, fullPath?: string): number | undefined {
    const byName = this.#names.get(itemName);
    if (byName !== undefined) {
      return byName;
    }
    return fullPath === undefined ? undefined : this.#paths.get(fullPath);
  }

  /**
   * Copy of the name → index map, in index order
   */
  nameOrder(): ReadonlyMap<string, number> {
    return this.#names.snapshot();
  }

  /**
   * Copy of the rooted path → index map, in index order
   */
  pathOrder(): ReadonlyMap<string, number> {
    return this.#paths.snapshot();
  }
}
