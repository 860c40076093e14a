/**
 * Display-order property provider for host tree pipelines
 */

import type {
  DisplayOrderPropertyValues,
  ItemIdentity,
  MakeRooted,
  OrderedItems,
  OrderProviderOptions,
  TreeItemPropertiesProvider,
  TreeItemPropertyContext,
  TreeItemPropertyValues,
} from "./types.js";
import { OrderIndexComputer } from "./order-index.js";
import { createPathRooter } from "./rooting.js";
import { logger } from "./observability/logs.js";

/**
 * Check whether the host values object accepts display-order writes
 */
export function supportsDisplayOrder(
  values: TreeItemPropertyValues
): values is DisplayOrderPropertyValues {
  return "setDisplayOrder" in values && typeof values.setDisplayOrder === "function";
}

/**
 * Assigns display order to nodes listed in the ordered items, and moves
 * unlisted non-folder nodes (typically hidden files shown by "show all") to the end
 */
export class DisplayOrderPropertyProvider implements TreeItemPropertiesProvider {
  readonly #computer: OrderIndexComputer;

  constructor(orderedItems: OrderedItems, makeRooted: MakeRooted) {
    this.#computer = new OrderIndexComputer(orderedItems, makeRooted);
  }

  get orderedItems(): OrderedItems {
    return this.#computer.orderedItems;
  }

  /**
   * Underlying index, for inspection
   */
  get index(): OrderIndexComputer {
    return this.#computer;
  }

  calculatePropertyValues(context: TreeItemPropertyContext, values: TreeItemPropertyValues): void {
    if (!supportsDisplayOrder(values)) {
      logger.debug("order.capability_missing", { item: context.itemName });
      return;
    }

    const order = this.#computer.evaluate(
      context.itemName,
      context.isFolder,
      context.itemType,
      context.metadata
    );
    if (order !== undefined) {
      values.setDisplayOrder(order);
    }
  }
}

/**
 * Normalize plain include strings to item identities
 */
export function toItemIdentities(items: ReadonlyArray<string | ItemIdentity>): ItemIdentity[] {
  return items.map((item) => (typeof item === "string" ? { evaluatedInclude: item } : item));
}

/**
 * Create a display-order provider from an ordered include list
 */
export function createOrderProvider(options: OrderProviderOptions): DisplayOrderPropertyProvider {
  const makeRooted = options.makeRooted ?? createPathRooter(options.projectDir ?? process.cwd());
  return new DisplayOrderPropertyProvider(toItemIdentities(options.items), makeRooted);
}
