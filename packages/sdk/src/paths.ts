/**
 * Path splitting and duplicate-leaf detection for ordered includes
 */

import type { OrderedItems } from "./types.js";

/**
 * Characters treated as path delimiters in includes
 */
export const PATH_SEPARATORS: readonly string[] = ["/", "\\"];

const SEPARATOR_PATTERN = /[\\/]/;

/**
 * Case folding shared by the order maps (ordinal, case-insensitive).
 * Folds one code point at a time; characters whose upper case has a different
 * length (`ß` → `SS`) are kept as they are.
 */
export function foldKey(key: string): string {
  return Array.from(key, (ch) => {
    const upper = ch.toUpperCase();
    return upper.length === ch.length ? upper : ch;
  }).join("");
}

/**
 * Split an include into its non-empty segments
 * @example splitInclude("src\\lib//a.ts") // ["src", "lib", "a.ts"]
 */
export function splitInclude(include: string): string[] {
  return include.split(SEPARATOR_PATTERN).filter((segment) => segment.length > 0);
}

/**
 * Final segment of an include; empty when the include ends with a separator
 */
export function leafName(include: string): string {
  let last = -1;
  for (const separator of PATH_SEPARATORS) {
    last = Math.max(last, include.lastIndexOf(separator));
  }
  return include.slice(last + 1);
}

/**
 * Leaf names shared by two or more items, as folded keys
 */
export function findDuplicateLeaves(items: OrderedItems): ReadonlySet<string> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const key = foldKey(leafName(item.evaluatedInclude));
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  const duplicates = new Set<string>();
  for (const [key, count] of counts) {
    if (count > 1) {
      duplicates.add(key);
    }
  }
  return duplicates;
}
