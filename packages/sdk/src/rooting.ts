/**
 * Default path rooting for includes relative to a project directory
 */

import * as path from "node:path";
import type { MakeRooted } from "./types.js";
import { InvalidPathError } from "./errors.js";

/**
 * Create a rooter resolving includes against `projectDir`.
 * Backslashes are read as separators, so `a\b.cs` and `a/b.cs` root to the same path.
 * @throws InvalidPathError for includes containing a NUL character
 */
export function createPathRooter(projectDir: string): MakeRooted {
  const base = path.resolve(projectDir);

  return (include: string): string => {
    if (include.includes("\0")) {
      throw new InvalidPathError(include, "contains a NUL character");
    }
    return path.resolve(base, include.replace(/\\/g, "/"));
  };
}
