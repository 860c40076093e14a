/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

const SEPARATOR_PATTERN = /[\\/]/;

/**
 * Parse a required non-empty string option
 */
export function parseNonEmpty(value: string, name: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new InvalidArgumentError(`${name} must be non-empty`);
  }
  return trimmed;
}

/**
 * Parse a tree node's display name (a single path segment)
 */
export function parseItemName(value: string): string {
  if (value.length === 0) {
    throw new InvalidArgumentError("name must be non-empty");
  }

  if (SEPARATOR_PATTERN.test(value)) {
    throw new InvalidArgumentError(
      `name must be a single path segment, got "${value}"; pass the location with --full-path`
    );
  }

  return value;
}
