/**
 * Error types for treeorder operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all treeorder errors
 */
export abstract class TreeOrderError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an include cannot be rooted
 */
export class InvalidPathError extends TreeOrderError {
  readonly code = "E_PATH";

  constructor(path: string, reason: string, options?: ErrorOptions) {
    super(`Invalid path "${path}": ${reason}`, options);
  }
}

/**
 * Thrown when a manifest file does not exist
 */
export class ManifestNotFoundError extends TreeOrderError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Manifest not found: ${filePath}`, options);
  }
}

/**
 * Thrown when a manifest file cannot be read
 */
export class ManifestReadError extends TreeOrderError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read manifest: ${filePath}`, options);
  }
}

/**
 * Thrown when manifest content is not valid JSON or does not match the manifest shape
 */
export class ManifestParseError extends TreeOrderError {
  readonly code = "E_MANIFEST";

  constructor(
    public readonly source: string,
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid manifest ${source}: ${issues.join("; ")}`, options);
  }
}
