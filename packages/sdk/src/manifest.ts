/**
 * Ordered item manifests
 *
 * JSON manifests hold an array of entries or `{ projectDir?, items }`; an entry is
 * an include string or `{ evaluatedInclude }`. Any other file is read as one
 * include per line, skipping blank lines and `#` comments.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import type { ItemIdentity, Manifest, ManifestFormat } from "./types.js";
import { ManifestNotFoundError, ManifestParseError, ManifestReadError } from "./errors.js";
import { toItemIdentities } from "./provider.js";

const EntrySchema = z.union([z.string(), z.object({ evaluatedInclude: z.string() })]);

const EntryListSchema = z.array(EntrySchema);

const ManifestObjectSchema = z
  .object({
    projectDir: z.string().min(1, "projectDir must be non-empty").optional(),
    items: EntryListSchema,
  })
  .strict();

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

/**
 * Pick the manifest format from a file name
 */
export function detectManifestFormat(filePath: string): ManifestFormat {
  return path.extname(filePath).toLowerCase() === ".json" ? "json" : "lines";
}

function parseLines(content: string): ItemIdentity[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"))
    .map((evaluatedInclude) => ({ evaluatedInclude }));
}

function parseJsonManifest(
  content: string,
  source: string
): { projectDir?: string; items: ItemIdentity[] } {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ManifestParseError(source, [`invalid JSON (${reason})`], { cause: err });
  }

  if (Array.isArray(raw)) {
    const result = EntryListSchema.safeParse(raw);
    if (!result.success) {
      throw new ManifestParseError(source, formatIssues(result.error));
    }
    return { items: toItemIdentities(result.data) };
  }

  const result = ManifestObjectSchema.safeParse(raw);
  if (!result.success) {
    throw new ManifestParseError(source, formatIssues(result.error));
  }
  return { projectDir: result.data.projectDir, items: toItemIdentities(result.data.items) };
}

/**
 * Parse manifest text
 * @param content - Manifest text
 * @param format - "json" or "lines"
 * @param baseDir - Directory a relative or missing projectDir resolves against
 * @param source - Label used in error messages
 * @throws ManifestParseError if JSON content is malformed
 */
export function parseManifest(
  content: string,
  format: ManifestFormat,
  baseDir: string,
  source = "<inline>"
): Manifest {
  // Strip BOM if present
  const cleaned = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

  if (format === "lines") {
    return { projectDir: path.resolve(baseDir), items: parseLines(cleaned) };
  }

  const parsed = parseJsonManifest(cleaned, source);
  return {
    projectDir: path.resolve(baseDir, parsed.projectDir ?? "."),
    items: parsed.items,
  };
}

/**
 * Load a manifest file; projectDir defaults to the manifest's directory
 * @throws ManifestNotFoundError if the file does not exist
 * @throws ManifestReadError if the file cannot be read
 * @throws ManifestParseError if the content is invalid
 */
export async function loadManifest(filePath: string): Promise<Manifest> {
  const absolute = path.resolve(filePath);

  let content: string;
  try {
    content = await fs.readFile(absolute, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      throw new ManifestNotFoundError(absolute, { cause: err });
    }
    throw new ManifestReadError(absolute, { cause: err });
  }

  return parseManifest(content, detectManifestFormat(absolute), path.dirname(absolute), absolute);
}
