/**
 * I/O helpers for CLI
 */

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}
