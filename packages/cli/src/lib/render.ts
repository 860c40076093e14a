/**
 * Output rendering helpers
 */

type Color = "red" | "yellow";

const COLOR_CODES: Record<Color, string> = {
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

/**
 * Print JSON to stdout, indented unless `raw`
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  console.log(options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2));
}

/**
 * Print one line per entry
 */
export function printLines(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

/**
 * Print an evaluated display order. No opinion prints `none` (`null` in JSON),
 * or nothing at all when quiet.
 */
export function printOrder(order: number | undefined, options: { json?: boolean; quiet?: boolean } = {}): void {
  if (options.json) {
    printJson({ order: order ?? null }, { raw: true });
  } else if (order !== undefined) {
    console.log(String(order));
  } else if (!options.quiet) {
    console.log(colorize("none", "yellow"));
  }
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(text: string, color: Color, stream: NodeJS.WriteStream = process.stdout): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }
  return `${COLOR_CODES[color]}${text}\x1b[0m`;
}
