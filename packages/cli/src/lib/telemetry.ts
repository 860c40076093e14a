/**
 * Timing metrics for CLI commands, written to stderr when TREEORDER_CLI_DEBUG=1
 */

import type { DisplayOrderPropertyProvider } from "@treeorder/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Fields attached to a metric line, in insertion order
 */
export type MetricFields = Record<string, string | number | boolean>;

export interface MetricOptions {
  /** Suppress the metric even in verbose mode (`--quiet`) */
  quiet?: boolean;
}

function sanitizeMetricPart(part: string | number | boolean): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(key: string, fields: MetricFields, options: MetricOptions = {}): void {
  if (options.quiet || !isVerbose()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Size of a loaded order index: listed items, name-keyed and path-keyed entries
 */
export function indexMetrics(provider: DisplayOrderPropertyProvider): MetricFields {
  return {
    items: provider.orderedItems.length,
    names: provider.index.nameOrder().size,
    paths: provider.index.pathOrder().size,
  };
}

/**
 * Wrap a command with timing metrics. The command may add its own fields
 * (e.g. {@link indexMetrics}); they are written before duration and outcome.
 */
export async function withTiming<T>(
  label: string,
  fn: (fields: MetricFields) => Promise<T>,
  options: MetricOptions = {}
): Promise<T> {
  const start = Date.now();
  const fields: MetricFields = {};
  let success = false;

  try {
    const result = await fn(fields);
    success = true;
    return result;
  } finally {
    emitMetric(
      label,
      {
        ...fields,
        duration_ms: Date.now() - start,
        success,
      },
      options
    );
  }
}
