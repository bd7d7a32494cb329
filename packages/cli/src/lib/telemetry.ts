/**
 * Telemetry and observability helpers
 */

const SANITIZE_NEWLINES = /[\r\n]+/g;

export interface Telemetry {
  emitMetric(key: string, fields: Record<string, unknown>): void;
  withTiming<T>(label: string, fn: () => Promise<T>): Promise<T>;
}

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Timing metrics written to `write` (stderr) in verbose mode only
 */
export function createTelemetry(verbose: boolean, write: (line: string) => void): Telemetry {
  function emitMetric(key: string, fields: Record<string, unknown>): void {
    if (!verbose) {
      return;
    }

    const parts = [`metric ${sanitizeMetricPart(key)}`];
    for (const [k, v] of Object.entries(fields)) {
      parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
    }

    write(parts.join(" ") + "\n");
  }

  async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    let success = false;

    try {
      const result = await fn();
      success = true;
      return result;
    } finally {
      emitMetric(label, {
        duration_ms: Date.now() - start,
        success,
      });
    }
  }

  return { emitMetric, withTiming };
}
