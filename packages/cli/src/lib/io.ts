/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";

/**
 * Where command output goes; the process streams in production, buffers in tests
 */
export interface CliStreams {
  out(text: string): void;
  err(text: string): void;
  /** Colorize stderr */
  errIsTTY: boolean;
}

export const processStreams: CliStreams = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (text) => {
    process.stderr.write(text);
  },
  errIsTTY: process.stderr.isTTY ?? false,
};

/**
 * Read pack references from a list file, one per line.
 * Blank lines and `#` comments are skipped.
 */
export async function readReferenceFile(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, "utf8");
  return content
    .split(/\r?\n/)
    .map((line) => line.replace(/#.*$/, "").trim())
    .filter((line) => line !== "");
}
