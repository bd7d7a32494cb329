/**
 * Output rendering helpers
 */

import {
  formatRequirement,
  yamlPackId,
  type ListedPack,
  type PackRequirements,
  type PackUpdate,
} from "@packdepot/sdk";

type Color = "red" | "green" | "yellow";

/**
 * Serialize JSON followed by a newline
 */
export function renderJson(data: unknown, options?: { raw?: boolean }): string {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  return `${json}\n`;
}

/**
 * One line per item
 */
export function renderLines(lines: string[]): string {
  return lines.map((line) => `${line}\n`).join("");
}

/**
 * `Vendor::Name@Version (scope) url`, with deprecation appended when present
 */
export function renderListedPack({ scope, entry }: ListedPack): string {
  let line = `${yamlPackId(entry)} (${scope}) ${entry.url}`;
  if (entry.deprecated) {
    line += ` [deprecated ${entry.deprecated}${entry.replacement ? `, use ${entry.replacement}` : ""}]`;
  }
  return line;
}

/**
 * `Vendor::Name@Installed (scope) -> Available`
 */
export function renderPackUpdate({ scope, installed, available }: PackUpdate): string {
  return `${yamlPackId(installed)} (${scope}) -> ${available.version}`;
}

/**
 * A header line per pack, then one indented line per requirement
 */
export function renderRequirements({ scope, entry, requirements }: PackRequirements): string[] {
  if (requirements.length === 0) {
    return [`${yamlPackId(entry)} (${scope}): no requirements`];
  }
  return [`${yamlPackId(entry)} (${scope}):`, ...requirements.map((tuple) => `  ${formatRequirement(tuple)}`)];
}

/**
 * Apply ANSI color only when the target is a TTY
 */
export function colorize(text: string, color: Color, isTTY: boolean): string {
  if (!isTTY) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
