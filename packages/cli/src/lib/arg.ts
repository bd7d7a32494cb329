/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import type { IndexScope } from "@packdepot/sdk";

export type ScopeOption = IndexScope | "all";

const SCOPES: readonly ScopeOption[] = ["web", "local", "all"];

function isScope(value: string): value is ScopeOption {
  return SCOPES.some((scope) => scope === value);
}

/**
 * Parse the --scope option of `list`
 */
export function parseScope(value: string): ScopeOption {
  const trimmed = value.trim().toLowerCase();
  if (!isScope(trimmed)) {
    throw new InvalidArgumentError(`--scope must be one of ${SCOPES.join(", ")}`);
  }
  return trimmed;
}
