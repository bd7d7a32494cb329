/**
 * Key derivation and display helpers for index entries
 */

import type { IndexEntry } from "./types.js";
import { stripMeta } from "./version.js";

/**
 * `Vendor.Name.Version`, unique within one index
 */
export function exactKey(entry: Pick<IndexEntry, "vendor" | "name" | "version">): string {
  return `${entry.vendor}.${entry.name}.${entry.version}`;
}

/**
 * Lowercase `vendor.name`, shared by every version of a pack
 */
export function familyKey(entry: Pick<IndexEntry, "vendor" | "name">): string {
  return `${entry.vendor}.${entry.name}`.toLowerCase();
}

/**
 * Append a trailing slash unless one is present
 */
export function withTrailingSlash(url: string): string {
  return url === "" || url.endsWith("/") ? url : `${url}/`;
}

/**
 * Download URL of the pack archive an entry points at
 * @example packUrl({ vendor: "ARM", name: "CMSIS", version: "5.9.0+b1", url: "https://x/" }) === "https://x/ARM.CMSIS.5.9.0.pack"
 */
export function packUrl(entry: IndexEntry): string {
  return `${withTrailingSlash(entry.url)}${entry.vendor}.${entry.name}.${stripMeta(entry.version)}.pack`;
}

/**
 * `Vendor::Name@Version`
 */
export function yamlPackId(entry: Pick<IndexEntry, "vendor" | "name" | "version">): string {
  return `${entry.vendor}::${entry.name}@${entry.version}`;
}

/**
 * Shallow copy with optional fields dropped when empty
 */
export function cloneEntry(entry: IndexEntry): IndexEntry {
  const copy: IndexEntry = {
    vendor: entry.vendor,
    name: entry.name,
    version: entry.version,
    url: entry.url,
  };
  if (entry.deprecated) copy.deprecated = entry.deprecated;
  if (entry.replacement) copy.replacement = entry.replacement;
  return copy;
}
