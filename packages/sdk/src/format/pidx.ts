/**
 * Pack index (.pidx) document codec
 *
 * ```xml
 * <index schemaVersion="1.1.0">
 *   <vendor>local_repository</vendor>
 *   <url></url>
 *   <timestamp>2026-01-01T00:00:00.000Z</timestamp>
 *   <pindex>
 *     <pdsc url="…" vendor="…" name="…" version="…" deprecated="…" replacement="…"/>
 *   </pindex>
 * </index>
 * ```
 */

import { z } from "zod";
import type { IndexEntry } from "../types.js";
import { buildXml, parseXml } from "./xml.js";

export const PIDX_SCHEMA_VERSION = "1.1.0";

export interface PidxDocument {
  schemaVersion: string;
  vendor: string;
  url: string;
  timestamp?: string;
  entries: IndexEntry[];
}

const ARRAY_PATHS = new Set(["index.pindex.pdsc"]);

const pdscSchema = z.object({
  "@_vendor": z.string().min(1),
  "@_name": z.string().min(1),
  "@_version": z.string().min(1),
  "@_url": z.string().default(""),
  "@_deprecated": z.string().optional(),
  "@_replacement": z.string().optional(),
});

const pidxSchema = z.object({
  index: z.object({
    "@_schemaVersion": z.string().optional(),
    vendor: z.string().optional(),
    url: z.string().optional(),
    timestamp: z.string().optional(),
    pindex: z.union([z.literal(""), z.object({ pdsc: z.array(pdscSchema).default([]) })]).optional(),
  }),
});

/**
 * Parse a .pidx document
 * @returns the document, or a reason string when it is malformed
 */
export function decodePidx(text: string): { ok: true; value: PidxDocument } | { ok: false; reason: string } {
  const parsed = parseXml(text, ARRAY_PATHS);
  if (!parsed.ok) {
    return parsed;
  }

  const result = pidxSchema.safeParse(parsed.value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    return { ok: false, reason: `${where}: ${issue?.message ?? "invalid document"}` };
  }

  const index = result.data.index;
  const records = typeof index.pindex === "object" ? index.pindex.pdsc : [];

  const entries = records.map((record): IndexEntry => {
    const entry: IndexEntry = {
      vendor: record["@_vendor"],
      name: record["@_name"],
      version: record["@_version"],
      url: record["@_url"],
    };
    const deprecated = record["@_deprecated"];
    const replacement = record["@_replacement"];
    if (deprecated) entry.deprecated = deprecated;
    if (replacement) entry.replacement = replacement;
    return entry;
  });

  const document: PidxDocument = {
    schemaVersion: index["@_schemaVersion"] ?? PIDX_SCHEMA_VERSION,
    vendor: index.vendor ?? "",
    url: index.url ?? "",
    entries,
  };
  if (index.timestamp) {
    document.timestamp = index.timestamp;
  }
  return { ok: true, value: document };
}

/**
 * Serialize a .pidx document
 */
export function encodePidx(document: PidxDocument): string {
  const records = document.entries.map((entry) => {
    const record: Record<string, string> = {
      "@_url": entry.url,
      "@_vendor": entry.vendor,
      "@_name": entry.name,
      "@_version": entry.version,
    };
    if (entry.deprecated) record["@_deprecated"] = entry.deprecated;
    if (entry.replacement) record["@_replacement"] = entry.replacement;
    return record;
  });

  return buildXml({
    index: {
      "@_schemaVersion": document.schemaVersion,
      vendor: document.vendor,
      url: document.url,
      timestamp: document.timestamp ?? "",
      pindex: records.length > 0 ? { pdsc: records } : "",
    },
  });
}
