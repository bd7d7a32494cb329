/**
 * Builders for pack descriptors, pack archives and checksum files
 */

import { createHash } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { strToU8, zipSync, type Zippable } from "fflate";

export interface DescriptorFixture {
  vendor: string;
  name: string;
  url?: string;
  license?: string;
  /** Newest first */
  releases: string[];
  /** [vendor, name, version] triples; version may be "" */
  requirements?: Array<[vendor: string, name: string, version: string]>;
}

/**
 * Render a minimal .pdsc document
 */
export function buildDescriptorXml(fixture: DescriptorFixture): string {
  const releases = fixture.releases
    .map((version) => `    <release version="${version}">Release ${version}</release>`)
    .join("\n");

  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<package schemaVersion="1.7.7">',
    `  <vendor>${fixture.vendor}</vendor>`,
    `  <name>${fixture.name}</name>`,
    "  <description>Test pack</description>",
    `  <url>${fixture.url ?? ""}</url>`,
  ];
  if (fixture.license) {
    lines.push(`  <license>${fixture.license}</license>`);
  }
  lines.push("  <releases>", releases, "  </releases>");

  if (fixture.requirements && fixture.requirements.length > 0) {
    lines.push("  <requirements>", "    <packages>");
    for (const [vendor, name, version] of fixture.requirements) {
      const versionAttr = version === "" ? "" : ` version="${version}"`;
      lines.push(`      <package vendor="${vendor}" name="${name}"${versionAttr}/>`);
    }
    lines.push("    </packages>", "  </requirements>");
  }

  lines.push("</package>", "");
  return lines.join("\n");
}

export interface PackArchiveFixture {
  descriptor: DescriptorFixture;
  /** Wrap every entry in this folder */
  folder?: string;
  /** Extra files, by archive path */
  files?: Record<string, string>;
  /** Replace the descriptor entry name (e.g. to omit or misplace it) */
  descriptorEntry?: string | null;
}

/**
 * Build an in-memory pack zip
 */
export function buildPackArchive(fixture: PackArchiveFixture): Uint8Array {
  const prefix = fixture.folder ? `${fixture.folder}/` : "";
  const entries: Zippable = {};

  const descriptorEntry =
    fixture.descriptorEntry === undefined
      ? `${fixture.descriptor.vendor}.${fixture.descriptor.name}.pdsc`
      : fixture.descriptorEntry;
  if (descriptorEntry !== null) {
    entries[`${prefix}${descriptorEntry}`] = strToU8(buildDescriptorXml(fixture.descriptor));
  }

  for (const [name, content] of Object.entries(fixture.files ?? {})) {
    entries[`${prefix}${name}`] = strToU8(content);
  }
  return zipSync(entries);
}

/**
 * Build a zip with arbitrary raw entry names (for traversal tests)
 */
export function buildRawZip(files: Record<string, string>): Uint8Array {
  const entries: Zippable = {};
  for (const [name, content] of Object.entries(files)) {
    entries[name] = strToU8(content);
  }
  return zipSync(entries);
}

/**
 * `<sha256> <entry>` lines for every entry of a name → content map
 */
export function buildChecksumFile(files: Record<string, string>): string {
  return Object.entries(files)
    .map(([name, content]) => `${createHash("sha256").update(content).digest("hex")} ${name}`)
    .join("\n")
    .concat("\n");
}

/**
 * Write bytes or text to a path, creating parent directories
 */
export async function writeFixture(path: string, content: Uint8Array | string): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
  return path;
}
