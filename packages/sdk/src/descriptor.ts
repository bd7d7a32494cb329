/**
 * Pack descriptor (.pdsc) reader
 *
 * Only the fields the installer needs are modelled: vendor, name, url,
 * license, the release history and the required packs.
 */

import { z } from "zod";
import { DescriptorError } from "./errors.js";
import { withTrailingSlash } from "./entry.js";
import { parseXml } from "./format/xml.js";
import { readTextFile } from "./io.js";
import type { IndexEntry } from "./types.js";
import { compareVersions, stripMeta, UNBOUNDED, type RequirementTuple } from "./version.js";

export interface Release {
  version: string;
  date?: string;
  url?: string;
}

export interface Requirement {
  vendor: string;
  name: string;
  /** Version range as written in the descriptor ("" when absent) */
  version: string;
}

const ARRAY_PATHS = new Set([
  "package.releases.release",
  "package.requirements.packages",
  "package.requirements.packages.package",
]);

// A bare-text <release> carries no version and is skipped
const releaseSchema = z
  .union([
    z.string(),
    z.object({
      "@_version": z.string().default(""),
      "@_date": z.string().optional(),
      "@_Date": z.string().optional(),
      "@_url": z.string().optional(),
    }),
  ])
  .transform((raw): Release | undefined => {
    if (typeof raw === "string" || raw["@_version"] === "") {
      return undefined;
    }
    const release: Release = { version: raw["@_version"] };
    const date = raw["@_date"] ?? raw["@_Date"];
    if (date) release.date = date;
    if (raw["@_url"]) release.url = raw["@_url"];
    return release;
  });

const requirementSchema = z.object({
  "@_vendor": z.string().min(1),
  "@_name": z.string().min(1),
  "@_version": z.string().default(""),
});

const pdscSchema = z.object({
  package: z.object({
    vendor: z.string().min(1),
    name: z.string().min(1),
    url: z.string().default(""),
    license: z.string().optional(),
    releases: z
      .union([z.literal(""), z.object({ release: z.array(releaseSchema).default([]) })])
      .optional(),
    requirements: z
      .union([
        z.literal(""),
        z.object({
          packages: z
            .array(z.union([z.literal(""), z.object({ package: z.array(requirementSchema).default([]) })]))
            .default([]),
        }),
      ])
      .optional(),
  }),
});

/**
 * Parsed descriptor
 */
export class PackDescriptor {
  readonly vendor: string;
  readonly name: string;
  readonly url: string;
  readonly license: string | undefined;
  /** Newest first, as listed in the file */
  readonly releases: readonly Release[];
  readonly requirements: readonly Requirement[];

  constructor(init: {
    vendor: string;
    name: string;
    url: string;
    license?: string;
    releases: Release[];
    requirements: Requirement[];
  }) {
    this.vendor = init.vendor;
    this.name = init.name;
    this.url = init.url;
    this.license = init.license;
    this.releases = init.releases;
    this.requirements = init.requirements;
  }

  /**
   * Version of the first release, or "" when there is none
   */
  latestVersion(): string {
    return this.releases[0]?.version ?? "";
  }

  allReleases(): string[] {
    return this.releases.map((release) => release.version);
  }

  /**
   * Release matching a version, ignoring leading zeros and build metadata.
   * An empty version selects the latest release.
   */
  findRelease(version: string): Release | undefined {
    if (version === "") {
      return this.releases[0];
    }
    return this.releases.find(
      (release) => compareVersions(stripMeta(release.version), stripMeta(version)) === 0
    );
  }

  /**
   * Required packs as raw `[name, vendor, range]` tuples
   *
   * A missing version becomes `latest`, a single version `x` becomes `x:_`.
   */
  dependencies(): RequirementTuple[] {
    return this.requirements.map(({ vendor, name, version }): RequirementTuple => {
      if (version === "") {
        return [name, vendor, "latest"];
      }
      return [name, vendor, version.includes(":") ? version : `${version}:${UNBOUNDED}`];
    });
  }

  /**
   * Archive URL for a version (latest when omitted)
   */
  packUrl(version = ""): string {
    const selected = version === "" ? this.latestVersion() : version;
    return `${withTrailingSlash(this.url)}${this.vendor}.${this.name}.${stripMeta(selected)}.pack`;
  }

  /**
   * Index entry at the latest release
   */
  toEntry(url = this.url): IndexEntry {
    return { vendor: this.vendor, name: this.name, version: this.latestVersion(), url };
  }
}

/**
 * Parse descriptor text
 * @param source - File name or archive entry used in error messages
 * @throws DescriptorError when the text is not a well-formed descriptor
 */
export function parseDescriptor(text: string, source: string): PackDescriptor {
  const parsed = parseXml(text, ARRAY_PATHS);
  if (!parsed.ok) {
    throw new DescriptorError(source, parsed.reason);
  }

  const result = pdscSchema.safeParse(parsed.value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new DescriptorError(
      source,
      issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid document",
      { cause: result.error }
    );
  }

  const pkg = result.data.package;

  const releases: Release[] = [];
  if (typeof pkg.releases === "object") {
    for (const release of pkg.releases.release) {
      if (release) releases.push(release);
    }
  }

  const requirements: Requirement[] = [];
  if (typeof pkg.requirements === "object") {
    for (const group of pkg.requirements.packages) {
      if (typeof group !== "object") continue;
      for (const raw of group.package) {
        requirements.push({ vendor: raw["@_vendor"], name: raw["@_name"], version: raw["@_version"] });
      }
    }
  }

  const init: ConstructorParameters<typeof PackDescriptor>[0] = {
    vendor: pkg.vendor,
    name: pkg.name,
    url: pkg.url,
    releases,
    requirements,
  };
  if (pkg.license) init.license = pkg.license;
  return new PackDescriptor(init);
}

/**
 * Read and parse a descriptor file
 */
export async function readDescriptor(filePath: string): Promise<PackDescriptor> {
  const text = await readTextFile(filePath);
  return parseDescriptor(text, filePath);
}
