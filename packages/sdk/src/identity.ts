/**
 * Package reference parsing
 *
 * Accepted shapes:
 * - file name or URL: `Vendor.Pack.x.y.z.pack`, `Vendor.Pack.x.y.z.zip`, `Vendor.Pack.pdsc`
 * - dotted pack ID: `Vendor.Pack`, `Vendor.Pack.x.y.z`, `Vendor.Pack.a.b.c:x.y.z`
 * - legacy pack ID: `Vendor::Pack`, `Vendor::Pack@x.y.z`, `@^x.y.z`, `@~x.y.z`, `@>=x.y.z`, `>=x.y.z`, `@latest`
 *
 * Parsing is pure apart from resolving relative paths against the working directory.
 */

import { isAbsolute, resolve } from "node:path";
import { BadIdentifierError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { VersionModifier, type PackageIdentity, type PackExtension } from "./types.js";
import {
  VERSION_PATTERN,
  compareRange,
  compareVersions,
  major,
  majorMinor,
  sortVersionsDescending,
  stripMeta,
} from "./version.js";

const NAME_PATTERN = "[-_A-Za-z0-9]+";

const FILE_NAME_REGEX = new RegExp(
  `^(${NAME_PATTERN})\\.(${NAME_PATTERN})\\.(?:(${VERSION_PATTERN})\\.(pack|zip)|(pdsc))$`
);
const DOTTED_ID_REGEX = new RegExp(
  `^(${NAME_PATTERN})\\.(${NAME_PATTERN})(?:\\.(${VERSION_PATTERN}))?$`
);
const LEGACY_ID_REGEX = new RegExp(
  `^(${NAME_PATTERN})::(${NAME_PATTERN})(?:(@>=|@\\^|@~|@|>=)(${VERSION_PATTERN}|latest))?$`
);

const RANGE_UPPER_REGEX = new RegExp(`^(?:${VERSION_PATTERN}|_)$`);

// Vendor.Pack.a.b.c:x.y.z
const RANGE_SUFFIX_REGEX = /^([-_A-Za-z0-9]+\.){4}[-_A-Za-z0-9]+:/;
const LATEST_SUFFIX_REGEX = /^[-_A-Za-z0-9]+\.[-_A-Za-z0-9]+\.latest$/;
const REMOTE_SCHEME = /^https?:\/\//i;

const LEGACY_MODIFIERS: Record<string, VersionModifier> = {
  "@": VersionModifier.Exact,
  "@^": VersionModifier.CompatibleMajor,
  "@~": VersionModifier.CompatiblePatch,
  "@>=": VersionModifier.GreaterOrEqual,
  ">=": VersionModifier.GreaterOrEqual,
};

export interface ParseOptions {
  /** Directory relative paths are resolved against (defaults to process.cwd()) */
  cwd?: string;
}

/**
 * True for http(s) URLs
 */
export function isRemoteLocation(location: string): boolean {
  return REMOTE_SCHEME.test(location);
}

/**
 * Parse a package reference into a frozen PackageIdentity
 * @throws BadIdentifierError when the reference matches no accepted shape
 */
export function parsePackageIdentity(reference: string, options: ParseOptions = {}): PackageIdentity {
  const input = reference.trim();
  if (input === "") {
    throw new BadIdentifierError(reference, "empty reference");
  }

  let subject = input;
  let maxVersion = "";

  const rangeMatch = RANGE_SUFFIX_REGEX.exec(subject);
  if (rangeMatch) {
    const separator = subject.indexOf(":", rangeMatch[0].length - 1);
    maxVersion = subject.slice(separator + 1);
    subject = subject.slice(0, separator);
  }
  if (LATEST_SUFFIX_REGEX.test(subject)) {
    subject = subject.slice(0, -".latest".length);
  }

  if (isRemoteLocation(subject)) {
    subject = stripUrlNoise(reference, subject);
  }

  const { directory, baseName } = splitReference(subject);

  const fileMatch = FILE_NAME_REGEX.exec(baseName);
  if (fileMatch && maxVersion === "") {
    const [, vendor = "", name = "", version = "", archiveExt] = fileMatch;
    const extension: PackExtension = archiveExt === "pack" || archiveExt === "zip" ? archiveExt : "pdsc";
    const location = normalizeLocation(directory, options.cwd ?? process.cwd());

    logger.debug("identity.parsed", {
      pack: `${vendor}.${name}`,
      details: { reference, version, extension, location },
    });

    return Object.freeze({
      vendor,
      name,
      version,
      extension,
      location,
      isPackId: false,
      versionModifier: version === "" ? VersionModifier.Any : VersionModifier.Exact,
    });
  }

  if (directory !== "") {
    throw new BadIdentifierError(reference, "not a pack file name");
  }

  const identity = parsePackId(reference, subject, maxVersion);
  logger.debug("identity.parsed", {
    pack: `${identity.vendor}.${identity.name}`,
    details: { reference, version: identity.version, modifier: identity.versionModifier },
  });
  return identity;
}

function parsePackId(reference: string, subject: string, maxVersion: string): PackageIdentity {
  const dotted = DOTTED_ID_REGEX.exec(subject);
  if (dotted) {
    const [, vendor = "", name = "", version] = dotted;
    if (maxVersion !== "") {
      if (version === undefined) {
        throw new BadIdentifierError(reference, "range without a lower version");
      }
      if (!RANGE_UPPER_REGEX.test(maxVersion)) {
        throw new BadIdentifierError(reference, `invalid upper version "${maxVersion}"`);
      }
    }
    return packIdentity(
      vendor,
      name,
      version === undefined ? "" : maxVersion === "" ? version : `${version}:${maxVersion}`,
      version === undefined
        ? VersionModifier.Any
        : maxVersion === ""
          ? VersionModifier.Exact
          : VersionModifier.Range
    );
  }

  if (maxVersion !== "") {
    throw new BadIdentifierError(reference, "version ranges are only valid on Vendor.Pack.x.y.z");
  }

  const legacy = LEGACY_ID_REGEX.exec(subject);
  if (legacy) {
    const [, vendor = "", name = "", operator, version] = legacy;
    if (operator === undefined || version === undefined) {
      return packIdentity(vendor, name, "", VersionModifier.Any);
    }
    if (version === "latest") {
      if (operator !== "@") {
        throw new BadIdentifierError(reference, `"latest" cannot follow "${operator}"`);
      }
      return packIdentity(vendor, name, "latest", VersionModifier.Latest);
    }
    return packIdentity(vendor, name, version, LEGACY_MODIFIERS[operator] ?? VersionModifier.Exact);
  }

  throw new BadIdentifierError(reference, "neither a pack file name nor a pack ID");
}

function packIdentity(
  vendor: string,
  name: string,
  version: string,
  versionModifier: VersionModifier
): PackageIdentity {
  return Object.freeze({
    vendor,
    name,
    version,
    extension: "",
    location: "",
    isPackId: true,
    versionModifier,
  });
}

/**
 * Drop credentials, query and fragment from a pack URL
 */
function stripUrlNoise(reference: string, subject: string): string {
  let url: URL;
  try {
    url = new URL(subject);
  } catch (err) {
    throw new BadIdentifierError(reference, "malformed URL", { cause: err });
  }
  url.username = "";
  url.password = "";
  url.search = "";
  url.hash = "";
  return url.toString();
}

function splitReference(subject: string): { directory: string; baseName: string } {
  const cut = Math.max(subject.lastIndexOf("/"), subject.lastIndexOf("\\"));
  if (cut === -1) {
    return { directory: "", baseName: subject };
  }
  return { directory: subject.slice(0, cut + 1), baseName: subject.slice(cut + 1) };
}

/**
 * Directory-form location: URLs keep their scheme and host, local paths
 * become `file://localhost/<abs>/` with forward slashes
 */
function normalizeLocation(directory: string, cwd: string): string {
  if (isRemoteLocation(directory)) {
    return directory;
  }

  if (directory.toLowerCase().startsWith("file://")) {
    return directory.replace(/\\/g, "/");
  }

  const absolute = isAbsolute(directory) ? resolve(directory) : resolve(cwd, directory);
  const forward = absolute.replace(/\\/g, "/");
  const trimmed = forward.replace(/^\/+/, "").replace(/\/+$/, "");
  return trimmed === "" ? "file://localhost/" : `file://localhost/${trimmed}/`;
}

/**
 * Filesystem path of a `file://localhost/…` location (or a plain path)
 */
export function locationToPath(location: string): string {
  const match = /^file:\/\/(?:localhost)?\/(.*)$/i.exec(location);
  if (!match) {
    return location;
  }
  const rest = match[1] ?? "";
  // Windows drive letters arrive as `C:/…`
  return /^[A-Za-z]:\//.test(rest) ? rest : `/${rest}`;
}

/**
 * `Vendor.Name`
 */
export function packId(identity: Pick<PackageIdentity, "vendor" | "name">): string {
  return `${identity.vendor}.${identity.name}`;
}

/**
 * `Vendor.Name.x.y.z.pack` (metadata stripped)
 */
export function packFileName(
  identity: Pick<PackageIdentity, "vendor" | "name" | "version"> & Partial<Pick<PackageIdentity, "extension">>
): string {
  const extension = identity.extension === "zip" ? "zip" : "pack";
  return `${packId(identity)}.${stripMeta(identity.version)}.${extension}`;
}

/**
 * `Vendor.Name.pdsc`
 */
export function pdscFileName(identity: Pick<PackageIdentity, "vendor" | "name">): string {
  return `${packId(identity)}.pdsc`;
}

/**
 * `Vendor.Name.x.y.z.pdsc`, the descriptor copy kept beside cached archives
 */
export function versionedPdscFileName(identity: Pick<PackageIdentity, "vendor" | "name" | "version">): string {
  return `${packId(identity)}.${stripMeta(identity.version)}.pdsc`;
}

/**
 * Pick the version a reference resolves to among known versions
 * @returns the chosen candidate (as given, metadata included) or undefined when none qualifies
 */
export function selectVersion(
  identity: Pick<PackageIdentity, "version" | "versionModifier">,
  candidates: readonly string[]
): string | undefined {
  const sorted = sortVersionsDescending(candidates);
  const requested = identity.version;

  switch (identity.versionModifier) {
    case VersionModifier.Exact:
      return (
        sorted.find((candidate) => candidate === requested) ??
        sorted.find((candidate) => compareVersions(stripMeta(candidate), stripMeta(requested)) === 0)
      );
    case VersionModifier.Latest:
    case VersionModifier.Any:
      return sorted[0];
    case VersionModifier.GreaterOrEqual:
      return sorted.find((candidate) => compareVersions(candidate, requested) >= 0);
    case VersionModifier.CompatibleMajor:
      return sorted.find(
        (candidate) => major(candidate) === major(requested) && compareVersions(candidate, requested) >= 0
      );
    case VersionModifier.CompatiblePatch:
      return sorted.find(
        (candidate) =>
          majorMinor(candidate) === majorMinor(requested) && compareVersions(candidate, requested) >= 0
      );
    case VersionModifier.Range:
      return sorted.find((candidate) => compareRange(candidate, requested) === 0);
  }
}
