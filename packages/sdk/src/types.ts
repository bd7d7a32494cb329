/**
 * Core types for packdepot
 */

/**
 * One known or installed (vendor, name, version) triple and where it came from
 */
export interface IndexEntry {
  vendor: string;
  name: string;
  /** Semantic version, possibly with leading zeros or `+meta` */
  version: string;
  /** Source base location (directory form, usually slash-terminated) */
  url: string;
  /** Deprecation marker (commonly a date) */
  deprecated?: string;
  /** Successor pack as `Vendor.Name` */
  replacement?: string;
}

/**
 * Lookup key for index queries; version omitted means "every version"
 */
export type EntryQuery = Pick<IndexEntry, "vendor" | "name"> &
  Partial<Pick<IndexEntry, "version" | "url">>;

/**
 * How the version in a package reference should be resolved
 */
export const VersionModifier = {
  Exact: "exact",
  Latest: "latest",
  Any: "any",
  GreaterOrEqual: "greater-or-equal",
  CompatibleMajor: "compatible-major",
  CompatiblePatch: "compatible-patch",
  Range: "range",
} as const;

export type VersionModifier = (typeof VersionModifier)[keyof typeof VersionModifier];

export type PackExtension = "pack" | "zip" | "pdsc" | "";

/**
 * Normalized result of parsing a package reference
 */
export interface PackageIdentity {
  readonly vendor: string;
  readonly name: string;
  /** Exact version, lower bound, or `min:max` range; "" when unspecified */
  readonly version: string;
  readonly extension: PackExtension;
  /** URL or `file://localhost/<abs>/` directory the artifact lives in; "" for pack IDs */
  readonly location: string;
  /** True when the reference named a pack rather than a concrete file */
  readonly isPackId: boolean;
  readonly versionModifier: VersionModifier;
}

/**
 * Index scope: the remote ("web") catalog or the local development index
 */
export type IndexScope = "web" | "local";

/**
 * Options shared by long-running operations
 */
export interface OperationOptions {
  signal?: AbortSignal;
}

export interface FetchOptions extends OperationOptions {
  /** Download again even when a cached copy exists */
  refresh?: boolean;
  /** Directory a remote download lands in, instead of the fetcher's cache */
  directory?: string;
}

/**
 * Resolves a source reference to a file on local disk
 */
export interface Fetcher {
  /**
   * @param source - URL or local path
   * @returns Absolute path of the local file
   */
  fetch(source: string, options?: FetchOptions): Promise<string>;
}

export interface ExtractOptions extends OperationOptions {
  /** Leading directory removed from every entry name (e.g. a wrapping folder) */
  stripPrefix?: string;
}

/**
 * Unpacks an archive into a directory
 */
export interface ArchiveExtractor {
  /** Entry names in archive order, without extracting anything */
  list(archivePath: string): Promise<string[]>;
  /** Contents of one entry as UTF-8 text, or undefined when absent */
  readEntry(archivePath: string, entryName: string): Promise<string | undefined>;
  /** @returns Absolute paths of every extracted file */
  extract(archivePath: string, destDir: string, options?: ExtractOptions): Promise<string[]>;
}

/**
 * Pass/fail integrity check over a fetched archive
 */
export interface IntegrityVerifier {
  /** Path of the proof material belonging to an archive */
  proofPath(archivePath: string): string;
  /** Resolves when the archive verifies, throws IntegrityFailedError otherwise */
  verify(archivePath: string, proofPath: string): Promise<void>;
}

/**
 * Outcome of one reference in a batch operation
 */
export type BatchResult =
  | { reference: string; ok: true; entry?: IndexEntry }
  | { reference: string; ok: false; error: Error };
