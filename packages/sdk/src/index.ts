/**
 * packdepot SDK - pack index and installation management
 */

export {
  openPackManager,
  PackManager,
  WEB_INDEX_FILE,
  LOCAL_INDEX_FILE,
  PACK_IDX_FILE,
  CATALOG_FILE,
} from "./manager.js";
export type {
  PackManagerOptions,
  ListedPack,
  ListOptions,
  RemoteIndexStatus,
  UpdateIndexOptions,
  UpdateIndexResult,
  PackUpdate,
  PackRequirements,
} from "./manager.js";

export { InstallationCoordinator, DOWNLOAD_DIR, LOCAL_DIR, WEB_DIR } from "./installer.js";
export type { CoordinatorOptions, InstallResult, RemovalResult } from "./installer.js";

export { PackageIndex, PDSC_INDEX_NOT_FOUND, INDEX_FRESHNESS_MS } from "./pack-index.js";
export type { PackageIndexOptions, FamilySnapshot } from "./pack-index.js";

export {
  parsePackageIdentity,
  selectVersion,
  isRemoteLocation,
  locationToPath,
  packId,
  packFileName,
  pdscFileName,
  versionedPdscFileName,
} from "./identity.js";
export type { ParseOptions } from "./identity.js";

export { exactKey, familyKey, packUrl, yamlPackId } from "./entry.js";

export {
  compareVersions,
  compareRange,
  major,
  majorMinor,
  hasMeta,
  stripMeta,
  isValidVersion,
  formatVersionRange,
  formatRequirement,
  UNBOUNDED,
} from "./version.js";
export type { RequirementTuple } from "./version.js";

export { PackDescriptor, parseDescriptor, readDescriptor } from "./descriptor.js";
export type { Release, Requirement } from "./descriptor.js";

export { decodePidx, encodePidx, PIDX_SCHEMA_VERSION } from "./format/pidx.js";
export type { PidxDocument } from "./format/pidx.js";

export { HttpFetcher, MAX_DOWNLOAD_BYTES } from "./fetch.js";
export type { HttpFetcherOptions } from "./fetch.js";
export { ZipExtractor, MAX_ENTRY_BYTES } from "./archive.js";
export type { ZipExtractorOptions } from "./archive.js";
export { ChecksumVerifier, parseChecksumFile, computeEntryDigests } from "./integrity.js";

export { Mutex } from "./mutex.js";
export { logger } from "./observability/logs.js";
export type { LogEntry, LogLevel, LogSink } from "./observability/logs.js";

export { VersionModifier } from "./types.js";
export type {
  IndexEntry,
  EntryQuery,
  PackageIdentity,
  PackExtension,
  IndexScope,
  OperationOptions,
  FetchOptions,
  Fetcher,
  ArchiveExtractor,
  ExtractOptions,
  IntegrityVerifier,
  BatchResult,
} from "./types.js";

export {
  PackDepotError,
  BadIdentifierError,
  EntryExistsError,
  PackAlreadyInstalledError,
  EntryNotFoundError,
  StaleIndexError,
  IndexCorruptError,
  DescriptorError,
  FetchFailedError,
  IntegrityFailedError,
  ExtractionFailedError,
  CancelledError,
  PackRootNotFoundError,
  FileReadError,
  FileWriteError,
  DirectoryError,
} from "./errors.js";
