/**
 * Error types for pack index and installation operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Index and filesystem errors include the absolute target path in the message
 */

/**
 * Base class for all packdepot errors
 */
export abstract class PackDepotError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a package reference is neither a pack file name nor a pack ID
 */
export class BadIdentifierError extends PackDepotError {
  readonly code = "E_BAD_IDENTIFIER";

  constructor(
    public readonly reference: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Bad pack reference "${reference}": ${reason}`, options);
  }
}

/**
 * Thrown when an index already holds an entry with the same vendor.name.version
 */
export class EntryExistsError extends PackDepotError {
  readonly code: string = "E_ENTRY_EXISTS";

  constructor(
    public readonly key: string,
    fileName: string,
    options?: ErrorOptions
  ) {
    super(`"${key}" is already registered in ${fileName}`, options);
  }
}

/**
 * Thrown by the installer when the requested pack version is already installed
 */
export class PackAlreadyInstalledError extends EntryExistsError {
  override readonly code = "E_ALREADY_INSTALLED";

  constructor(key: string, fileName: string, options?: ErrorOptions) {
    super(key, fileName, options);
    this.message = `Pack "${key}" is already installed (recorded in ${fileName})`;
  }
}

/**
 * Thrown when an index has no entry for the requested pack
 */
export class EntryNotFoundError extends PackDepotError {
  readonly code = "E_ENTRY_NOT_FOUND";

  constructor(
    public readonly key: string,
    fileName: string,
    options?: ErrorOptions
  ) {
    super(`"${key}" not found in ${fileName}`, options);
  }
}

/**
 * Thrown when an index timestamp is missing or older than the freshness window
 */
export class StaleIndexError extends PackDepotError {
  readonly code = "E_STALE_INDEX";

  constructor(
    fileName: string,
    public readonly timestamp: string | undefined,
    options?: ErrorOptions
  ) {
    super(
      timestamp
        ? `Index ${fileName} is stale (last written ${timestamp})`
        : `Index ${fileName} has no timestamp`,
      options
    );
  }
}

/**
 * Thrown when an index file on disk is not a well-formed pack index
 */
export class IndexCorruptError extends PackDepotError {
  readonly code = "E_INDEX_CORRUPT";

  constructor(fileName: string, reason: string, options?: ErrorOptions) {
    super(`Index ${fileName} is corrupt: ${reason}`, options);
  }
}

/**
 * Thrown when a descriptor (.pdsc) file cannot be parsed
 */
export class DescriptorError extends PackDepotError {
  readonly code = "E_DESCRIPTOR";

  constructor(source: string, reason: string, options?: ErrorOptions) {
    super(`Invalid pack descriptor ${source}: ${reason}`, options);
  }
}

/**
 * Thrown when a pack cannot be downloaded or a local pack file is missing
 */
export class FetchFailedError extends PackDepotError {
  readonly code = "E_FETCH_FAILED";

  constructor(source: string, reason: string, options?: ErrorOptions) {
    super(`Failed to fetch ${source}: ${reason}`, options);
  }
}

/**
 * Thrown when a pack's checksum or signature does not verify
 */
export class IntegrityFailedError extends PackDepotError {
  readonly code = "E_INTEGRITY";

  constructor(archivePath: string, reason: string, options?: ErrorOptions) {
    super(`Integrity check failed for ${archivePath}: ${reason}`, options);
  }
}

/**
 * Thrown when a pack archive is structurally invalid or unsafe to extract
 */
export class ExtractionFailedError extends PackDepotError {
  readonly code = "E_EXTRACTION";

  constructor(archivePath: string, reason: string, options?: ErrorOptions) {
    super(`Failed to extract ${archivePath}: ${reason}`, options);
  }
}

/**
 * Thrown when the user requested termination during a download or extraction
 */
export class CancelledError extends PackDepotError {
  readonly code = "E_CANCELLED";

  constructor(operation: string, options?: ErrorOptions) {
    super(`${operation} terminated by user`, options);
  }
}

/**
 * Thrown when the pack root does not exist and creating it was not requested
 */
export class PackRootNotFoundError extends PackDepotError {
  readonly code = "E_PACK_ROOT";

  constructor(
    public readonly packRoot: string,
    options?: ErrorOptions
  ) {
    super(`Pack root ${packRoot} does not exist; run "init" first`, options);
  }
}

/**
 * Thrown when a file read operation fails
 */
export class FileReadError extends PackDepotError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read file: ${filePath}`, options);
  }
}

/**
 * Thrown when a file write operation fails
 */
export class FileWriteError extends PackDepotError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write file: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends PackDepotError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Narrow an unknown thrown value to a Node.js system error
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}
