/**
 * Atomic file I/O operations for crash-safe index writes
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Removes are idempotent
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { FileReadError, FileWriteError, DirectoryError, isErrnoException } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync, fall back to full sync where unsupported
    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      if (
        isErrnoException(err) &&
        (err.code === "ENOTSUP" || err.code === "ENOSYS" || err.code === "EINVAL")
      ) {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    // Close the file handle before rename
    await fileHandle.close();
    fileHandle = null;

    // Atomic rename (last-writer-wins for concurrent writes)
    try {
      await fs.rename(tmp, filePath);
    } catch (err) {
      // On Windows, rename may fail transiently when antivirus or indexing grabs the file
      if (
        isErrnoException(err) &&
        (err.code === "EPERM" || err.code === "EACCES" || err.code === "EBUSY") &&
        process.platform === "win32"
      ) {
        await new Promise((resolve) => setTimeout(resolve, 10));
        await fs.rename(tmp, filePath);
      } else {
        throw err;
      }
    }

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close.failed", { message: String(closeErr), details: { tmp } });
      });
    }

    // tmp may not exist if open() itself failed
    await fs.rm(tmp, { force: true });

    throw new FileWriteError(filePath, { cause: err });
  }
}

/**
 * Best-effort fsync of a directory after a rename
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Common error codes: EINVAL (invalid operation), ENOTSUP (not supported)
    const code = isErrnoException(err) ? err.code : undefined;
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      logger.debug("io.dirsync.failed", { message: String(err), details: { dir } });
    }
  }
}

/**
 * Read a UTF-8 text file
 * @throws FileReadError wrapping the underlying errno error (ENOENT included)
 */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new FileReadError(filePath, { cause: err });
  }
}

/**
 * Check whether filePath is an existing regular file
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (err) {
    if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
      return false;
    }
    throw err;
  }
}

/**
 * Check whether dirPath is an existing directory
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    return stats.isDirectory();
  } catch (err) {
    if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
      return false;
    }
    throw err;
  }
}

/**
 * Copy a file, creating the destination directory if needed
 */
export async function copyFile(source: string, destination: string): Promise<void> {
  logger.debug("io.copy", { details: { source, destination } });
  await ensureDirectory(dirname(destination));
  try {
    await fs.copyFile(source, destination);
  } catch (err) {
    throw new FileWriteError(destination, { cause: err });
  }
}

/**
 * Remove a file (idempotent - no error if file doesn't exist)
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return;
    }
    throw new FileWriteError(filePath, { cause: err });
  }
}

/**
 * Create the file if missing and bump its modification time
 */
export async function touchFile(filePath: string): Promise<void> {
  const now = new Date();
  try {
    await fs.utimes(filePath, now, now);
  } catch (err) {
    if (!isErrnoException(err) || err.code !== "ENOENT") {
      throw new FileWriteError(filePath, { cause: err });
    }
    await atomicWrite(filePath, "");
  }
}
