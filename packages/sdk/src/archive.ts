/**
 * Zip archive extraction for pack files
 *
 * Invariants:
 * - No entry is written outside the destination directory
 * - Absolute entry names and `..` segments are rejected before anything is written
 * - Each entry's declared and actual size are capped
 * - The abort signal is checked between entries
 */

import * as fs from "node:fs/promises";
import { dirname, isAbsolute, resolve, sep } from "node:path";
import { strFromU8, unzipSync, type Unzipped } from "fflate";
import { CancelledError, ExtractionFailedError } from "./errors.js";
import { ensureDirectory } from "./io.js";
import { logger } from "./observability/logs.js";
import type { ArchiveExtractor, ExtractOptions } from "./types.js";

/**
 * Default per-entry size cap (4 GiB)
 */
export const MAX_ENTRY_BYTES = 4 * 1024 * 1024 * 1024;

export interface ZipExtractorOptions {
  maxEntryBytes?: number;
}

/**
 * Normalize an entry name to forward slashes
 */
function entryPath(name: string): string {
  return name.replace(/\\/g, "/");
}

function isUnsafeEntry(name: string): boolean {
  const normalized = entryPath(name);
  if (normalized.startsWith("/") || isAbsolute(normalized) || /^[A-Za-z]:/.test(normalized)) {
    return true;
  }
  return normalized.split("/").includes("..");
}

export class ZipExtractor implements ArchiveExtractor {
  #maxEntryBytes: number;

  constructor(options: ZipExtractorOptions = {}) {
    this.#maxEntryBytes = options.maxEntryBytes ?? MAX_ENTRY_BYTES;
  }

  async list(archivePath: string): Promise<string[]> {
    const data = await this.#load(archivePath);
    const names: string[] = [];
    this.#unzip(archivePath, data, (name) => {
      names.push(entryPath(name));
      return false;
    });
    return names;
  }

  async readEntry(archivePath: string, entryName: string): Promise<string | undefined> {
    const data = await this.#load(archivePath);
    const wanted = entryPath(entryName);
    const files = this.#unzip(archivePath, data, (name) => entryPath(name) === wanted);
    const [bytes] = Object.values(files);
    return bytes === undefined ? undefined : strFromU8(bytes);
  }

  async extract(archivePath: string, destDir: string, options: ExtractOptions = {}): Promise<string[]> {
    const { signal, stripPrefix = "" } = options;
    if (signal?.aborted) {
      throw new CancelledError("Extraction");
    }

    const data = await this.#load(archivePath);
    const root = resolve(destDir);
    const prefix = stripPrefix === "" ? "" : `${entryPath(stripPrefix).replace(/\/+$/, "")}/`;

    const targets = new Map<string, string>();
    const files = this.#unzip(archivePath, data, (name, originalSize) => {
      if (isUnsafeEntry(name)) {
        throw new ExtractionFailedError(archivePath, `entry "${name}" escapes the destination`);
      }
      if (originalSize > this.#maxEntryBytes) {
        throw new ExtractionFailedError(archivePath, `entry "${name}" exceeds ${this.#maxEntryBytes} bytes`);
      }

      const normalized = entryPath(name);
      const relative = prefix !== "" && normalized.startsWith(prefix) ? normalized.slice(prefix.length) : normalized;
      if (relative === "" || relative.endsWith("/")) {
        return false;
      }

      const target = resolve(root, relative);
      if (!target.startsWith(root + sep)) {
        throw new ExtractionFailedError(archivePath, `entry "${name}" escapes the destination`);
      }
      targets.set(name, target);
      return true;
    });

    await ensureDirectory(root);
    const written: string[] = [];

    for (const [name, bytes] of Object.entries(files)) {
      if (signal?.aborted) {
        logger.warn("extract.cancelled", { details: { archivePath, written: written.length } });
        throw new CancelledError("Extraction");
      }

      const target = targets.get(name);
      if (target === undefined) continue;
      if (bytes.byteLength > this.#maxEntryBytes) {
        throw new ExtractionFailedError(archivePath, `entry "${name}" exceeds ${this.#maxEntryBytes} bytes`);
      }

      await ensureDirectory(dirname(target));
      await fs.writeFile(target, bytes);
      written.push(target);
    }

    logger.debug("extract.done", { details: { archivePath, destDir: root, files: written.length } });
    return written;
  }

  async #load(archivePath: string): Promise<Uint8Array> {
    try {
      return new Uint8Array(await fs.readFile(archivePath));
    } catch (err) {
      throw new ExtractionFailedError(archivePath, "cannot read archive", { cause: err });
    }
  }

  #unzip(
    archivePath: string,
    data: Uint8Array,
    accept: (name: string, originalSize: number) => boolean
  ): Unzipped {
    try {
      return unzipSync(data, { filter: (file) => accept(file.name, file.originalSize) });
    } catch (err) {
      if (err instanceof ExtractionFailedError) {
        throw err;
      }
      throw new ExtractionFailedError(archivePath, "not a valid zip archive", { cause: err });
    }
  }
}

