/**
 * Archive fetcher
 *
 * Remote sources are downloaded into a cache directory under their URL's
 * base name; a cached file is returned without any network I/O unless a
 * refresh is requested. Local sources are only checked for existence.
 *
 * Invariants:
 * - A download is written to `<name>.part` and renamed into place only when complete
 * - The partial file is removed on every failure path, cancellation included
 * - Concurrent requests for the same destination share one download
 * - The file name never leaves the target directory
 */

import * as fs from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { CancelledError, FetchFailedError } from "./errors.js";
import { isRemoteLocation, locationToPath } from "./identity.js";
import { ensureDirectory, fileExists } from "./io.js";
import { logger } from "./observability/logs.js";
import type { FetchOptions, Fetcher } from "./types.js";

/**
 * Upper bound on a single download (20 GiB)
 */
export const MAX_DOWNLOAD_BYTES = 20 * 1024 * 1024 * 1024;

export interface HttpFetcherOptions {
  /** Cache directory for downloaded archives */
  downloadDir: string;
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch;
  maxBytes?: number;
}

export class HttpFetcher implements Fetcher {
  #downloadDir: string;
  #fetchImpl: typeof fetch;
  #maxBytes: number;
  #inflight = new Map<string, Promise<string>>();

  constructor(options: HttpFetcherOptions) {
    this.#downloadDir = options.downloadDir;
    this.#fetchImpl = options.fetchImpl ?? fetch;
    this.#maxBytes = options.maxBytes ?? MAX_DOWNLOAD_BYTES;
  }

  async fetch(source: string, options: FetchOptions = {}): Promise<string> {
    if (!isRemoteLocation(source)) {
      const localPath = resolve(locationToPath(source));
      if (!(await fileExists(localPath))) {
        throw new FetchFailedError(source, "file not found");
      }
      return localPath;
    }

    let url: URL;
    try {
      url = new URL(source);
    } catch (err) {
      throw new FetchFailedError(source, "malformed URL", { cause: err });
    }

    let fileName: string;
    try {
      fileName = decodeURIComponent(basename(url.pathname));
    } catch (err) {
      throw new FetchFailedError(source, "malformed escape in file name", { cause: err });
    }
    if (fileName === "") {
      throw new FetchFailedError(source, "URL does not name a file");
    }
    if (fileName === "." || fileName.includes("..") || /[\\/]/.test(fileName)) {
      throw new FetchFailedError(source, `unsafe file name "${fileName}"`);
    }
    const directory = options.directory ?? this.#downloadDir;
    const destination = join(directory, fileName);

    if (!options.refresh && (await fileExists(destination))) {
      logger.debug("fetch.cached", { pack: fileName, details: { destination } });
      return destination;
    }

    const pending = this.#inflight.get(destination);
    if (pending) {
      return pending;
    }

    const download = this.#download(url, destination, options.signal).finally(() => {
      this.#inflight.delete(destination);
    });
    this.#inflight.set(destination, download);
    return download;
  }

  async #download(url: URL, destination: string, signal: AbortSignal | undefined): Promise<string> {
    const source = url.toString();
    const partial = `${destination}.part`;

    if (signal?.aborted) {
      throw new CancelledError("Download");
    }

    logger.info("fetch.start", { pack: basename(destination), details: { url: source } });
    await ensureDirectory(dirname(destination));

    let handle: fs.FileHandle | undefined;
    try {
      const response = await this.#fetchImpl(source, { signal });
      if (!response.ok) {
        throw new FetchFailedError(source, `HTTP ${response.status} ${response.statusText}`.trim());
      }
      if (!response.body) {
        throw new FetchFailedError(source, "empty response body");
      }

      handle = await fs.open(partial, "w", 0o644);
      const reader = response.body.getReader();
      let total = 0;

      for (;;) {
        if (signal?.aborted) {
          await reader.cancel();
          throw new CancelledError("Download");
        }

        const { done, value } = await reader.read();
        if (done) break;

        total += value.byteLength;
        if (total > this.#maxBytes) {
          await reader.cancel();
          throw new FetchFailedError(source, `download exceeds ${this.#maxBytes} bytes`);
        }
        await handle.write(value);
      }

      await handle.close();
      handle = undefined;
      await fs.rename(partial, destination);

      logger.info("fetch.done", { pack: basename(destination), details: { bytes: total } });
      return destination;
    } catch (err) {
      if (handle) {
        await handle.close().catch((closeErr: unknown) => {
          logger.debug("fetch.close.failed", { message: String(closeErr) });
        });
      }
      await fs.rm(partial, { force: true });

      if (err instanceof CancelledError || err instanceof FetchFailedError) {
        throw err;
      }
      if (signal?.aborted) {
        throw new CancelledError("Download", { cause: err });
      }
      throw new FetchFailedError(source, err instanceof Error ? err.message : String(err), { cause: err });
    }
  }
}
