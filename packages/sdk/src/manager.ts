/**
 * Pack manager: session root owning the web and local indices of one pack root
 *
 * Indices are read once on open and written once per batch, not per pack.
 */

import { join, resolve } from "node:path";
import { ZipExtractor } from "./archive.js";
import { readDescriptor } from "./descriptor.js";
import { exactKey, familyKey, withTrailingSlash } from "./entry.js";
import { CancelledError, FetchFailedError, IndexCorruptError, PackRootNotFoundError } from "./errors.js";
import { HttpFetcher } from "./fetch.js";
import {
  DOWNLOAD_DIR,
  InstallationCoordinator,
  LOCAL_DIR,
  WEB_DIR,
  type InstallResult,
  type RemovalResult,
} from "./installer.js";
import { isRemoteLocation, locationToPath, pdscFileName } from "./identity.js";
import { copyFile, directoryExists, ensureDirectory, fileExists, removeFile, touchFile } from "./io.js";
import { logger } from "./observability/logs.js";
import { PackageIndex } from "./pack-index.js";
import type {
  ArchiveExtractor,
  BatchResult,
  Fetcher,
  IndexEntry,
  IndexScope,
  IntegrityVerifier,
  OperationOptions,
} from "./types.js";
import { compareVersions, stripMeta, type RequirementTuple } from "./version.js";

export const WEB_INDEX_FILE = "index.pidx";
/** Mirror of the public index, refreshed by updateIndex */
export const CATALOG_FILE = "catalog.pidx";
export const LOCAL_INDEX_FILE = "local_repository.pidx";
/** Touched after every save so other tools notice changes */
export const PACK_IDX_FILE = "pack.idx";

export interface PackManagerOptions {
  packRoot: string;
  /** Create the pack root and bookkeeping directories when missing */
  create?: boolean;
  fetcher?: Fetcher;
  extractor?: ArchiveExtractor;
  verifier?: IntegrityVerifier;
  /** Cancels downloads and extractions; observed between chunks and entries */
  signal?: AbortSignal;
  /** Used by the default fetcher */
  fetchImpl?: typeof fetch;
  /** Base for relative pack paths */
  cwd?: string;
  /** Header URL of the web index */
  webIndexUrl?: string;
}

export interface ListedPack {
  scope: IndexScope | "public";
  entry: IndexEntry;
}

export interface ListOptions {
  /** "all" covers both installation indices; "public" lists the catalog */
  scope?: IndexScope | "all" | "public";
}

export interface UpdateIndexOptions {
  /** URL or path of the public index; defaults to `index.pidx` under the catalog's recorded URL */
  url?: string;
  /** Keep a catalog refreshed within the last 24 hours */
  ifStale?: boolean;
  /** Fetch the descriptor of every catalog pack, not only of installed or cached ones */
  allDescriptors?: boolean;
}

export interface UpdateIndexResult {
  refreshed: boolean;
  /** Packs listed by the catalog */
  entries: number;
  /** One result per descriptor fetched into `.Web/` */
  descriptors: BatchResult[];
}

/**
 * An installed version with a newer one in the catalog
 */
export interface PackUpdate {
  scope: IndexScope;
  installed: IndexEntry;
  available: IndexEntry;
}

export interface PackRequirements {
  scope: IndexScope;
  entry: IndexEntry;
  requirements: RequirementTuple[];
}

export interface RemoteIndexStatus {
  stale: boolean;
  timestamp: string | undefined;
}

export class PackManager {
  readonly packRoot: string;
  readonly webIndex: PackageIndex;
  readonly localIndex: PackageIndex;
  readonly catalog: PackageIndex;
  #coordinator: InstallationCoordinator;
  #fetcher: Fetcher;
  #signal: AbortSignal | undefined;
  #dirty = false;

  constructor(options: PackManagerOptions) {
    this.packRoot = resolve(options.packRoot);
    this.#signal = options.signal;

    this.webIndex = new PackageIndex(join(this.packRoot, WEB_DIR, WEB_INDEX_FILE), {
      web: true,
      url: options.webIndexUrl,
    });
    this.localIndex = new PackageIndex(join(this.packRoot, LOCAL_DIR, LOCAL_INDEX_FILE), { web: false });
    this.catalog = new PackageIndex(join(this.packRoot, WEB_DIR, CATALOG_FILE), {
      web: true,
      url: options.webIndexUrl,
    });
    this.#fetcher =
      options.fetcher ??
      new HttpFetcher({ downloadDir: join(this.packRoot, DOWNLOAD_DIR), fetchImpl: options.fetchImpl });

    this.#coordinator = new InstallationCoordinator({
      packRoot: this.packRoot,
      webIndex: this.webIndex,
      localIndex: this.localIndex,
      catalogIndex: this.catalog,
      fetcher: this.#fetcher,
      extractor: options.extractor ?? new ZipExtractor(),
      verifier: options.verifier,
      cwd: options.cwd,
    });
  }

  /**
   * Create bookkeeping directories and load both indices
   */
  async init(): Promise<void> {
    for (const dir of [DOWNLOAD_DIR, LOCAL_DIR, WEB_DIR]) {
      await ensureDirectory(join(this.packRoot, dir));
    }
    await this.webIndex.read();
    await this.localIndex.read();
    // The catalog only exists once updateIndex has run
    if (await fileExists(this.catalog.fileName)) {
      await this.catalog.read();
    }
    logger.debug("manager.init", { details: { packRoot: this.packRoot } });
  }

  async install(reference: string): Promise<InstallResult> {
    const result = await this.#coordinator.install(reference, this.#operationOptions());
    this.#dirty = true;
    return result;
  }

  async uninstall(reference: string): Promise<RemovalResult> {
    const result = await this.#coordinator.uninstall(reference);
    this.#dirty = true;
    return result;
  }

  /**
   * Install every reference, then save once
   *
   * Per-reference failures are reported and the batch continues; a
   * cancellation stops the remaining references; a corrupt index aborts.
   */
  async installAll(references: readonly string[]): Promise<BatchResult[]> {
    return this.#batch(references, async (reference) => (await this.install(reference)).entry);
  }

  async uninstallAll(references: readonly string[]): Promise<BatchResult[]> {
    return this.#batch(references, async (reference) => {
      await this.uninstall(reference);
      return undefined;
    });
  }

  /**
   * Register a development descriptor in the local index
   */
  async addPdsc(reference: string): Promise<InstallResult> {
    const result = await this.#coordinator.addDescriptor(reference);
    this.#dirty = true;
    return result;
  }

  async removePdsc(reference: string): Promise<RemovalResult> {
    const result = await this.#coordinator.removeDescriptor(reference);
    this.#dirty = true;
    return result;
  }

  async list(options: ListOptions = {}): Promise<ListedPack[]> {
    const scope = options.scope ?? "all";
    if (scope === "public") {
      return (await this.catalog.listPdscTags()).map((entry) => ({ scope: "public" as const, entry }));
    }

    const listed: ListedPack[] = [];
    if (scope !== "local") {
      listed.push(...(await this.webIndex.listPdscTags()).map((entry) => ({ scope: "web" as const, entry })));
    }
    if (scope !== "web") {
      listed.push(...(await this.localIndex.listPdscTags()).map((entry) => ({ scope: "local" as const, entry })));
    }
    return listed;
  }

  /**
   * Installed packs whose family has a newer version in the catalog
   */
  async listUpdates(): Promise<PackUpdate[]> {
    const latest = new Map<string, IndexEntry>();
    for (const entry of await this.catalog.listPdscTags()) {
      const current = latest.get(familyKey(entry));
      if (!current || compareVersions(entry.version, current.version) > 0) {
        latest.set(familyKey(entry), entry);
      }
    }

    const updates: PackUpdate[] = [];
    for (const [scope, index] of this.#installationIndices()) {
      const newest = new Map<string, IndexEntry>();
      for (const entry of await index.listPdscTags()) {
        const current = newest.get(familyKey(entry));
        if (!current || compareVersions(entry.version, current.version) > 0) {
          newest.set(familyKey(entry), entry);
        }
      }
      for (const [family, installed] of newest) {
        const available = latest.get(family);
        if (available && compareVersions(available.version, installed.version) > 0) {
          updates.push({ scope, installed, available });
        }
      }
    }
    return updates;
  }

  /**
   * Requirement tuples declared by the descriptor of every recorded pack
   *
   * The descriptor is looked up in the extracted pack directory, then for
   * local entries in the directory the entry points at; entries with neither
   * are skipped with a warning.
   */
  async requirements(): Promise<PackRequirements[]> {
    const found: PackRequirements[] = [];
    for (const [scope, index] of this.#installationIndices()) {
      for (const entry of await index.listPdscTags()) {
        const candidates = [join(this.packRoot, entry.vendor, entry.name, stripMeta(entry.version), pdscFileName(entry))];
        if (!isRemoteLocation(entry.url) && entry.url !== "") {
          candidates.push(join(locationToPath(entry.url), pdscFileName(entry)));
        }

        let path: string | undefined;
        for (const candidate of candidates) {
          if (await fileExists(candidate)) {
            path = candidate;
            break;
          }
        }
        if (path === undefined) {
          logger.warn("requirements.missing", { pack: exactKey(entry), message: "descriptor not found" });
          continue;
        }

        const descriptor = await readDescriptor(path);
        found.push({ scope, entry, requirements: descriptor.dependencies() });
      }
    }
    return found;
  }

  /**
   * Refresh the catalog from the public index and pull pack descriptors into `.Web/`
   *
   * Descriptors are fetched for catalog packs recorded in the web index or
   * already cached in `.Web/`, or for every catalog pack with
   * `allDescriptors`. A failing descriptor is reported in the result and
   * does not stop the others.
   * @throws FetchFailedError when the index itself cannot be fetched
   */
  async updateIndex(options: UpdateIndexOptions = {}): Promise<UpdateIndexResult> {
    if (options.ifStale && !(await this.catalog.isStale())) {
      const entries = (await this.catalog.listPdscTags()).length;
      logger.debug("catalog.current", { index: this.catalog.fileName, details: { entries } });
      return { refreshed: false, entries, descriptors: [] };
    }

    const source = options.url ?? this.#defaultIndexSource();
    logger.info("catalog.update", { index: this.catalog.fileName, details: { source } });

    const fetched = await this.#fetcher.fetch(source, { signal: this.#signal, refresh: true });
    await copyFile(fetched, this.catalog.fileName);
    if (isRemoteLocation(source)) {
      await removeFile(fetched);
    }
    await this.catalog.read();
    // The stamp records when the mirror was refreshed, not when the index was published
    await this.catalog.write();

    const descriptors = await this.#refreshDescriptors(options.allDescriptors ?? false);
    await touchFile(join(this.packRoot, PACK_IDX_FILE));

    const entries = (await this.catalog.listPdscTags()).length;
    logger.info("catalog.updated", { index: this.catalog.fileName, details: { entries } });
    return { refreshed: true, entries, descriptors };
  }

  /**
   * Freshness of the web index file on disk
   */
  async checkRemoteIndex(): Promise<RemoteIndexStatus> {
    const stale = await this.webIndex.isStale();
    return { stale, timestamp: this.webIndex.timestamp };
  }

  /**
   * Write both indices and touch pack.idx
   */
  async save(): Promise<void> {
    await this.webIndex.write();
    await this.localIndex.write();
    await touchFile(join(this.packRoot, PACK_IDX_FILE));
    this.#dirty = false;
    logger.debug("manager.save", { details: { packRoot: this.packRoot } });
  }

  /**
   * Save pending changes
   */
  async close(): Promise<void> {
    if (this.#dirty) {
      await this.save();
    }
  }

  async #batch(
    references: readonly string[],
    run: (reference: string) => Promise<IndexEntry | undefined>
  ): Promise<BatchResult[]> {
    const results: BatchResult[] = [];
    try {
      for (const reference of references) {
        try {
          const entry = await run(reference);
          results.push(entry ? { reference, ok: true, entry } : { reference, ok: true });
        } catch (err) {
          if (err instanceof IndexCorruptError) {
            throw err;
          }
          const error = err instanceof Error ? err : new Error(String(err));
          results.push({ reference, ok: false, error });
          logger.debug("batch.failed", { message: error.message, details: { reference } });
          if (err instanceof CancelledError) {
            break;
          }
        }
      }
    } finally {
      if (this.#dirty) {
        await this.save();
      }
    }
    return results;
  }

  #installationIndices(): Array<[IndexScope, PackageIndex]> {
    return [
      ["web", this.webIndex],
      ["local", this.localIndex],
    ];
  }

  #defaultIndexSource(): string {
    const base = this.catalog.url || this.webIndex.url;
    if (base === "") {
      throw new FetchFailedError(WEB_INDEX_FILE, "no public index URL is known; pass one");
    }
    return `${withTrailingSlash(base)}${WEB_INDEX_FILE}`;
  }

  async #refreshDescriptors(all: boolean): Promise<BatchResult[]> {
    const webDir = join(this.packRoot, WEB_DIR);
    const installed = new Set((await this.webIndex.listPdscTags()).map((entry) => familyKey(entry)));

    const seen = new Set<string>();
    const results: BatchResult[] = [];
    for (const entry of await this.catalog.listPdscTags()) {
      const family = familyKey(entry);
      const target = join(webDir, pdscFileName(entry));
      if (seen.has(family) || (!all && !installed.has(family) && !(await fileExists(target)))) {
        continue;
      }
      seen.add(family);

      const source = `${withTrailingSlash(entry.url)}${pdscFileName(entry)}`;
      try {
        const fetched = await this.#fetcher.fetch(source, { signal: this.#signal, refresh: true, directory: webDir });
        if (fetched !== target) {
          await copyFile(fetched, target);
        }
        results.push({ reference: source, ok: true, entry });
      } catch (err) {
        if (err instanceof CancelledError) {
          throw err;
        }
        const error = err instanceof Error ? err : new Error(String(err));
        logger.warn("catalog.descriptor.failed", { pack: exactKey(entry), message: error.message });
        results.push({ reference: source, ok: false, error });
      }
    }
    return results;
  }

  #operationOptions(): OperationOptions {
    return { signal: this.#signal };
  }
}

/**
 * Open a pack root and load its indices
 * @throws PackRootNotFoundError when the root is missing and `create` is not set
 */
export async function openPackManager(options: PackManagerOptions): Promise<PackManager> {
  const root = resolve(options.packRoot);
  if (!options.create && !(await directoryExists(root))) {
    throw new PackRootNotFoundError(root);
  }

  const manager = new PackManager(options);
  await manager.init();
  return manager;
}
