/**
 * Mutex-guarded, disk-backed pack index
 *
 * Invariants:
 * - An exact key (`Vendor.Name.Version`) maps to a non-empty list of entries that differ only by URL
 * - Every exact key belongs to exactly one family (lowercase `vendor.name`)
 * - Every family names a canonical exact key present in its member set
 * - The backing maps never leave this class; callers receive copies
 * - Every public operation runs under the instance mutex
 * - A malformed file is reported, never rewritten
 */

import { basename, extname } from "node:path";
import { EntryExistsError, EntryNotFoundError, IndexCorruptError, StaleIndexError } from "./errors.js";
import { cloneEntry, exactKey, familyKey } from "./entry.js";
import { decodePidx, encodePidx, PIDX_SCHEMA_VERSION } from "./format/pidx.js";
import { atomicWrite, fileExists, readTextFile } from "./io.js";
import { Mutex } from "./mutex.js";
import { logger } from "./observability/logs.js";
import type { EntryQuery, IndexEntry } from "./types.js";
import { compareVersions, stripMeta } from "./version.js";

/**
 * Returned by hasPdsc when no entry matches
 */
export const PDSC_INDEX_NOT_FOUND = -1;

/**
 * Age after which an index timestamp is considered stale
 */
export const INDEX_FRESHNESS_MS = 24 * 60 * 60 * 1000;

export interface PackageIndexOptions {
  /** True for the remote catalog, false for the local development index */
  web: boolean;
  /** Base URL recorded in the document header */
  url?: string;
}

/**
 * Read-only view of one family, for diagnostics
 */
export interface FamilySnapshot {
  family: string;
  canonical: string;
  members: string[];
}

interface Family {
  canonical: string;
  members: Set<string>;
}

export class PackageIndex {
  readonly fileName: string;
  readonly web: boolean;

  #schemaVersion = PIDX_SCHEMA_VERSION;
  #vendor: string;
  #url: string;
  #timestamp: string | undefined;

  #entries = new Map<string, IndexEntry[]>();
  #families = new Map<string, Family>();
  #mutex = new Mutex();

  constructor(fileName: string, options: PackageIndexOptions) {
    this.fileName = fileName;
    this.web = options.web;
    this.#url = options.url ?? "";
    this.#vendor = basename(fileName, extname(fileName));
  }

  get schemaVersion(): string {
    return this.#schemaVersion;
  }

  get vendor(): string {
    return this.#vendor;
  }

  get url(): string {
    return this.#url;
  }

  /**
   * ISO-8601 time of the last successful write, if any
   */
  get timestamp(): string | undefined {
    return this.#timestamp;
  }

  /**
   * Load the index from disk, replacing the in-memory state.
   * A missing file yields an empty index that is written immediately.
   * @throws IndexCorruptError when the file is not a well-formed index
   */
  async read(): Promise<void> {
    await this.#mutex.withLock(async () => {
      if (!(await fileExists(this.fileName))) {
        logger.info("index.create", { index: this.fileName });
        this.#schemaVersion = PIDX_SCHEMA_VERSION;
        this.#vendor = basename(this.fileName, extname(this.fileName));
        this.#timestamp = undefined;
        this.#entries.clear();
        this.#families.clear();
        await this.#writeUnlocked();
        return;
      }

      const text = await readTextFile(this.fileName);
      const decoded = decodePidx(text);
      if (!decoded.ok) {
        throw new IndexCorruptError(this.fileName, decoded.reason);
      }

      const document = decoded.value;
      this.#schemaVersion = document.schemaVersion;
      this.#vendor = document.vendor;
      if (document.url !== "") {
        this.#url = document.url;
      }
      this.#timestamp = document.timestamp;
      this.#entries.clear();
      this.#families.clear();

      for (const entry of document.entries) {
        const key = exactKey(entry);
        const existing = this.#entries.get(key);
        if (existing?.some((candidate) => candidate.url === entry.url)) {
          logger.warn("index.duplicate", { index: this.fileName, pack: key, message: "duplicate entry ignored" });
          continue;
        }
        this.#insert(entry);
      }

      logger.debug("index.read", {
        index: this.fileName,
        details: { entries: document.entries.length, timestamp: document.timestamp },
      });
    });
  }

  /**
   * Flatten the maps into the on-disk list, stamp the time and write atomically
   */
  async write(): Promise<void> {
    await this.#mutex.withLock(() => this.#writeUnlocked());
  }

  async #writeUnlocked(): Promise<void> {
    const timestamp = new Date().toISOString();
    const entries: IndexEntry[] = [];
    for (const sequence of this.#entries.values()) {
      entries.push(...sequence);
    }

    await atomicWrite(
      this.fileName,
      encodePidx({
        schemaVersion: this.#schemaVersion,
        vendor: this.#vendor,
        url: this.#url,
        timestamp,
        entries,
      })
    );
    this.#timestamp = timestamp;
    logger.debug("index.write", { index: this.fileName, details: { entries: entries.length } });
  }

  /**
   * Freshness check against the file on disk; in-memory state is untouched
   * @throws StaleIndexError when the file is missing, has no timestamp, or is older than 24 hours
   */
  async checkTime(now: Date = new Date()): Promise<void> {
    await this.#mutex.withLock(async () => {
      if (!(await fileExists(this.fileName))) {
        throw new StaleIndexError(this.fileName, undefined);
      }

      const decoded = decodePidx(await readTextFile(this.fileName));
      if (!decoded.ok) {
        throw new IndexCorruptError(this.fileName, decoded.reason);
      }

      const { timestamp } = decoded.value;
      if (timestamp === undefined) {
        throw new StaleIndexError(this.fileName, undefined);
      }

      const written = Date.parse(timestamp);
      if (Number.isNaN(written) || now.getTime() - written > INDEX_FRESHNESS_MS) {
        throw new StaleIndexError(this.fileName, timestamp);
      }
    });
  }

  /**
   * checkTime as a boolean; other failures still throw
   */
  async isStale(now?: Date): Promise<boolean> {
    try {
      await this.checkTime(now);
      return false;
    } catch (err) {
      if (err instanceof StaleIndexError) {
        return true;
      }
      throw err;
    }
  }

  /**
   * Register a new entry
   * @throws EntryExistsError when the exact key is already present, whatever its URL
   */
  async addPdsc(entry: IndexEntry): Promise<void> {
    await this.#mutex.withLock(() => {
      const key = exactKey(entry);
      if (this.#entries.has(key)) {
        throw new EntryExistsError(key, this.fileName);
      }
      this.#insert(entry);
      logger.debug("index.add", { index: this.fileName, pack: key, details: { url: entry.url } });
    });
  }

  /**
   * Move the family's canonical entry to the version and URL of `entry`
   * @throws EntryNotFoundError when the family is unknown
   */
  async replacePdscVersion(entry: IndexEntry): Promise<void> {
    await this.#mutex.withLock(() => {
      const family = this.#families.get(familyKey(entry));
      const current = family ? this.#entries.get(family.canonical)?.[0] : undefined;
      if (!family || !current) {
        throw new EntryNotFoundError(familyKey(entry), this.fileName);
      }

      const oldKey = family.canonical;
      this.#detach(oldKey, current);

      const moved: IndexEntry = { ...current, version: entry.version, url: entry.url };
      const newKey = exactKey(moved);
      const sequence = (this.#entries.get(newKey) ?? []).filter((candidate) => candidate.url !== moved.url);
      sequence.push(cloneEntry(moved));
      this.#entries.set(newKey, sequence);

      // #detach may have dropped the family with its last member
      const target = this.#families.get(familyKey(moved)) ?? { canonical: newKey, members: new Set<string>() };
      target.members.add(newKey);
      target.canonical = newKey;
      this.#families.set(familyKey(moved), target);

      logger.debug("index.replace", { index: this.fileName, pack: newKey, details: { from: oldKey } });
    });
  }

  /**
   * Remove one version, or every version of the family when no version is given
   * @returns the removed entries
   * @throws EntryNotFoundError when nothing matches
   */
  async removePdsc(query: EntryQuery): Promise<IndexEntry[]> {
    return this.#mutex.withLock(() => {
      const removed = query.version ? this.#removeVersion(query, query.version) : this.#removeFamily(query);
      logger.debug("index.remove", {
        index: this.fileName,
        pack: familyKey(query),
        details: { removed: removed.map((entry) => exactKey(entry)) },
      });
      return removed;
    });
  }

  #removeVersion(query: EntryQuery, version: string): IndexEntry[] {
    const key = exactKey({ vendor: query.vendor, name: query.name, version });
    const index = this.#indexOf(key, query.url);
    const sequence = this.#entries.get(key);
    if (index === PDSC_INDEX_NOT_FOUND || !sequence) {
      throw new EntryNotFoundError(key, this.fileName);
    }

    const victims = query.url ? sequence.filter((entry) => entry.url === query.url) : [...sequence];
    for (const victim of victims) {
      this.#detach(key, victim);
    }
    return victims;
  }

  #removeFamily(query: EntryQuery): IndexEntry[] {
    const fkey = familyKey(query);
    const family = this.#families.get(fkey);
    if (!family) {
      throw new EntryNotFoundError(fkey, this.fileName);
    }

    const removed: IndexEntry[] = [];
    for (const member of family.members) {
      removed.push(...(this.#entries.get(member) ?? []));
      this.#entries.delete(member);
    }
    this.#families.delete(fkey);
    return removed;
  }

  /**
   * Position of the exact entry within its key's sequence, URL-checked when the query has one
   * @returns PDSC_INDEX_NOT_FOUND when absent
   */
  async hasPdsc(query: EntryQuery): Promise<number> {
    return this.#mutex.withLock(() => {
      if (!query.version) {
        return PDSC_INDEX_NOT_FOUND;
      }
      return this.#indexOf(exactKey({ vendor: query.vendor, name: query.name, version: query.version }), query.url);
    });
  }

  #indexOf(key: string, url: string | undefined): number {
    const sequence = this.#entries.get(key);
    if (!sequence || sequence.length === 0) {
      return PDSC_INDEX_NOT_FOUND;
    }
    if (!url) {
      return 0;
    }
    return sequence.findIndex((entry) => entry.url === url);
  }

  /**
   * Entries for one version (build metadata tolerated), or every version of the family
   */
  async findPdscTags(query: EntryQuery): Promise<IndexEntry[]> {
    return this.#mutex.withLock(() => {
      const family = this.#families.get(familyKey(query));
      if (!family) {
        return [];
      }

      const { version } = query;
      if (!version) {
        return [...family.members].flatMap((member) => (this.#entries.get(member) ?? []).map(cloneEntry));
      }

      const exact = this.#entries.get(exactKey({ vendor: query.vendor, name: query.name, version }));
      if (exact) {
        return exact.map(cloneEntry);
      }

      const wanted = stripMeta(version);
      return [...family.members]
        .flatMap((member) => this.#entries.get(member) ?? [])
        .filter((entry) => compareVersions(stripMeta(entry.version), wanted) === 0)
        .map(cloneEntry);
    });
  }

  /**
   * Every entry in insertion order
   */
  async listPdscTags(): Promise<IndexEntry[]> {
    return this.#mutex.withLock(() => [...this.#entries.values()].flat().map(cloneEntry));
  }

  async empty(): Promise<boolean> {
    return this.#mutex.withLock(() => this.#entries.size === 0);
  }

  /**
   * Copies of the family bookkeeping
   */
  async describeFamilies(): Promise<FamilySnapshot[]> {
    return this.#mutex.withLock(() =>
      [...this.#families].map(([family, { canonical, members }]) => ({
        family,
        canonical,
        members: [...members],
      }))
    );
  }

  #insert(entry: IndexEntry): void {
    const key = exactKey(entry);
    const sequence = this.#entries.get(key) ?? [];
    sequence.push(cloneEntry(entry));
    this.#entries.set(key, sequence);

    const fkey = familyKey(entry);
    const family = this.#families.get(fkey) ?? { canonical: key, members: new Set<string>() };
    family.members.add(key);
    family.canonical = key;
    this.#families.set(fkey, family);
  }

  /**
   * Drop one entry and collect emptied keys and families
   */
  #detach(key: string, entry: IndexEntry): void {
    const sequence = this.#entries.get(key);
    if (!sequence) return;

    const remaining = sequence.filter((candidate) => candidate !== entry && candidate.url !== entry.url);
    if (remaining.length > 0) {
      this.#entries.set(key, remaining);
      return;
    }

    this.#entries.delete(key);
    const fkey = familyKey(entry);
    const family = this.#families.get(fkey);
    if (!family) return;

    family.members.delete(key);
    if (family.members.size === 0) {
      this.#families.delete(fkey);
      return;
    }
    if (family.canonical === key) {
      // Fall back to the most recently added surviving version
      family.canonical = [...family.members].at(-1) ?? key;
    }
  }
}
