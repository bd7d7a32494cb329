/**
 * Install/remove state machine
 *
 * An install commits to the index only after fetch, validation, integrity
 * check and extraction all succeeded. A failure or cancellation before that
 * point leaves the index untouched; extracted files are not rolled back.
 */

import { basename, join } from "node:path";
import { parseDescriptor, readDescriptor, type PackDescriptor } from "./descriptor.js";
import { exactKey, familyKey, packUrl } from "./entry.js";
import {
  CancelledError,
  DescriptorError,
  EntryExistsError,
  EntryNotFoundError,
  ExtractionFailedError,
  FetchFailedError,
  PackAlreadyInstalledError,
} from "./errors.js";
import {
  isRemoteLocation,
  locationToPath,
  packFileName,
  parsePackageIdentity,
  pdscFileName,
  selectVersion,
  versionedPdscFileName,
} from "./identity.js";
import { copyFile, fileExists } from "./io.js";
import { logger } from "./observability/logs.js";
import type { PackageIndex } from "./pack-index.js";
import {
  VersionModifier,
  type ArchiveExtractor,
  type Fetcher,
  type IndexEntry,
  type IndexScope,
  type IntegrityVerifier,
  type OperationOptions,
  type PackageIdentity,
} from "./types.js";
import { compareVersions, stripMeta, type RequirementTuple } from "./version.js";

export const DOWNLOAD_DIR = ".Download";
export const LOCAL_DIR = ".Local";
export const WEB_DIR = ".Web";

export interface CoordinatorOptions {
  packRoot: string;
  webIndex: PackageIndex;
  localIndex: PackageIndex;
  /** Public index mirror consulted when resolving pack IDs */
  catalogIndex?: PackageIndex;
  fetcher: Fetcher;
  extractor: ArchiveExtractor;
  verifier?: IntegrityVerifier;
  /** Base for relative references (defaults to process.cwd()) */
  cwd?: string;
}

export interface InstallResult {
  reference: string;
  entry: IndexEntry;
  scope: IndexScope;
  /** Directory the pack was extracted into ("" for descriptor-only registrations) */
  path: string;
  files: number;
  dependencies: RequirementTuple[];
}

export interface RemovalResult {
  reference: string;
  scope: IndexScope;
  removed: IndexEntry[];
}

export class InstallationCoordinator {
  readonly packRoot: string;
  #web: PackageIndex;
  #local: PackageIndex;
  #catalog: PackageIndex | undefined;
  #fetcher: Fetcher;
  #extractor: ArchiveExtractor;
  #verifier: IntegrityVerifier | undefined;
  #cwd: string;

  constructor(options: CoordinatorOptions) {
    this.packRoot = options.packRoot;
    this.#web = options.webIndex;
    this.#local = options.localIndex;
    this.#catalog = options.catalogIndex;
    this.#fetcher = options.fetcher;
    this.#extractor = options.extractor;
    this.#verifier = options.verifier;
    this.#cwd = options.cwd ?? process.cwd();
  }

  get downloadDir(): string {
    return join(this.packRoot, DOWNLOAD_DIR);
  }

  get localDir(): string {
    return join(this.packRoot, LOCAL_DIR);
  }

  get webDir(): string {
    return join(this.packRoot, WEB_DIR);
  }

  /**
   * Install a pack from a file path, URL or pack ID
   * @throws PackAlreadyInstalledError before any download when the version is already recorded
   */
  async install(reference: string, options: OperationOptions = {}): Promise<InstallResult> {
    const parsed = parsePackageIdentity(reference, { cwd: this.#cwd });

    if (parsed.extension === "pdsc") {
      return this.addDescriptor(reference);
    }

    const identity = parsed.isPackId ? await this.#resolvePackId(parsed) : parsed;
    const remote = isRemoteLocation(identity.location);
    const scope: IndexScope = remote ? "web" : "local";
    const index = this.#indexFor(scope);
    const key = exactKey(identity);

    const recorded = await index.findPdscTags(identity);
    if (recorded.length > 0) {
      throw new PackAlreadyInstalledError(key, index.fileName);
    }

    logger.info("install.start", { pack: key, details: { reference, scope } });

    const fileName = `${identity.vendor}.${identity.name}.${identity.version}.${identity.extension}`;
    const source = remote ? `${identity.location}${fileName}` : join(locationToPath(identity.location), fileName);
    const archivePath = await this.#fetcher.fetch(source, options);

    const { descriptor, stripPrefix } = await this.#validateArchive(archivePath, identity);

    if (this.#verifier) {
      const proof = this.#verifier.proofPath(archivePath);
      if (remote) {
        await this.#fetcher.fetch(`${identity.location}${basename(proof)}`, options);
      }
      await this.#verifier.verify(archivePath, proof);
    }

    const destination = join(this.packRoot, identity.vendor, identity.name, stripMeta(identity.version));
    const files = await this.#extractor.extract(archivePath, destination, {
      ...options,
      stripPrefix,
    });

    if (options.signal?.aborted) {
      throw new CancelledError("Installation");
    }

    // Commit: bookkeeping copies first, index entry last
    await copyFile(join(destination, pdscFileName(identity)), join(this.downloadDir, versionedPdscFileName(identity)));
    if (!remote) {
      await copyFile(join(destination, pdscFileName(identity)), join(this.localDir, pdscFileName(identity)));
      const cached = join(this.downloadDir, packFileName(identity));
      if (archivePath !== cached) {
        await copyFile(archivePath, cached);
      }
    }

    const entry: IndexEntry = {
      vendor: identity.vendor,
      name: identity.name,
      version: identity.version,
      url: identity.location,
    };
    await index.addPdsc(entry);

    logger.info("install.done", { pack: key, details: { path: destination, files: files.length } });
    return {
      reference,
      entry,
      scope,
      path: destination,
      files: files.length,
      dependencies: descriptor.dependencies(),
    };
  }

  /**
   * Remove index records for a pack; extracted files stay on disk
   * @throws EntryNotFoundError when no record matches
   */
  async uninstall(reference: string): Promise<RemovalResult> {
    const identity = parsePackageIdentity(reference, { cwd: this.#cwd });

    if (identity.extension === "pdsc") {
      return this.removeDescriptor(reference);
    }

    const scope = await this.#scopeForRemoval(identity);
    const index = this.#indexFor(scope);

    const query = { vendor: identity.vendor, name: identity.name };
    const version = await this.#recordedVersion(index, identity);
    const removed = await index.removePdsc(version === "" ? query : { ...query, version });

    logger.info("uninstall.done", {
      pack: `${identity.vendor}.${identity.name}`,
      details: { scope, removed: removed.map((entry) => entry.version) },
    });
    return { reference, scope, removed };
  }

  /**
   * Register a development descriptor in the local index without extracting anything
   *
   * A registration from the same directory moves to the descriptor's latest
   * release; checkouts in other directories are added beside it. The same
   * version registered twice fails.
   */
  async addDescriptor(reference: string): Promise<InstallResult> {
    const identity = parsePackageIdentity(reference, { cwd: this.#cwd });
    if (identity.extension !== "pdsc" || isRemoteLocation(identity.location)) {
      throw new DescriptorError(reference, "expected a local Vendor.Pack.pdsc file");
    }

    const descriptorPath = join(locationToPath(identity.location), pdscFileName(identity));
    if (!(await fileExists(descriptorPath))) {
      throw new FetchFailedError(descriptorPath, "file not found");
    }

    const descriptor = await readDescriptor(descriptorPath);
    this.#checkDescriptorNames(descriptor, identity, descriptorPath);
    if (descriptor.latestVersion() === "") {
      throw new DescriptorError(descriptorPath, "no releases");
    }

    const entry = descriptor.toEntry(identity.location);
    const key = exactKey(entry);
    const family = await this.#local.findPdscTags({ vendor: entry.vendor, name: entry.name });

    if (family.some((candidate) => compareVersions(stripMeta(candidate.version), stripMeta(entry.version)) === 0)) {
      throw new EntryExistsError(key, this.#local.fileName);
    }

    // Other checkouts of the same pack stay registered; only this directory's entry moves
    const previous = family.find((candidate) => candidate.url === entry.url);
    if (previous === undefined) {
      await this.#local.addPdsc(entry);
    } else if (await this.#isCanonical(this.#local, previous)) {
      await this.#local.replacePdscVersion(entry);
    } else {
      await this.#local.removePdsc(previous);
      await this.#local.addPdsc(entry);
    }

    logger.info("pdsc.added", { pack: key, details: { url: entry.url, replaced: previous?.version } });
    return {
      reference,
      entry,
      scope: "local",
      path: "",
      files: 0,
      dependencies: descriptor.dependencies(),
    };
  }

  /**
   * Remove local index records for a descriptor path or pack ID
   */
  async removeDescriptor(reference: string): Promise<RemovalResult> {
    const identity = parsePackageIdentity(reference, { cwd: this.#cwd });
    const query = { vendor: identity.vendor, name: identity.name };

    let removed: IndexEntry[];
    if (identity.extension === "pdsc") {
      const matching = (await this.#local.findPdscTags(query)).filter((entry) => entry.url === identity.location);
      if (matching.length === 0) {
        throw new EntryNotFoundError(`${identity.location}${pdscFileName(identity)}`, this.#local.fileName);
      }
      removed = [];
      for (const entry of matching) {
        removed.push(...(await this.#local.removePdsc(entry)));
      }
    } else {
      const version = await this.#recordedVersion(this.#local, identity);
      removed = await this.#local.removePdsc(version === "" ? query : { ...query, version });
    }

    logger.info("pdsc.removed", { pack: `${identity.vendor}.${identity.name}`, details: { count: removed.length } });
    return { reference, scope: "local", removed };
  }

  async #isCanonical(index: PackageIndex, entry: IndexEntry): Promise<boolean> {
    const families = await index.describeFamilies();
    return families.some((family) => family.family === familyKey(entry) && family.canonical === exactKey(entry));
  }

  #indexFor(scope: IndexScope): PackageIndex {
    return scope === "web" ? this.#web : this.#local;
  }

  /**
   * Turn a pack ID into a concrete remote archive identity using the web
   * index, the public catalog and, when cached, the pack's descriptor in `.Web/`
   */
  async #resolvePackId(identity: PackageIdentity): Promise<PackageIdentity> {
    const id = `${identity.vendor}.${identity.name}`;
    const query = { vendor: identity.vendor, name: identity.name };
    const known = [
      ...(await this.#web.findPdscTags(query)),
      ...((await this.#catalog?.findPdscTags(query)) ?? []),
    ];

    let descriptor: PackDescriptor | undefined;
    const descriptorPath = join(this.webDir, pdscFileName(identity));
    if (await fileExists(descriptorPath)) {
      descriptor = await readDescriptor(descriptorPath);
    }

    const baseUrl = descriptor?.url || known.find((entry) => entry.url !== "")?.url || "";
    if (baseUrl === "") {
      throw new EntryNotFoundError(id, this.#web.fileName);
    }

    const candidates = [...new Set([...known.map((entry) => entry.version), ...(descriptor?.allReleases() ?? [])])];
    let version = selectVersion(identity, candidates);
    if (version === undefined && identity.versionModifier === VersionModifier.Exact) {
      version = identity.version;
    }
    if (version === undefined) {
      throw new EntryNotFoundError(`${id} (${identity.version || "any version"})`, this.#web.fileName);
    }

    const url = packUrl({ vendor: identity.vendor, name: identity.name, version, url: baseUrl });
    logger.debug("install.resolved", { pack: id, details: { requested: identity.version, version, url } });
    return parsePackageIdentity(url);
  }

  async #validateArchive(
    archivePath: string,
    identity: PackageIdentity
  ): Promise<{ descriptor: PackDescriptor; stripPrefix: string }> {
    const wanted = pdscFileName(identity);
    const names = await this.#extractor.list(archivePath);
    const entryName = names.find((name) => {
      const segments = name.split("/");
      return segments.length <= 2 && segments.at(-1) === wanted;
    });
    if (entryName === undefined) {
      throw new ExtractionFailedError(archivePath, `"${wanted}" not found at the top of the archive`);
    }

    const text = await this.#extractor.readEntry(archivePath, entryName);
    if (text === undefined) {
      throw new ExtractionFailedError(archivePath, `cannot read "${entryName}"`);
    }

    let descriptor: PackDescriptor;
    try {
      descriptor = parseDescriptor(text, entryName);
    } catch (err) {
      if (err instanceof DescriptorError) {
        throw new ExtractionFailedError(archivePath, err.message, { cause: err });
      }
      throw err;
    }

    try {
      this.#checkDescriptorNames(descriptor, identity, entryName);
    } catch (err) {
      throw new ExtractionFailedError(archivePath, err instanceof Error ? err.message : String(err), {
        cause: err,
      });
    }

    const latest = descriptor.latestVersion();
    if (compareVersions(stripMeta(latest), stripMeta(identity.version)) !== 0) {
      throw new ExtractionFailedError(
        archivePath,
        `descriptor's latest release "${latest}" does not match version "${identity.version}"`
      );
    }

    const slash = entryName.lastIndexOf("/");
    return { descriptor, stripPrefix: slash === -1 ? "" : entryName.slice(0, slash) };
  }

  #checkDescriptorNames(descriptor: PackDescriptor, identity: PackageIdentity, source: string): void {
    if (descriptor.vendor !== identity.vendor || descriptor.name !== identity.name) {
      throw new DescriptorError(
        source,
        `declares ${descriptor.vendor}.${descriptor.name}, expected ${identity.vendor}.${identity.name}`
      );
    }
  }

  async #scopeForRemoval(identity: PackageIdentity): Promise<IndexScope> {
    if (!identity.isPackId) {
      return isRemoteLocation(identity.location) ? "web" : "local";
    }
    const inWeb = await this.#web.findPdscTags({ vendor: identity.vendor, name: identity.name });
    return inWeb.length > 0 ? "web" : "local";
  }

  /**
   * Stored version a removal targets, or "" for every version
   */
  async #recordedVersion(index: PackageIndex, identity: PackageIdentity): Promise<string> {
    if (identity.versionModifier === VersionModifier.Any || identity.version === "") {
      return "";
    }

    const family = await index.findPdscTags({ vendor: identity.vendor, name: identity.name });
    const version = selectVersion(identity, family.map((entry) => entry.version));
    if (version === undefined) {
      throw new EntryNotFoundError(exactKey(identity), index.fileName);
    }
    return version;
  }
}
