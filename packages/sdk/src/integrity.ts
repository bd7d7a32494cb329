/**
 * Per-entry checksum verification of pack archives
 *
 * A checksum file `Vendor.Pack.x.y.z.sha256.checksum` holds one
 * `<hex digest> <entry name>` line per file in the archive.
 */

import { createHash } from "node:crypto";
import * as fs from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { unzipSync } from "fflate";
import { IntegrityFailedError } from "./errors.js";
import { fileExists, readTextFile } from "./io.js";
import { logger } from "./observability/logs.js";
import type { IntegrityVerifier } from "./types.js";

export const CHECKSUM_ALGORITHM = "sha256";

/**
 * Parse checksum lines into an entry → digest map
 * @throws IntegrityFailedError on a malformed line
 */
export function parseChecksumFile(text: string, source: string): Map<string, string> {
  const digests = new Map<string, string>();
  for (const [lineNo, raw] of text.split(/\r?\n/).entries()) {
    const line = raw.trim();
    if (line === "") continue;

    const space = line.indexOf(" ");
    const digest = space === -1 ? "" : line.slice(0, space);
    const entry = space === -1 ? "" : line.slice(space + 1).trim();
    if (!/^[0-9a-fA-F]+$/.test(digest) || entry === "") {
      throw new IntegrityFailedError(source, `malformed checksum line ${lineNo + 1}`);
    }
    digests.set(entry, digest.toLowerCase());
  }
  return digests;
}

/**
 * Digest of every file entry in a zip archive
 */
export function computeEntryDigests(archive: Uint8Array): Map<string, string> {
  const files = unzipSync(archive, { filter: (file) => !file.name.endsWith("/") });
  const digests = new Map<string, string>();
  for (const [name, bytes] of Object.entries(files)) {
    digests.set(name, createHash(CHECKSUM_ALGORITHM).update(bytes).digest("hex"));
  }
  return digests;
}

export class ChecksumVerifier implements IntegrityVerifier {
  proofPath(archivePath: string): string {
    const stem = basename(archivePath, extname(archivePath));
    return join(dirname(archivePath), `${stem}.${CHECKSUM_ALGORITHM}.checksum`);
  }

  async verify(archivePath: string, proofPath: string): Promise<void> {
    if (!(await fileExists(proofPath))) {
      throw new IntegrityFailedError(archivePath, `checksum file ${proofPath} not found`);
    }

    const expected = parseChecksumFile(await readTextFile(proofPath), proofPath);

    let actual: Map<string, string>;
    try {
      actual = computeEntryDigests(new Uint8Array(await fs.readFile(archivePath)));
    } catch (err) {
      throw new IntegrityFailedError(archivePath, "cannot read archive entries", { cause: err });
    }

    if (expected.size !== actual.size) {
      throw new IntegrityFailedError(
        archivePath,
        `checksum file lists ${expected.size} file(s), archive contains ${actual.size}`
      );
    }

    const mismatched: string[] = [];
    for (const [entry, digest] of expected) {
      const computed = actual.get(entry);
      if (computed === undefined) {
        throw new IntegrityFailedError(archivePath, `"${entry}" is listed but not in the archive`);
      }
      if (computed !== digest) {
        mismatched.push(entry);
      }
    }

    if (mismatched.length > 0) {
      throw new IntegrityFailedError(archivePath, `checksum mismatch for ${mismatched.join(", ")}`);
    }

    logger.info("integrity.verified", { pack: basename(archivePath), details: { files: actual.size } });
  }
}
