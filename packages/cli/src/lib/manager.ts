/**
 * Pack manager adapter for CLI
 * Opens a PackManager for one command and saves it afterwards
 */

import { ChecksumVerifier, openPackManager, type PackManager } from "@packdepot/sdk";

export interface CliManagerOptions {
  packRoot: string;
  /** Create the pack root when missing (init) */
  create?: boolean;
  /** Verify `.sha256.checksum` files before extracting */
  checksum?: boolean;
  signal?: AbortSignal;
  fetchImpl?: typeof fetch;
  cwd: string;
}

/**
 * Run `fn` against an open manager, then save pending changes
 */
export async function withManager<T>(
  options: CliManagerOptions,
  fn: (manager: PackManager) => Promise<T>
): Promise<T> {
  const manager = await openPackManager({
    packRoot: options.packRoot,
    create: options.create,
    verifier: options.checksum ? new ChecksumVerifier() : undefined,
    signal: options.signal,
    fetchImpl: options.fetchImpl,
    cwd: options.cwd,
  });

  try {
    return await fn(manager);
  } finally {
    await manager.close();
  }
}
