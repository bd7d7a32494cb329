/**
 * packdepot CLI program
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { Command, CommanderError } from "commander";
import {
  CancelledError,
  isRemoteLocation,
  logger,
  yamlPackId,
  type BatchResult,
  type UpdateIndexResult,
} from "@packdepot/sdk";
import { parseScope, type ScopeOption } from "./lib/arg.js";
import { isVerbose, resolvePackRoot } from "./lib/env.js";
import {
  CliError,
  EXIT_CANCELLED,
  EXIT_FAILURE,
  EXIT_OK,
  EXIT_USAGE,
  formatCliError,
  mapSdkErrorToExitCode,
} from "./lib/errors.js";
import { readReferenceFile, type CliStreams } from "./lib/io.js";
import { withManager, type CliManagerOptions } from "./lib/manager.js";
import {
  colorize,
  renderJson,
  renderLines,
  renderListedPack,
  renderPackUpdate,
  renderRequirements,
} from "./lib/render.js";
import { createTelemetry, type Telemetry } from "./lib/telemetry.js";

export interface CliContext extends CliStreams {
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Aborted on SIGINT/SIGTERM by the binary */
  signal?: AbortSignal;
  /** Injected in tests; the global fetch otherwise */
  fetchImpl?: typeof fetch;
}

interface GlobalOptions {
  packRoot?: string;
  verbose?: boolean;
  quiet?: boolean;
}

interface ListCommandOptions {
  scope: ScopeOption;
  public?: boolean;
  updates?: boolean;
  requirements?: boolean;
  json?: boolean;
}

type FailedResult = Extract<BatchResult, { ok: false }>;

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

/**
 * Build the command tree; output goes through `ctx`
 */
export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .configureOutput({
      writeOut: (str) => ctx.out(str),
      writeErr: (str) => ctx.err(colorize(str, "red", ctx.errIsTTY)),
    })
    .exitOverride();

  program
    .name("packdepot")
    .description("packdepot - install and manage hardware description packs")
    .version(readVersion())
    .option("--pack-root <path>", "Pack root directory (default: CMSIS_PACK_ROOT or the user cache)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  const globals = () => {
    const opts = program.opts<GlobalOptions>();
    return {
      packRoot: resolvePackRoot(opts.packRoot, ctx.env),
      verbose: Boolean(opts.verbose) || isVerbose(ctx.env),
      quiet: Boolean(opts.quiet),
    };
  };

  const telemetry = (): Telemetry => createTelemetry(globals().verbose, ctx.err);

  const say = (text: string): void => {
    if (!globals().quiet) {
      ctx.out(`${text}\n`);
    }
  };

  const managerOptions = (extra: Partial<CliManagerOptions> = {}): CliManagerOptions => ({
    packRoot: globals().packRoot,
    cwd: ctx.cwd,
    signal: ctx.signal,
    fetchImpl: ctx.fetchImpl,
    ...extra,
  });

  /**
   * Print one line per reference and fail when any reference failed
   */
  const reportBatch = (results: BatchResult[], attempted: number, verb: string): void => {
    const failed: FailedResult[] = [];
    for (const result of results) {
      if (result.ok) {
        say(`${verb} ${result.entry ? yamlPackId(result.entry) : result.reference}`);
      } else {
        failed.push(result);
        ctx.err(`${result.reference}: ${result.error.message}\n`);
      }
    }

    if (failed.some((result) => result.error instanceof CancelledError)) {
      const skipped = attempted - results.length;
      throw new CliError(
        skipped > 0 ? `Cancelled; ${skipped} reference(s) not processed` : "Cancelled",
        { exitCode: EXIT_CANCELLED }
      );
    }
    if (failed.length > 0) {
      throw new CliError(`${failed.length} of ${attempted} reference(s) failed`, { exitCode: EXIT_FAILURE });
    }
  };

  /**
   * Summarize a catalog update and fail when a descriptor could not be fetched
   */
  const reportUpdate = (result: UpdateIndexResult): void => {
    if (!result.refreshed) {
      say(`Catalog is current (${result.entries} pack(s))`);
      return;
    }

    const failed: FailedResult[] = [];
    for (const descriptor of result.descriptors) {
      if (!descriptor.ok) {
        failed.push(descriptor);
        ctx.err(`${descriptor.reference}: ${descriptor.error.message}\n`);
      }
    }
    say(`Catalog updated: ${result.entries} pack(s), ${result.descriptors.length - failed.length} descriptor(s)`);
    if (failed.length > 0) {
      throw new CliError(`${failed.length} of ${result.descriptors.length} descriptor(s) failed`, {
        exitCode: EXIT_FAILURE,
      });
    }
  };

  // Local index files are taken relative to the working directory
  const indexSource = (location: string): string =>
    isRemoteLocation(location) ? location : resolve(ctx.cwd, location);

  program.hook("preAction", () => {
    logger.setEnabled(!globals().quiet);
  });

  program
    .command("init")
    .description("Create the pack root and its empty indices, optionally mirroring a public index")
    .argument("[index-url]", "URL or path of the public index.pidx")
    .action(async (indexUrl: string | undefined) => {
      await telemetry().withTiming("cli.init", async () => {
        const { packRoot } = globals();
        const result = await withManager(managerOptions({ create: true }), async (manager) => {
          await manager.save();
          return indexUrl === undefined ? undefined : manager.updateIndex({ url: indexSource(indexUrl) });
        });
        say(`Initialized pack root at ${packRoot}`);
        if (result) {
          reportUpdate(result);
        }
      });
    });

  program
    .command("update-index")
    .description("Refresh the catalog from the public index and update cached descriptors")
    .argument("[index-url]", "URL or path of the public index.pidx (default: the one used last)")
    .option("--if-stale", "Only refresh a catalog older than 24 hours")
    .option("-a, --all-pdsc-files", "Fetch the descriptor of every pack in the catalog")
    .action(async (indexUrl: string | undefined, options: { ifStale?: boolean; allPdscFiles?: boolean }) => {
      await telemetry().withTiming("cli.update-index", async () => {
        const result = await withManager(managerOptions(), (manager) =>
          manager.updateIndex({
            url: indexUrl === undefined ? undefined : indexSource(indexUrl),
            ifStale: options.ifStale,
            allDescriptors: options.allPdscFiles,
          })
        );
        reportUpdate(result);
      });
    });

  program
    .command("install")
    .alias("add")
    .description("Install packs from files, URLs or pack IDs (Vendor::Name@version)")
    .argument("[references...]", "Pack files, URLs, pack IDs or .pdsc files")
    .option("-f, --packs-list <file>", "Read references from a file, one per line")
    .option("--checksum", "Verify the .sha256.checksum file shipped next to each pack")
    .action(async (references: string[], options: { packsList?: string; checksum?: boolean }) => {
      await telemetry().withTiming("cli.install", async () => {
        const listed = options.packsList ? await readReferenceFile(resolve(ctx.cwd, options.packsList)) : [];
        const all = [...references, ...listed];
        if (all.length === 0) {
          throw new CliError("No pack references given; pass references or --packs-list", {
            exitCode: EXIT_USAGE,
          });
        }

        const results = await withManager(managerOptions({ checksum: options.checksum }), (manager) =>
          manager.installAll(all)
        );
        reportBatch(results, all.length, "Installed");
      });
    });

  program
    .command("uninstall")
    .alias("rm")
    .description("Remove packs from the indices; extracted files stay on disk")
    .argument("<references...>", "Pack IDs, pack files or .pdsc files")
    .action(async (references: string[]) => {
      await telemetry().withTiming("cli.uninstall", async () => {
        const results = await withManager(managerOptions(), (manager) => manager.uninstallAll(references));
        reportBatch(results, references.length, "Removed");
      });
    });

  program
    .command("add-pdsc")
    .description("Register a local development descriptor without extracting anything")
    .argument("<descriptor>", "Path to a Vendor.Name.pdsc file")
    .action(async (descriptor: string) => {
      await telemetry().withTiming("cli.add-pdsc", async () => {
        const result = await withManager(managerOptions(), (manager) => manager.addPdsc(descriptor));
        say(`Registered ${yamlPackId(result.entry)} from ${result.entry.url}`);
      });
    });

  program
    .command("rm-pdsc")
    .description("Unregister a local development descriptor")
    .argument("<reference>", "Path to the .pdsc file, or a pack ID")
    .action(async (reference: string) => {
      await telemetry().withTiming("cli.rm-pdsc", async () => {
        const result = await withManager(managerOptions(), (manager) => manager.removePdsc(reference));
        say(`Removed ${result.removed.map((entry) => yamlPackId(entry)).join(", ")}`);
      });
    });

  program
    .command("list")
    .alias("ls")
    .description("List recorded packs")
    .option("--scope <scope>", "web, local or all", parseScope, "all")
    .option("-p, --public", "List the packs of the public catalog instead")
    .option("-u, --updates", "List installed packs with a newer version in the catalog")
    .option("-r, --requirements", "List the packs each recorded pack requires")
    .option("--json", "Output as JSON array")
    .action(async (options: ListCommandOptions) => {
      await telemetry().withTiming("cli.list", async () => {
        const modes = [options.public, options.updates, options.requirements].filter(Boolean).length;
        if (modes > 1) {
          throw new CliError("--public, --updates and --requirements cannot be combined", { exitCode: EXIT_USAGE });
        }

        await withManager(managerOptions(), async (manager) => {
          if (options.updates) {
            const updates = await manager.listUpdates();
            ctx.out(options.json ? renderJson(updates) : renderLines(updates.map(renderPackUpdate)));
          } else if (options.requirements) {
            const found = await manager.requirements();
            ctx.out(options.json ? renderJson(found) : renderLines(found.flatMap(renderRequirements)));
          } else {
            const listed = await manager.list({ scope: options.public ? "public" : options.scope });
            ctx.out(options.json ? renderJson(listed) : renderLines(listed.map(renderListedPack)));
          }
        });
      });
    });

  program
    .command("check-index")
    .description("Check whether the remote index was written within the last 24 hours")
    .action(async () => {
      await telemetry().withTiming("cli.check-index", async () => {
        const status = await withManager(managerOptions(), (manager) => manager.checkRemoteIndex());
        if (status.stale) {
          throw new CliError(
            status.timestamp
              ? `Remote index is stale (last written ${status.timestamp})`
              : "Remote index has no timestamp",
            { exitCode: EXIT_FAILURE }
          );
        }
        say(`Remote index is current (last written ${status.timestamp ?? "now"})`);
      });
    });

  return program;
}

/**
 * Parse `argv` (user arguments only) and run the selected command
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], ctx: CliContext): Promise<number> {
  const program = createProgram(ctx);
  const toStderr = (line: string): void => ctx.err(`${line}\n`);
  logger.setSink({ debug: toStderr, info: toStderr, warn: toStderr, error: toStderr });

  try {
    await program.parseAsync([...argv], { from: "user" });
    return EXIT_OK;
  } catch (err) {
    if (err instanceof CommanderError) {
      // Help and version exit with 0; parse errors were already printed by commander
      return err.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }

    const verbose = Boolean(program.opts<GlobalOptions>().verbose) || isVerbose(ctx.env);
    ctx.err(colorize(`Error: ${formatCliError(err, verbose)}\n`, "red", ctx.errIsTTY));
    return mapSdkErrorToExitCode(err);
  } finally {
    logger.setSink();
    logger.setEnabled(true);
  }
}
