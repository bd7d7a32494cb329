#!/usr/bin/env node

/**
 * packdepot CLI entry point
 */

import { runCli } from "./cli.js";
import { processStreams } from "./lib/io.js";
import { abortOnTermination } from "./lib/signals.js";

const controller = new AbortController();
const dispose = abortOnTermination(controller);

try {
  process.exitCode = await runCli(process.argv.slice(2), {
    ...processStreams,
    env: process.env,
    cwd: process.cwd(),
    signal: controller.signal,
  });
} finally {
  dispose();
}
