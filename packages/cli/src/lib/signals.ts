/**
 * Termination signals mapped onto an AbortController
 */

const SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Abort `controller` on the first SIGINT or SIGTERM.
 * A second signal exits immediately with 130.
 * @returns a function removing the handlers
 */
export function abortOnTermination(controller: AbortController): () => void {
  const handler = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    process.stderr.write(`\nReceived ${signal}, stopping after the current step...\n`);
    controller.abort();
  };

  for (const signal of SIGNALS) {
    process.on(signal, handler);
  }
  return () => {
    for (const signal of SIGNALS) {
      process.off(signal, handler);
    }
  };
}
