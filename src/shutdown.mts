/**
 * Aborts `controller` on SIGTERM or SIGINT.
 * @returns A function that removes the handlers again.
 */
export function abortOnShutdown(controller: AbortController): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    console.error(`Received ${signal}, abandoning any wait for the webroot lock`);
    controller.abort(new Error(`Interrupted by ${signal}`));
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);
  return () => {
    process.removeListener("SIGTERM", onSignal);
    process.removeListener("SIGINT", onSignal);
  };
}
