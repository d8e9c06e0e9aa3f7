import type { Server } from "node:http";
import { getLogger } from "~/.server/log/logger";

const log = getLogger({ module: "Shutdown" });

export interface ShutdownOptions {
  /** In-flight requests get this long to finish before the process is forced out */
  timeoutMs: number;
  exit?: (code: number) => void;
}

/**
 * Graceful shutdown handler. Only the first signal starts the drain; later
 * ones are logged and ignored.
 */
export function createShutdown(server: Server, { timeoutMs, exit = (code) => process.exit(code) }: ShutdownOptions) {
  let shuttingDown = false;

  return function shutdown(signal: string): void {
    if (shuttingDown) {
      log.warn({ signal }, "shutdown already in progress");
      return;
    }
    shuttingDown = true;
    log.info({ signal }, "shutdown initiated");

    const timer = setTimeout(() => {
      log.warn({ timeoutMs }, "shutdown timed out, forcing exit");
      exit(1);
    }, timeoutMs);
    timer.unref();

    server.close((error) => {
      clearTimeout(timer);
      if (error) {
        log.error({ err: error }, "error during shutdown");
        exit(1);
        return;
      }
      log.info({}, "shutdown complete");
      exit(0);
    });
  };
}
