/**
 * Express Server Entry Point
 *
 * Loads settings, applies the log level and starts listening. Requests are
 * independent: each one awaits its own completion call.
 */

import "~/.server/config/load-env";
import type { Server } from "node:http";
import { createApp } from "~/.server/app";
import { loadSettings } from "~/.server/config/settings";
import { API_NAME } from "~/.server/constants";
import { getLogger, setLogLevel } from "~/.server/log/logger";
import { createShutdown } from "~/.server/shutdown";
import { isGroqConfigured } from "~/.server/vendors/groq";

const log = getLogger({ module: "Server" });

// In-flight requests get this long to finish after a shutdown signal
const SHUTDOWN_TIMEOUT_MS = 10_000;

/**
 * Main entry point
 */
function main(): Server {
  const settings = loadSettings();
  setLogLevel(settings.logging.level);

  if (!isGroqConfigured()) {
    log.warn({}, "GROQ_API_KEY is not set, analysis endpoints will return errors");
  }

  const app = createApp();
  const { host, port } = settings.server;

  const server = app.listen(port, host, () => {
    log.info(
      {
        host,
        port,
        model: settings.groq.model,
        baseUrl: settings.groq.baseUrl,
        errorLogFile: settings.logging.errorFile ?? null,
      },
      `${API_NAME} listening`
    );
  });

  server.on("error", (error) => {
    log.error({ err: error }, "server error");
    process.exit(1);
  });

  // Handle shutdown signals
  const shutdown = createShutdown(server, { timeoutMs: SHUTDOWN_TIMEOUT_MS });
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  process.on("unhandledRejection", (reason) => {
    log.error({ err: reason }, "unhandled rejection");
  });

  return server;
}

try {
  main();
} catch (error) {
  console.error("Failed to start server:", error);
  process.exit(1);
}
