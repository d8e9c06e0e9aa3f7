/**
 * Express application factory
 *
 * Builds the app from the route table without listening, so the server
 * entry and the tests share the same middleware stack.
 */

import compression from "compression";
import express, { type ErrorRequestHandler, type Express, type RequestHandler } from "express";
import morgan from "morgan";
import routes, { type RouteConfig } from "~/routes";
import { getLogger } from "~/.server/log/logger";

const log = getLogger({ module: "App" });

// Request body limit for the JSON parser
const BODY_LIMIT = "1mb";

interface ClientError {
  status: number;
  type: string | null;
  message: string;
}

// http-errors raised by the body parser carry a 4xx status and expose: true
function asClientError(error: unknown): ClientError | null {
  if (
    error instanceof Error &&
    "expose" in error &&
    error.expose === true &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  ) {
    const type = "type" in error && typeof error.type === "string" ? error.type : null;
    return { status: error.status, type, message: error.message };
  }
  return null;
}

function clientErrorMessage({ type, message }: ClientError): string {
  switch (type) {
    case "entity.parse.failed":
      return "Invalid JSON body";
    case "entity.too.large":
      return "Request body too large";
    default:
      return message;
  }
}

function toRequestHandler(handler: RouteConfig["handler"]): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(handler(req, res)).catch(next);
  };
}

const notFound: RequestHandler = (_req, res) => {
  res.status(404).json({ error: "Not found" });
};

const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  const error: unknown = err;

  if (res.headersSent) {
    next(error);
    return;
  }

  const clientError = asClientError(error);
  if (clientError) {
    log.warn({ status: clientError.status, type: clientError.type, path: req.path }, "rejected request body");
    res.status(clientError.status).json({ error: clientErrorMessage(clientError) });
    return;
  }

  log.error({ err: error, method: req.method, path: req.path }, "unhandled request error");
  res.status(500).json({ error: "Internal server error" });
};

export function createApp(routeTable: RouteConfig[] = routes): Express {
  const app = express();

  app.disable("x-powered-by");

  // Trust proxy for correct client IP
  app.set("trust proxy", true);

  // Compression middleware
  app.use(compression());

  // Request logging
  if (process.env.NODE_ENV === "development") {
    app.use(morgan("dev"));
  }

  app.use(express.json({ limit: BODY_LIMIT }));

  for (const { method, path, handler } of routeTable) {
    switch (method) {
      case "get":
        app.get(path, toRequestHandler(handler));
        break;
      case "post":
        app.post(path, toRequestHandler(handler));
        break;
    }
  }

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
