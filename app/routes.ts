import type { Request, Response } from "express";
import * as index from "./routes/_index";
import * as health from "./routes/health";
import * as analyzeMood from "./routes/analyze_mood";
import * as detectCrisis from "./routes/detect_crisis";
import * as summarize from "./routes/summarize";

export type RouteHandler = (req: Request, res: Response) => void | Promise<void>;

export interface RouteConfig {
  method: "get" | "post";
  path: string;
  handler: RouteHandler;
}

function route(method: RouteConfig["method"], path: string, handler: RouteHandler): RouteConfig {
  return { method, path, handler };
}

export default [
  // Info
  route("get", "/", index.loader),
  route("get", "/health", health.loader),

  // Analysis
  route("post", "/analyze_mood", analyzeMood.action),
  route("post", "/detect_crisis", detectCrisis.action),
  route("post", "/summarize", summarize.action),
] satisfies RouteConfig[];
