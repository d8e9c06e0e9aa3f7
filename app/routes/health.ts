import type { Request, Response } from "express";
import { API_NAME } from "~/.server/constants";

export function loader(_req: Request, res: Response): void {
  res.json({ status: "healthy", api: API_NAME });
}
