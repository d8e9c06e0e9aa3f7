import type { Request, Response } from "express";
import { API_NAME } from "~/.server/constants";

/** API info and the list of analysis endpoints */
export function loader(_req: Request, res: Response): void {
  res.json({
    message: `${API_NAME} is running!`,
    endpoints: {
      mood_analysis: "/analyze_mood",
      crisis_detection: "/detect_crisis",
      text_summarization: "/summarize",
    },
    status: "healthy",
  });
}
