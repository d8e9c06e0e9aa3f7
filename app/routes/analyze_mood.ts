import type { Request, Response } from "express";
import { analyzeMood } from "~/.server/nlp/mood";
import { TextInputSchema } from "~/.server/nlp/text-input";
import { getLogger } from "~/.server/log/logger";
import type { ErrorResponse, MoodResponse } from "~/types/analysis";

const log = getLogger({ module: "ApiAnalyzeMood" });

export async function action(req: Request, res: Response<MoodResponse | ErrorResponse>): Promise<void> {
  const input = TextInputSchema.safeParse(req.body);
  if (!input.success) {
    res.status(400).json({ error: "Invalid request data", details: input.error.issues });
    return;
  }

  try {
    const result = await analyzeMood(input.data.text);
    res.json(result);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error({ err: error }, "analyze mood failed");
    res.status(500).json({ error: `Error analyzing mood: ${message}` });
  }
}
