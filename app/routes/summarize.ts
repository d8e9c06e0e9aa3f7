import type { Request, Response } from "express";
import { summarizeText } from "~/.server/nlp/summary";
import { TextInputSchema } from "~/.server/nlp/text-input";
import { getLogger } from "~/.server/log/logger";
import type { ErrorResponse, SummaryResponse } from "~/types/analysis";

const log = getLogger({ module: "ApiSummarize" });

export async function action(req: Request, res: Response<SummaryResponse | ErrorResponse>): Promise<void> {
  const input = TextInputSchema.safeParse(req.body);
  if (!input.success) {
    res.status(400).json({ error: "Invalid request data", details: input.error.issues });
    return;
  }

  try {
    const result = await summarizeText(input.data.text);
    res.json(result);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error({ err: error }, "summarize text failed");
    res.status(500).json({ error: `Error summarizing text: ${message}` });
  }
}
