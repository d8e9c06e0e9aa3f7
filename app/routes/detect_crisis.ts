import type { Request, Response } from "express";
import { detectCrisis } from "~/.server/nlp/crisis";
import { TextInputSchema } from "~/.server/nlp/text-input";
import { getLogger } from "~/.server/log/logger";
import type { ErrorResponse, CrisisResponse } from "~/types/analysis";

const log = getLogger({ module: "ApiDetectCrisis" });

export async function action(req: Request, res: Response<CrisisResponse | ErrorResponse>): Promise<void> {
  const input = TextInputSchema.safeParse(req.body);
  if (!input.success) {
    res.status(400).json({ error: "Invalid request data", details: input.error.issues });
    return;
  }

  try {
    const result = await detectCrisis(input.data.text);
    res.json(result);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error({ err: error }, "detect crisis failed");
    res.status(500).json({ error: `Error detecting crisis: ${message}` });
  }
}
