import type { z } from 'zod';
import type { PinoLike } from '~/.server/log/logger';
import { parseJsonFromLlmResponse } from '~/.server/utils/parse-json';

/**
 * Parse a completion reply and validate it against the task's schema.
 * Throws with a short reason when the reply is not JSON or a field is missing or invalid.
 */
export function parseStructuredReply<S extends z.ZodTypeAny>(
  content: string,
  schema: S,
  log: PinoLike
): z.output<S> {
  const preview = {
    rawContentPreview: content.substring(0, 500),
    rawContentLength: content.length,
  };

  let payload: unknown;
  try {
    payload = parseJsonFromLlmResponse(content);
  } catch (error) {
    log.error({ ...preview, error: error instanceof Error ? error.message : String(error) }, 'failed to parse JSON from completion');
    throw error;
  }

  const result = schema.safeParse(payload);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const field = issue ? issue.path.join('.') : '';
  log.error({ ...preview, issues: result.error.issues }, 'completion reply failed validation');
  throw new Error(field ? `missing or invalid field "${field}"` : 'reply is not a JSON object');
}
