/**
 * Pulls the JSON object out of a completion reply.
 *
 * Replies are requested in JSON mode and are normally a bare object such as
 * {"emotion": "sad", "confidence": 0.8}. Models that ignore JSON mode or
 * reason out loud add wrapping, which is removed before parsing:
 * - a leading <think>...</think> block (reasoning models on Groq)
 * - a ```json fence around the object
 * - a sentence before or after the object
 */

const THINK_BLOCK = /^\s*<think>[\s\S]*?<\/think>/i;
const FENCED_BLOCK = /```(?:json)?\s*\n?([\s\S]*?)\n?```/;
const OUTER_OBJECT = /\{[\s\S]*\}/;
const OUTER_ARRAY = /\[[\s\S]*\]/;

function stripReasoning(content: string): string {
  return content.replace(THINK_BLOCK, '').trim();
}

export function parseJsonFromLlmResponse(content: string): unknown {
  const reply = stripReasoning(content);

  const candidates: Array<() => string | undefined> = [
    () => reply,
    () => reply.match(FENCED_BLOCK)?.[1]?.trim(),
    () => reply.match(OUTER_OBJECT)?.[0],
    () => reply.match(OUTER_ARRAY)?.[0],
  ];

  for (const candidate of candidates) {
    const text = candidate();
    if (!text) continue;
    try {
      return JSON.parse(text);
    } catch {
      // try the next extraction
    }
  }

  throw new Error('Unable to parse JSON from LLM response');
}
