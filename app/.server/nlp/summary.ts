import { z } from 'zod';
import { callGroqCompletion } from '~/.server/vendors/groq';
import { getLogger } from '~/.server/log/logger';
import { parseStructuredReply } from '~/.server/nlp/structured-reply';
import type { SummaryResponse } from '~/types/analysis';

const log = getLogger({ module: 'TextSummarizer' });

export const SUMMARY_SYSTEM_PROMPT =
  'You are a professional text summarization API. Always respond with valid JSON.';

export const SummaryReplySchema = z.object({
  summary: z.string(),
});

export function buildSummaryPrompt(text: string): string {
  return [
    'You are a professional text summarization system. Create a concise, accurate summary of the given text.',
    '',
    `Text to summarize: "${text}"`,
    '',
    'Guidelines:',
    '- Keep key information and main points',
    '- Maintain the original tone and context',
    '- Make it 20-30% of original length',
    '- Preserve important details',
    '- Use clear, readable language',
    '',
    'Examples:',
    '- Long article about climate change → Brief summary covering main points about causes, effects, and solutions',
    '- Personal story → Condensed version keeping emotional tone and key events',
    '- Technical document → Simplified version with main concepts',
    '',
    'Respond with JSON format:',
    '{',
    '  "summary": "your_concise_summary_here"',
    '}',
  ].join('\n');
}

export async function summarizeText(text: string): Promise<SummaryResponse> {
  log.debug({ textLength: text.length }, 'summarizing text');

  const res = await callGroqCompletion({
    systemPrompt: SUMMARY_SYSTEM_PROMPT,
    prompt: buildSummaryPrompt(text),
    temperature: 0.4,
    maxTokens: 300,
    json: true,
  });

  return parseStructuredReply(res.content, SummaryReplySchema, log);
}
