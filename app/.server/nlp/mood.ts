import { z } from 'zod';
import { callGroqCompletion } from '~/.server/vendors/groq';
import { getLogger } from '~/.server/log/logger';
import { parseStructuredReply } from '~/.server/nlp/structured-reply';
import { EMOTIONS } from '~/types/emotion';
import type { MoodResponse } from '~/types/analysis';

const log = getLogger({ module: 'MoodAnalyzer' });

export const MOOD_SYSTEM_PROMPT =
  'You are a professional emotion analysis API. Always respond with valid JSON.';

export const MoodReplySchema = z.object({
  emotion: z.string().trim().toLowerCase().pipe(z.enum(EMOTIONS)),
  confidence: z.number().min(0).max(1),
});

export function buildMoodPrompt(text: string): string {
  return [
    'You are an expert emotion analyst. Analyze the emotional tone of the given text and respond with valid JSON.',
    '',
    `Text to analyze: "${text}"`,
    '',
    'Classify the emotion into one of these categories:',
    ...EMOTIONS.map((emotion) => `- ${emotion}`),
    '',
    'Consider context, tone, and emotional intensity. Provide a confidence score (0.0-1.0).',
    '',
    'Examples:',
    '- "I\'m thrilled about my promotion!" → happy (confidence: 0.9)',
    '- "This weather is okay I guess" → neutral (confidence: 0.7)',
    '- "I\'m devastated by this news" → sad (confidence: 0.95)',
    '',
    'Respond with JSON format:',
    '{',
    '  "emotion": "emotion_name",',
    '  "confidence": 0.0',
    '}',
  ].join('\n');
}

export async function analyzeMood(text: string): Promise<MoodResponse> {
  log.debug({ textLength: text.length }, 'analyzing mood');

  const res = await callGroqCompletion({
    systemPrompt: MOOD_SYSTEM_PROMPT,
    prompt: buildMoodPrompt(text),
    temperature: 0.2,
    maxTokens: 100,
    json: true,
  });

  return parseStructuredReply(res.content, MoodReplySchema, log);
}
