import { z } from 'zod';
import { callGroqCompletion } from '~/.server/vendors/groq';
import { getLogger } from '~/.server/log/logger';
import { parseStructuredReply } from '~/.server/nlp/structured-reply';
import { CRISIS_SEVERITIES, type CrisisSeverity } from '~/types/crisis-severity';
import type { CrisisResponse } from '~/types/analysis';

const log = getLogger({ module: 'CrisisDetector' });

export const CRISIS_SYSTEM_PROMPT =
  'You are a professional crisis detection API. Always respond with valid JSON. Err on the side of caution for safety.';

export const CrisisReplySchema = z.object({
  crisis_detected: z.boolean(),
  severity: z.string().trim().toLowerCase().pipe(z.enum(CRISIS_SEVERITIES)),
  confidence: z.number().min(0).max(1),
});

const CRISIS_INDICATORS = [
  'Suicidal thoughts or plans',
  'Self-harm mentions',
  'Feeling hopeless or trapped',
  'Wanting to die or disappear',
  'Feeling like a burden',
  'Severe depression or despair',
  'Substance abuse with harmful intent',
];

const SEVERITY_DESCRIPTIONS: Record<CrisisSeverity, string> = {
  none: 'No crisis indicators',
  low: 'Mild distress, general sadness',
  moderate: 'Concerning language, needs attention',
  high: 'Clear crisis indicators, immediate attention needed',
};

export function buildCrisisPrompt(text: string): string {
  return [
    'You are a mental health crisis detection system. Analyze the text for signs of mental health crisis, self-harm, or suicidal ideation.',
    '',
    `Text to analyze: "${text}"`,
    '',
    'Crisis indicators include:',
    ...CRISIS_INDICATORS.map((indicator) => `- ${indicator}`),
    '',
    'Severity levels:',
    ...CRISIS_SEVERITIES.map((severity) => `- "${severity}": ${SEVERITY_DESCRIPTIONS[severity]}`),
    '',
    'Examples:',
    '- "I\'m having a bad day" → crisis_detected: false, severity: "low"',
    '- "I don\'t want to be here anymore" → crisis_detected: true, severity: "high"',
    '- "I\'m feeling overwhelmed lately" → crisis_detected: false, severity: "moderate"',
    '',
    'Respond with JSON format:',
    '{',
    '  "crisis_detected": true/false,',
    '  "severity": "severity_level",',
    '  "confidence": 0.0',
    '}',
  ].join('\n');
}

export async function detectCrisis(text: string): Promise<CrisisResponse> {
  log.debug({ textLength: text.length }, 'detecting crisis');

  const res = await callGroqCompletion({
    systemPrompt: CRISIS_SYSTEM_PROMPT,
    prompt: buildCrisisPrompt(text),
    temperature: 0.1,
    maxTokens: 150,
    json: true,
  });

  const result = parseStructuredReply(res.content, CrisisReplySchema, log);
  if (result.crisis_detected) {
    log.warn({ severity: result.severity, confidence: result.confidence }, 'crisis indicators detected');
  }
  return result;
}
