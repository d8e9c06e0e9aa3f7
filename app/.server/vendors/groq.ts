/**
 * Groq chat completion wrapper
 * Talks to Groq's OpenAI-compatible endpoint through the openai SDK
 */

import OpenAI from 'openai';
import { getSettings } from '~/.server/config/settings';
import { getLogger } from '~/.server/log/logger';

export interface GroqCompletionOptions {
  prompt: string;
  systemPrompt?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  json?: boolean; // ask for a JSON object reply (response_format json_object)
}

export interface GroqCompletionResponse {
  content: string;
  finishReason: string | null;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

const DEFAULT_TEMPERATURE = 0.3;
const DEFAULT_MAX_TOKENS = 150;

const log = getLogger({ module: 'VendorGroq' });

function describeError(error: unknown): { message: string; status: number | null } {
  const err = error instanceof Error ? error : new Error(String(error));
  const status = 'status' in err && typeof err.status === 'number' ? err.status : null;
  return { message: err.message, status };
}

/**
 * Send one chat completion request and return the reply text.
 *
 * A single attempt is made: SDK retries are off and the configured timeout
 * is the only deadline.
 *
 * @example
 * const result = await callGroqCompletion({
 *   systemPrompt: 'Always respond with valid JSON.',
 *   prompt: 'Classify the emotion of: "I passed the exam!"',
 *   temperature: 0.2,
 *   maxTokens: 100,
 *   json: true,
 * });
 * // result.content: '{"emotion": "happy", "confidence": 0.92}'
 */
export async function callGroqCompletion(
  options: GroqCompletionOptions
): Promise<GroqCompletionResponse> {
  const settings = getSettings();
  const { apiKey, baseUrl, timeoutMs } = settings.groq;

  if (!apiKey) {
    throw new Error('Groq API key not configured');
  }

  const model = options.model?.trim() || settings.groq.model;

  const client = new OpenAI({
    baseURL: baseUrl,
    apiKey,
    timeout: timeoutMs,
    maxRetries: 0,
  });

  const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

  if (options.systemPrompt) {
    messages.push({
      role: 'system',
      content: options.systemPrompt,
    });
  }

  messages.push({
    role: 'user',
    content: options.prompt,
  });

  const requestParams: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
    model,
    messages,
    temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    max_completion_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
  };

  if (options.json) {
    requestParams.response_format = { type: 'json_object' };
  }

  log.debug(
    {
      model,
      baseUrl,
      systemPrompt: options.systemPrompt,
      prompt: options.prompt,
      json: Boolean(options.json),
    },
    'groq request'
  );

  let response: OpenAI.Chat.ChatCompletion;
  try {
    response = await client.chat.completions.create(requestParams);
  } catch (error) {
    const { message, status } = describeError(error);
    log.error(
      {
        error: message,
        status,
        model,
        temperature: requestParams.temperature,
        maxTokens: requestParams.max_completion_tokens,
        systemPromptPreview: options.systemPrompt ? options.systemPrompt.substring(0, 500) : null,
        promptPreview: options.prompt.substring(0, 500),
        promptLength: options.prompt.length,
      },
      'groq api call failed'
    );
    throw new Error(`API call failed: ${message}`, { cause: error });
  }

  const choice = response.choices?.[0];
  const content = choice?.message?.content ?? '';
  const finishReason = choice?.finish_reason ?? null;

  if (finishReason === 'length') {
    log.warn(
      {
        maxTokens: requestParams.max_completion_tokens,
        completionTokens: response.usage?.completion_tokens,
      },
      'groq response truncated by token limit'
    );
  }

  const usage = response.usage ? {
    promptTokens: response.usage.prompt_tokens,
    completionTokens: response.usage.completion_tokens,
    totalTokens: response.usage.total_tokens,
  } : undefined;

  log.debug({ content, finishReason, usage }, 'groq response');

  return {
    content,
    finishReason,
    usage,
  };
}

export function isGroqConfigured(): boolean {
  return Boolean(getSettings().groq.apiKey?.trim());
}
