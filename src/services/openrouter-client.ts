/**
 * OpenRouter completion client
 * Sends one user prompt to the chat completions endpoint and returns the reply text
 */
import fetch from 'node-fetch';
import { z } from 'zod';
import { ErrorCode, HTTPStatusError, ScraperError } from '../types/index.js';
import { elapsed, type Logger } from '../utils/logger.js';

export const OPENROUTER_API_URL = 'https://openrouter.ai/api/v1/chat/completions';

export interface ChatMessage {
  role: 'user';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      })
    )
    .min(1),
});

/**
 * Request a completion and return the first choice's message content.
 *
 * @throws {HTTPStatusError} when the endpoint answers with a non-2xx status
 * @throws {ScraperError} AI_API_ERROR when a 2xx body has no message content
 */
export async function complete(prompt: string, model: string, apiKey: string, log: Logger): Promise<string> {
  const body: ChatCompletionRequest = {
    model,
    messages: [{ role: 'user', content: prompt }],
  };

  const startTime = Date.now();
  log.debug({ model, promptLength: prompt.length }, 'Requesting completion');

  const response = await fetch(OPENROUTER_API_URL, {
    method: 'POST',
    headers: {
      Authorization: `Bearer ${apiKey}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify(body),
  });

  if (!response.ok) {
    const responseBody = await response.text();
    log.error({ model, statusCode: response.status, durationMs: elapsed(startTime) }, 'Completion request failed');
    throw new HTTPStatusError(response.status, responseBody, OPENROUTER_API_URL);
  }

  const payload: unknown = await response.json();
  const parsed = ChatCompletionResponseSchema.safeParse(payload);

  if (!parsed.success) {
    throw new ScraperError(
      'Completion response has no choices[0].message.content',
      ErrorCode.AI_API_ERROR,
      { model, issues: parsed.error.issues },
      false
    );
  }

  const content = parsed.data.choices[0].message.content;
  log.debug({ model, replyLength: content.length, durationMs: elapsed(startTime) }, 'Completion received');

  return content;
}
