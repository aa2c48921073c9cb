/**
 * Chat-completion client for an OpenAI-compatible endpoint (Groq by default).
 *
 * One configured model, no retries and no fallback: a failed call surfaces as
 * a GenerationError and the next trigger tries again.
 */

import OpenAI from 'openai';
import type { AutomationConfig } from './config';
import { GenerationError, errorMessage } from './errors';
import { logger } from './logger';

const log = logger.child('ai');

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionOptions {
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
}

export interface AITextService {
  /** Text of the first choice; GenerationError on any upstream failure or empty reply. */
  complete(options: ChatCompletionOptions): Promise<string>;
}

export class OpenAITextService implements AITextService {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(config: AutomationConfig['ai']) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
    this.model = config.model;
  }

  async complete({ messages, temperature = 0.7, maxTokens = 1024 }: ChatCompletionOptions): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages,
        temperature,
        max_tokens: maxTokens,
      });

      content = response.choices[0]?.message?.content;
      log.debug('Completion received', {
        model: this.model,
        totalTokens: response.usage?.total_tokens,
      });
    } catch (error) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      log.warn('Completion failed', { model: this.model, status, error: errorMessage(error) });
      throw new GenerationError(`AI request failed: ${errorMessage(error)}`, { cause: error, status });
    }

    if (!content || !content.trim()) {
      throw new GenerationError('AI returned an empty response');
    }
    return content.trim();
  }
}

export async function completeWithSystem(
  ai: AITextService,
  systemPrompt: string,
  userPrompt: string,
  options: Omit<ChatCompletionOptions, 'messages'> = {}
): Promise<string> {
  return ai.complete({
    ...options,
    messages: [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: userPrompt },
    ],
  });
}
