/**
 * ContentGenerator: turns topics into post content, expands a broad theme
 * into candidate topics, and writes comments and connection messages.
 *
 * Replies are parsed and validated here; anything empty or malformed becomes
 * a GenerationError. No retries.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { completeWithSystem, type AITextService } from '../ai-client';
import type { ContentLength, ContentTone } from '../config';
import { GenerationError } from '../errors';
import { logger } from '../logger';
import type { ContentItem, NetworkPost, Prospect } from '../types';
import {
  COMMENT_SYSTEM_PROMPT,
  POST_SYSTEM_PROMPT,
  commentPrompt,
  connectionPrompt,
  expandPrompt,
  postPrompt,
} from './prompts';

const log = logger.child('content-generator');

export const EXPANDED_TOPIC_COUNT = 5;
export const CONNECTION_MESSAGE_MAX_CHARS = 300;
const MAX_COMMENT_SENTENCES = 2;

const generatedPostSchema = z.object({
  title: z.string().trim().min(1, 'title is empty'),
  body: z.string().trim().min(1, 'body is empty'),
  url: z.string().trim().optional(),
  imageDescription: z.string().trim().optional(),
});

const topicListSchema = z.array(z.string().trim().min(1)).min(1);

export interface ContentGeneratorOptions {
  tone: ContentTone;
  length: ContentLength;
  now?: () => Date;
}

/**
 * First JSON object (or array) in a model reply, tolerating code fences and
 * prose around it.
 */
export function extractJson(text: string, shape: 'object' | 'array'): unknown {
  const pattern = shape === 'object' ? /\{[\s\S]*\}/ : /\[[\s\S]*\]/;
  const match = text.match(pattern);
  if (!match) {
    throw new GenerationError(`AI reply contains no JSON ${shape}`);
  }
  try {
    return JSON.parse(match[0]);
  } catch (error) {
    throw new GenerationError(`AI reply is not valid JSON: ${error instanceof Error ? error.message : 'Unknown error'}`, { cause: error });
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function stripQuotes(text: string): string {
  return text.replace(/^["'“]+|["'”]+$/g, '').trim();
}

/** At most `count` sentences of `text`. */
export function firstSentences(text: string, count: number): string {
  const sentences = text.match(/[^.!?]+[.!?]+(\s|$)|[^.!?]+$/g) ?? [text];
  return sentences.slice(0, count).join('').trim();
}

/** Cut at a word boundary so the result fits in `max` characters. */
export function truncateAtWord(text: string, max: number): string {
  if (text.length <= max) return text;
  const cut = text.slice(0, max - 3);
  const lastSpace = cut.lastIndexOf(' ');
  return `${(lastSpace > max * 0.6 ? cut.slice(0, lastSpace) : cut).trimEnd()}...`;
}

export class ContentGenerator {
  private readonly now: () => Date;

  constructor(
    private readonly ai: AITextService,
    private readonly options: ContentGeneratorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async generate(topic: string): Promise<ContentItem> {
    const reply = await completeWithSystem(
      this.ai,
      POST_SYSTEM_PROMPT,
      postPrompt(topic, this.options.tone, this.options.length),
      { temperature: 0.8, maxTokens: 1200 }
    );

    const parsed = generatedPostSchema.safeParse(extractJson(reply, 'object'));
    if (!parsed.success) {
      throw new GenerationError(
        `AI reply has the wrong shape: ${parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`
      );
    }

    const { title, body, url, imageDescription } = parsed.data;
    if (url && !isHttpUrl(url)) {
      log.warn('Dropping invalid URL from generated post', { topic, url });
    }

    const item: ContentItem = Object.freeze({
      id: uuidv4(),
      topic,
      title,
      body,
      ...(url && isHttpUrl(url) ? { url } : {}),
      ...(imageDescription ? { imageDescription } : {}),
      generatedAt: this.now(),
    });

    log.info('Generated post', { topic, title, chars: body.length });
    return item;
  }

  /** Exactly five distinct candidate topics derived from `baseTopic`. */
  async expand(baseTopic: string): Promise<string[]> {
    const reply = await completeWithSystem(
      this.ai,
      POST_SYSTEM_PROMPT,
      expandPrompt(baseTopic),
      { temperature: 0.9, maxTokens: 400 }
    );

    const parsed = topicListSchema.safeParse(extractJson(reply, 'array'));
    if (!parsed.success) {
      throw new GenerationError('AI reply is not a list of topics');
    }

    const seen = new Set<string>();
    const topics: string[] = [];
    for (const topic of parsed.data) {
      const key = topic.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      topics.push(topic);
    }

    if (topics.length < EXPANDED_TOPIC_COUNT) {
      throw new GenerationError(
        `Expected ${EXPANDED_TOPIC_COUNT} distinct topics for "${baseTopic}", got ${topics.length}`
      );
    }
    return topics.slice(0, EXPANDED_TOPIC_COUNT);
  }

  async comment(post: NetworkPost): Promise<string> {
    const reply = await completeWithSystem(this.ai, COMMENT_SYSTEM_PROMPT, commentPrompt(post), {
      temperature: 0.7,
      maxTokens: 150,
    });

    const text = firstSentences(stripQuotes(reply), MAX_COMMENT_SENTENCES);
    if (!text) {
      throw new GenerationError('AI returned an empty comment');
    }
    return text;
  }

  async connectionMessage(prospect: Prospect): Promise<string> {
    const reply = await completeWithSystem(
      this.ai,
      COMMENT_SYSTEM_PROMPT,
      connectionPrompt(prospect, CONNECTION_MESSAGE_MAX_CHARS),
      { temperature: 0.7, maxTokens: 200 }
    );

    const text = stripQuotes(reply);
    if (!text) {
      throw new GenerationError('AI returned an empty connection message');
    }
    return truncateAtWord(text, CONNECTION_MESSAGE_MAX_CHARS);
  }
}
