import { fetchWithTimeout } from '../circuit-breaker';
import {
  AuthError,
  PlatformError,
  TransientError,
  errorMessage,
  type AutomationError,
} from '../errors';
import type { Logger } from '../logger';
import type { ContentItem, NetworkPost } from '../types';
import {
  PLATFORM_LIMITS,
  type PlatformType,
  type SocialPoster,
  type TokenValidation,
} from './types';

/**
 * Map a non-2xx response to the error taxonomy:
 * 401/403 → AuthError, 429 and 5xx → TransientError, other 4xx → PlatformError.
 */
export function classifyHttpFailure(platform: PlatformType, status: number, body: string): AutomationError {
  const message = `${platform} API error (${status}): ${body.slice(0, 500)}`;
  if (status === 401 || status === 403) return new AuthError(message, { status });
  if (status === 429 || status >= 500) return new TransientError(message, { status });
  return new PlatformError(message, { status });
}

export interface RequestOptions extends Omit<RequestInit, 'headers'> {
  headers?: Record<string, string>;
  /** Statuses accepted as success in addition to 2xx. */
  acceptStatuses?: number[];
}

/**
 * Base class for platform adapters: time-bounded requests with status
 * classification, and text helpers for fitting content to platform limits.
 */
export abstract class BasePlatformAdapter implements SocialPoster {
  abstract readonly platform: PlatformType;
  protected abstract readonly log: Logger;

  protected constructor(
    protected readonly accessToken: string,
    protected readonly timeoutMs: number
  ) {}

  get limits() {
    return PLATFORM_LIMITS[this.platform];
  }

  abstract validateToken(): Promise<TokenValidation>;
  abstract publish(item: ContentItem): Promise<string>;
  abstract fetchRecentNetworkPosts(limit: number): Promise<NetworkPost[]>;
  abstract postComment(postId: string, text: string): Promise<string>;
  abstract likePost(postId: string): Promise<void>;
  abstract sendConnectionRequest(prospectId: string, message: string): Promise<string>;

  /**
   * fetch with auth, timeout and classification. Resolves only for 2xx (or
   * an accepted status); throws AuthError, TransientError or PlatformError.
   */
  protected async request(url: string, options: RequestOptions = {}): Promise<Response> {
    const { acceptStatuses = [], headers, ...init } = options;

    let response: Response;
    try {
      response = await fetchWithTimeout(url, {
        ...init,
        timeoutMs: this.timeoutMs,
        headers: {
          'Authorization': `Bearer ${this.accessToken}`,
          'Content-Type': 'application/json',
          ...headers,
        },
      });
    } catch (error) {
      this.log.warn('Request did not complete', { url, error: errorMessage(error) });
      throw new TransientError(`${this.platform} request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (response.ok || acceptStatuses.includes(response.status)) {
      return response;
    }

    const body = await response.text().catch(() => '');
    const failure = classifyHttpFailure(this.platform, response.status, body);
    this.log.warn('Request rejected', { url, status: response.status, errorKind: failure.kind });
    throw failure;
  }

  /** Parsed JSON body, or null for an empty or non-JSON body. */
  protected async readJson(response: Response): Promise<unknown> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new TransientError(`${this.platform} response body could not be read: ${errorMessage(error)}`, { cause: error });
    }
    if (!text.trim()) return null;
    try {
      return JSON.parse(text);
    } catch {
      return null;
    }
  }

  protected truncateContent(content: string, maxLength?: number): string {
    const limit = maxLength || this.limits.maxCharacters;
    if (content.length <= limit) return content;

    // Prefer a sentence or paragraph boundary
    const truncated = content.substring(0, limit - 3);
    const lastSentence = truncated.lastIndexOf('.');
    const lastNewline = truncated.lastIndexOf('\n');
    const breakPoint = Math.max(lastSentence, lastNewline);

    if (breakPoint > limit * 0.7) {
      return truncated.substring(0, breakPoint + 1);
    }

    return truncated + '...';
  }

  protected extractHashtags(content: string): string[] {
    return content.match(/#\w+/g) || [];
  }

  protected removeHashtags(content: string): string {
    return content.replace(/#\w+/g, '').replace(/[ \t]+\n/g, '\n').trim();
  }

  /**
   * Keep at most the recommended number of hashtags, moved to the last line,
   * and truncate the rest to fit the character limit.
   */
  protected fitToPlatform(content: string): string {
    const hashtags = [...new Set(this.extractHashtags(content))].slice(0, this.limits.recommendedHashtags.max);
    const tagLine = hashtags.join(' ');
    const room = this.limits.maxCharacters - (tagLine ? tagLine.length + 2 : 0);
    const text = this.truncateContent(this.removeHashtags(content), room);
    return tagLine ? `${text}\n\n${tagLine}` : text;
  }
}
