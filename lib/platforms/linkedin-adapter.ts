import { z } from 'zod';
import type { AutomationConfig } from '../config';
import { AuthError, TransientError } from '../errors';
import { logger } from '../logger';
import type { ContentItem, NetworkPost } from '../types';
import { BasePlatformAdapter } from './base-adapter';
import type { PlatformType, TokenValidation } from './types';

const RESTLI_HEADERS = { 'X-Restli-Protocol-Version': '2.0.0' };

const userInfoSchema = z.object({
  sub: z.string().min(1),
  name: z.string().optional(),
  email: z.string().optional(),
});

const postsPageSchema = z.object({
  elements: z
    .array(
      z.object({
        id: z.string(),
        author: z.string(),
        commentary: z.string().optional(),
        createdAt: z.number().optional(),
        lifecycleState: z.string().optional(),
      })
    )
    .default([]),
});

const createdEntitySchema = z.object({
  id: z.string().optional(),
  $URN: z.string().optional(),
});

export type LinkedInAdapterOptions = AutomationConfig['linkedin'] & {
  /** Author URNs whose posts the engagement worker reads. */
  engagementAuthors?: readonly string[];
};

export function toPersonUrn(id: string): string {
  return id.startsWith('urn:li:') ? id : `urn:li:person:${id}`;
}

/**
 * LinkedIn adapter: UGC posts for publishing, the versioned REST posts API
 * for reading, socialActions for likes and comments, invitations for
 * connection requests.
 */
export class LinkedInAdapter extends BasePlatformAdapter {
  readonly platform: PlatformType = 'linkedin';
  protected readonly log = logger.child('linkedin');

  private readonly apiBase: string;
  private readonly restApiBase: string;
  private readonly apiVersion: string;
  private readonly engagementAuthors: readonly string[];
  private authorUrn?: string;

  constructor(options: LinkedInAdapterOptions) {
    super(options.accessToken, options.httpTimeoutMs);
    this.apiBase = options.apiBaseUrl.replace(/\/$/, '');
    this.restApiBase = options.restApiBaseUrl.replace(/\/$/, '');
    this.apiVersion = options.apiVersion;
    this.engagementAuthors = options.engagementAuthors ?? [];
  }

  async validateToken(): Promise<TokenValidation> {
    const response = await this.request(`${this.apiBase}/userinfo`, {
      method: 'GET',
      acceptStatuses: [401, 403],
    });

    if (response.status === 401 || response.status === 403) {
      return { valid: false, reason: `LinkedIn rejected the token (${response.status})` };
    }

    const info = userInfoSchema.safeParse(await this.readJson(response));
    if (!info.success) {
      throw new TransientError('LinkedIn userinfo response has no subject');
    }
    return {
      valid: true,
      profile: { id: info.data.sub, name: info.data.name, email: info.data.email },
    };
  }

  async publish(item: ContentItem): Promise<string> {
    const authorUrn = await this.resolveAuthorUrn();
    const text = this.fitToPlatform(`${item.title}\n\n${item.body}`);

    const shareContent: Record<string, unknown> = {
      shareCommentary: { text },
      shareMediaCategory: item.url ? 'ARTICLE' : 'NONE',
    };
    if (item.url) {
      shareContent.media = [
        {
          status: 'READY',
          originalUrl: item.url,
          title: { text: item.title },
        },
      ];
    }

    const response = await this.request(`${this.apiBase}/ugcPosts`, {
      method: 'POST',
      headers: RESTLI_HEADERS,
      body: JSON.stringify({
        author: authorUrn,
        lifecycleState: 'PUBLISHED',
        specificContent: { 'com.linkedin.ugc.ShareContent': shareContent },
        visibility: { 'com.linkedin.ugc.MemberNetworkVisibility': 'PUBLIC' },
      }),
    });

    const postId = await this.createdId(response);
    if (!postId) {
      // The post may or may not exist; without an id it cannot be confirmed
      throw new TransientError(`LinkedIn accepted the post (${response.status}) but returned no id`);
    }

    this.log.info('Published post', { postId, contentItemId: item.id });
    return postId;
  }

  async fetchRecentNetworkPosts(limit: number): Promise<NetworkPost[]> {
    const posts: NetworkPost[] = [];

    for (const author of this.engagementAuthors) {
      const params = new URLSearchParams({
        q: 'author',
        author,
        count: String(limit),
        sortBy: 'LAST_MODIFIED',
      });
      const response = await this.request(`${this.restApiBase}/posts?${params.toString()}`, {
        method: 'GET',
        headers: { ...RESTLI_HEADERS, 'LinkedIn-Version': this.apiVersion },
      });

      const page = postsPageSchema.safeParse(await this.readJson(response));
      if (!page.success) {
        throw new TransientError(`Unexpected posts response for ${author}`);
      }

      for (const element of page.data.elements) {
        if (element.lifecycleState && element.lifecycleState !== 'PUBLISHED') continue;
        posts.push({
          id: element.id,
          authorUrn: element.author,
          text: element.commentary ?? '',
          createdAt: new Date(element.createdAt ?? 0),
        });
      }
    }

    return posts
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit);
  }

  async postComment(postId: string, text: string): Promise<string> {
    const actor = await this.resolveAuthorUrn();
    const response = await this.request(
      `${this.apiBase}/socialActions/${encodeURIComponent(postId)}/comments`,
      {
        method: 'POST',
        headers: RESTLI_HEADERS,
        body: JSON.stringify({
          actor,
          message: { text: this.truncateContent(text, this.limits.maxCommentCharacters) },
        }),
      }
    );

    const commentId = await this.createdId(response);
    if (!commentId) {
      throw new TransientError(`LinkedIn accepted the comment on ${postId} but returned no id`);
    }
    return commentId;
  }

  async likePost(postId: string): Promise<void> {
    const actor = await this.resolveAuthorUrn();
    // 409: already liked
    await this.request(`${this.apiBase}/socialActions/${encodeURIComponent(postId)}/likes`, {
      method: 'POST',
      headers: RESTLI_HEADERS,
      body: JSON.stringify({ actor, object: postId }),
      acceptStatuses: [409],
    });
  }

  async sendConnectionRequest(prospectId: string, message: string): Promise<string> {
    const invitee = toPersonUrn(prospectId);
    const response = await this.request(`${this.apiBase}/invitations`, {
      method: 'POST',
      headers: RESTLI_HEADERS,
      body: JSON.stringify({
        invitee,
        message: {
          'com.linkedin.invitations.InvitationMessage': { body: message },
        },
      }),
    });

    // A 2xx confirms the invitation even when no id comes back
    return (await this.createdId(response)) ?? invitee;
  }

  private async resolveAuthorUrn(): Promise<string> {
    if (!this.authorUrn) {
      const validation = await this.validateToken();
      if (!validation.valid || !validation.profile) {
        throw new AuthError(validation.reason ?? 'LinkedIn token is not valid');
      }
      this.authorUrn = toPersonUrn(validation.profile.id);
    }
    return this.authorUrn;
  }

  private async createdId(response: Response): Promise<string | undefined> {
    const header = response.headers.get('x-restli-id');
    if (header) return header;

    const body = createdEntitySchema.safeParse(await this.readJson(response));
    if (!body.success) return undefined;
    return body.data.id || body.data.$URN || undefined;
  }
}
