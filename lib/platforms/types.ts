import type { ContentItem, NetworkPost } from '../types';

export type PlatformType = 'linkedin';

export interface PlatformLimits {
  platform: PlatformType;
  name: string;
  maxCharacters: number;
  recommendedHashtags: { min: number; max: number };
  maxCommentCharacters: number;
}

export const PLATFORM_LIMITS: Record<PlatformType, PlatformLimits> = {
  linkedin: {
    platform: 'linkedin',
    name: 'LinkedIn',
    maxCharacters: 3000,
    recommendedHashtags: { min: 3, max: 5 },
    maxCommentCharacters: 1250,
  },
};

export interface ProfileSummary {
  id: string;
  name?: string;
  email?: string;
}

export interface TokenValidation {
  valid: boolean;
  profile?: ProfileSummary;
  reason?: string;
}

/**
 * Outbound calls to a social network. Every method either returns the
 * confirmed result or throws one of AuthError, TransientError or
 * PlatformError.
 */
export interface SocialPoster {
  readonly platform: PlatformType;
  validateToken(): Promise<TokenValidation>;
  /** Publishes and returns the platform's identifier for the new post. */
  publish(item: ContentItem): Promise<string>;
  fetchRecentNetworkPosts(limit: number): Promise<NetworkPost[]>;
  /** Returns the comment identifier. */
  postComment(postId: string, text: string): Promise<string>;
  likePost(postId: string): Promise<void>;
  /** Returns the invitation identifier. */
  sendConnectionRequest(prospectId: string, message: string): Promise<string>;
}
