import type { ContentLength, ContentTone } from '../config';
import type { NetworkPost, Prospect } from '../types';

const LENGTH_GUIDE: Record<ContentLength, string> = {
  short: '80-120 words',
  medium: '150-250 words',
  long: '250-350 words',
};

export const POST_SYSTEM_PROMPT =
  'You write LinkedIn posts for a professional audience. ' +
  'Reply with a single JSON object and nothing else.';

export function postPrompt(topic: string, tone: ContentTone, length: ContentLength): string {
  return `Write a LinkedIn post about "${topic}".

Requirements:
- Tone: ${tone}
- Length: ${LENGTH_GUIDE[length]}
- Open with an attention-grabbing headline or hook
- Make 2-3 key points with practical takeaways
- End with a call to action or a question for readers
- 3-5 relevant hashtags on the last line

Return JSON with this shape:
{
  "title": "headline, under 100 characters",
  "body": "the full post text without the headline",
  "url": "optional link to a relevant source, omit if none",
  "imageDescription": "optional one-sentence description of an accompanying image"
}`;
}

export function expandPrompt(baseTopic: string): string {
  return `Suggest 5 distinct, specific LinkedIn post topics that would resonate with professionals, derived from the broad theme "${baseTopic}".
Each topic should be a short title (under 80 characters) with a clear angle.

Return a JSON array of exactly 5 strings and nothing else.`;
}

export const COMMENT_SYSTEM_PROMPT =
  'You write short, genuine LinkedIn comments. No hashtags, no emojis, no flattery without substance.';

export function commentPrompt(post: NetworkPost): string {
  const author = post.authorName ? ` by ${post.authorName}` : '';
  return `Write a comment on this LinkedIn post${author}:

"""
${post.text.slice(0, 1500)}
"""

Keep it to 1-2 sentences: acknowledge a specific point and ask a thoughtful question. Reply with the comment text only.`;
}

export function connectionPrompt(prospect: Prospect, maxChars: number): string {
  const details = [
    prospect.title && `Title: ${prospect.title}`,
    prospect.company && `Company: ${prospect.company}`,
    prospect.mutualConnections > 0 && `Mutual connections: ${prospect.mutualConnections}`,
  ].filter(Boolean).join('\n');

  return `Write a LinkedIn connection request message to ${prospect.name}.
${details}

Mention one specific detail from their profile, stay professional and friendly, and keep it under ${maxChars} characters. Reply with the message text only.`;
}
