/**
 * Domain types shared by the orchestrator, its workers and the stores.
 */

export type ActionKind = 'post' | 'engagement' | 'connection';

export const ACTION_KINDS = ['post', 'engagement', 'connection'] as const;

/** One weekly slot. dayOfWeek is 0 = Sunday, all fields in UTC. */
export interface ScheduleEntry {
  readonly dayOfWeek: number;
  readonly hour: number;
  readonly minute: number;
  readonly actionKind: ActionKind;
}

export interface ContentItem {
  readonly id: string;
  readonly topic: string;
  readonly title: string;
  readonly body: string;
  readonly url?: string;
  readonly imageDescription?: string;
  readonly generatedAt: Date;
}

export type PostStatus = 'pending' | 'succeeded' | 'failed';

export interface PostRecord {
  id: string;
  occurrenceKey: string;
  contentItem: ContentItem;
  status: PostStatus;
  submittedAt: Date;
  externalPostId?: string;
  errorKind?: string;
  error?: string;
  resolvedAt?: Date;
}

export interface Prospect {
  readonly id: string;
  readonly name: string;
  readonly title: string;
  readonly company: string;
  readonly mutualConnections: number;
}

export interface NetworkPost {
  id: string;
  authorUrn: string;
  authorName?: string;
  text: string;
  createdAt: Date;
}

export type LedgerPhase = 'attempt' | 'outcome';
export type LedgerOutcome = 'succeeded' | 'failed' | 'skipped';

export interface ActivityLedgerEntry {
  id: string;
  /** Outcome entries point back at the attempt they close. */
  attemptId: string;
  actionKind: ActionKind;
  targetKey: string;
  phase: LedgerPhase;
  outcome?: LedgerOutcome;
  errorKind?: string;
  externalId?: string;
  message?: string;
  metadata?: Record<string, unknown>;
  timestamp: Date;
}

export interface TimeWindow {
  since: Date;
  until: Date;
}
