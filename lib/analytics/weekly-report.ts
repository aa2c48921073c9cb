/**
 * Weekly activity report built from the ledger: per-kind totals, post
 * success rate, error breakdown, best posting hours and recommendations.
 */

import { daysBefore } from '../dates';
import { isSlotEntry, type ActivityLedger } from '../ledger/activity-ledger';
import { ACTION_KINDS, type ActionKind, type ActivityLedgerEntry } from '../types';

export interface KindTotals {
  attempts: number;
  succeeded: number;
  failed: number;
  skipped: number;
  /** Attempts with no recorded outcome. */
  indeterminate: number;
}

export interface WeeklyReport {
  period: { start: Date; end: Date };
  totals: Record<ActionKind, KindTotals>;
  /** Succeeded / (succeeded + failed) for posts, null when there were none. */
  postSuccessRate: number | null;
  errorKinds: Record<string, number>;
  /** UTC hours with the most published posts, busiest first (max 3). */
  bestPostingHours: number[];
  topics: Record<string, number>;
  recommendations: string[];
}

const REPORT_DAYS = 7;

function emptyTotals(): KindTotals {
  return { attempts: 0, succeeded: 0, failed: 0, skipped: 0, indeterminate: 0 };
}

export function recommendations(totals: Record<ActionKind, KindTotals>): string[] {
  const posts = totals.post.succeeded;
  const connections = totals.connection.succeeded;
  const engagements = totals.engagement.succeeded;
  const result: string[] = [];

  if (posts < 3) {
    result.push('Consider increasing your posting frequency to maintain visibility');
  } else if (posts > 10) {
    result.push('You might be posting too frequently; consider focusing on quality over quantity');
  }

  if (connections < 5) {
    result.push('Try to increase your connection requests to grow your network');
  } else if (connections > 30) {
    result.push('Consider being more selective with connection requests to maintain quality');
  }

  if (engagements < 10) {
    result.push('Increase engagement with your network by commenting on posts and sharing content');
  }

  const failed = ACTION_KINDS.reduce((sum, kind) => sum + totals[kind].failed, 0);
  const finished = ACTION_KINDS.reduce((sum, kind) => sum + totals[kind].failed + totals[kind].succeeded, 0);
  if (finished > 0 && failed / finished > 0.3) {
    result.push('More than 30% of actions failed this week; check the error breakdown');
  }

  return result;
}

export function buildWeeklyReport(entries: readonly ActivityLedgerEntry[], now: Date): WeeklyReport {
  const start = daysBefore(now, REPORT_DAYS);
  // Engagement and connection slots are counted through their targets
  const slotAttempts = new Set(entries.filter(isSlotEntry).map(entry => entry.attemptId));
  const inPeriod = entries.filter(
    entry => entry.timestamp >= start && entry.timestamp <= now && !slotAttempts.has(entry.attemptId)
  );

  const totals = {
    post: emptyTotals(),
    engagement: emptyTotals(),
    connection: emptyTotals(),
  } satisfies Record<ActionKind, KindTotals>;
  const errorKinds: Record<string, number> = {};
  const topics: Record<string, number> = {};
  const postsByHour = new Map<number, number>();
  const closed = new Set<string>();

  for (const entry of inPeriod) {
    if (entry.phase !== 'outcome' || !entry.outcome) continue;
    closed.add(entry.attemptId);
    totals[entry.actionKind][entry.outcome]++;

    if (entry.errorKind && entry.outcome === 'failed') {
      errorKinds[entry.errorKind] = (errorKinds[entry.errorKind] ?? 0) + 1;
    }

    if (entry.actionKind === 'post' && entry.outcome === 'succeeded') {
      const hour = entry.timestamp.getUTCHours();
      postsByHour.set(hour, (postsByHour.get(hour) ?? 0) + 1);
      const topic = entry.metadata?.topic;
      if (typeof topic === 'string') topics[topic] = (topics[topic] ?? 0) + 1;
    }
  }

  for (const entry of inPeriod) {
    if (entry.phase !== 'attempt') continue;
    totals[entry.actionKind].attempts++;
    if (!closed.has(entry.attemptId)) totals[entry.actionKind].indeterminate++;
  }

  const finishedPosts = totals.post.succeeded + totals.post.failed;
  const bestPostingHours = [...postsByHour.entries()]
    .sort((a, b) => b[1] - a[1] || a[0] - b[0])
    .slice(0, 3)
    .map(([hour]) => hour);

  return {
    period: { start, end: now },
    totals,
    postSuccessRate: finishedPosts > 0 ? totals.post.succeeded / finishedPosts : null,
    errorKinds,
    bestPostingHours,
    topics,
    recommendations: recommendations(totals),
  };
}

export async function generateWeeklyReport(ledger: ActivityLedger, now: Date): Promise<WeeklyReport> {
  // Outcomes in the period may close attempts made just before it
  const entries = await ledger.list({ since: daysBefore(now, REPORT_DAYS + 1), until: now });
  return buildWeeklyReport(entries, now);
}

export function formatReport(report: WeeklyReport): string {
  const lines = [
    `Activity report ${report.period.start.toISOString().slice(0, 10)} to ${report.period.end.toISOString().slice(0, 10)}`,
    '',
  ];
  for (const kind of ACTION_KINDS) {
    const t = report.totals[kind];
    lines.push(
      `${kind.padEnd(11)} attempts ${t.attempts}, succeeded ${t.succeeded}, failed ${t.failed}, skipped ${t.skipped}, indeterminate ${t.indeterminate}`
    );
  }
  lines.push('');
  lines.push(`Post success rate: ${report.postSuccessRate === null ? 'n/a' : `${Math.round(report.postSuccessRate * 100)}%`}`);
  if (report.bestPostingHours.length > 0) {
    lines.push(`Best posting hours (UTC): ${report.bestPostingHours.map(h => `${String(h).padStart(2, '0')}:00`).join(', ')}`);
  }
  const errors = Object.entries(report.errorKinds);
  if (errors.length > 0) {
    lines.push(`Errors: ${errors.map(([kind, count]) => `${kind} ${count}`).join(', ')}`);
  }
  if (report.recommendations.length > 0) {
    lines.push('', 'Recommendations:', ...report.recommendations.map(r => `- ${r}`));
  }
  return lines.join('\n');
}
