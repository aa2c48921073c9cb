import { pickRandom } from '../runtime';
import type { ActivityLedgerEntry } from '../types';

/**
 * Topic used longest ago among `topics`, judged by the `topic` recorded on
 * earlier post attempts. Never-used topics come first; ties break randomly.
 */
export function selectTopic(
  topics: readonly string[],
  postAttempts: readonly ActivityLedgerEntry[],
  random: () => number
): string {
  const lastUsed = new Map<string, number>();
  for (const entry of postAttempts) {
    const topic = entry.metadata?.topic;
    if (typeof topic !== 'string') continue;
    const at = entry.timestamp.getTime();
    lastUsed.set(topic, Math.max(lastUsed.get(topic) ?? 0, at));
  }

  let oldest = Infinity;
  let candidates: string[] = [];
  for (const topic of topics) {
    const at = lastUsed.get(topic) ?? -Infinity;
    if (at < oldest) {
      oldest = at;
      candidates = [topic];
    } else if (at === oldest) {
      candidates.push(topic);
    }
  }

  const chosen = pickRandom(random, candidates);
  if (chosen === undefined) {
    throw new Error('No topics configured');
  }
  return chosen;
}
