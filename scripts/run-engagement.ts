/**
 * Run one engagement cycle outside the schedule.
 *
 *   npm run engage
 */

import { EXIT_CODES, exitCodeForKind, runScript } from './cli';
import { bootstrap } from './bootstrap';

void runScript('run-engagement', async () => {
  const { orchestrator } = await bootstrap(['linkedin', 'ai']);
  const outcomes = await orchestrator.engagement.cycle();

  const fatal = outcomes.find(o => o.errorKind === 'AuthError');
  if (fatal) return exitCodeForKind(fatal.errorKind);
  const succeeded = outcomes.some(o => o.status === 'succeeded');
  const failed = outcomes.some(o => o.status === 'failed');
  return failed && !succeeded ? EXIT_CODES.failed : EXIT_CODES.ok;
});
