/**
 * Trigger entry point: run whatever schedule slot is due now.
 *
 *   npm run schedule -- [--now=2024-01-01T09:16:00Z]
 */

import { bootstrap } from './bootstrap';
import { exitCodeForRun, parseNow, runScript } from './cli';

void runScript('run-schedule', async () => {
  const now = parseNow(process.argv.slice(2));
  const { orchestrator } = await bootstrap(['linkedin', 'ai']);
  const outcome = await orchestrator.driver.run(now);
  return exitCodeForRun(outcome);
});
