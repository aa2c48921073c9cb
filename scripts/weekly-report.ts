/**
 * Print the activity report for the seven days before now.
 *
 *   npm run report -- [--now=ISO] [--json]
 */

import 'dotenv/config';
import { formatReport, generateWeeklyReport } from '../lib/analytics/weekly-report';
import { loadConfig, requireSecrets } from '../lib/config';
import { MongoActivityLedger } from '../lib/ledger/activity-ledger';
import connectToDatabase from '../lib/mongodb';
import { EXIT_CODES, hasFlag, parseNow, runScript } from './cli';

void runScript('weekly-report', async () => {
  const argv = process.argv.slice(2);
  const now = parseNow(argv) ?? new Date();
  const config = loadConfig();
  requireSecrets(config, ['mongodb']);
  await connectToDatabase(config.mongodbUri);

  const report = await generateWeeklyReport(new MongoActivityLedger(), now);
  console.log(hasFlag(argv, 'json') ? JSON.stringify(report, null, 2) : formatReport(report));
  return EXIT_CODES.ok;
});
