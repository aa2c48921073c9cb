import 'dotenv/config';
import { loadConfig, requireSecrets, type AutomationConfig, type Secret } from '../lib/config';
import connectToDatabase from '../lib/mongodb';
import { createOrchestrator, type Orchestrator } from '../lib/orchestrator';

/** Load config, check the secrets this script needs and connect to MongoDB. */
export async function bootstrap(secrets: readonly Secret[]): Promise<{ config: AutomationConfig; orchestrator: Orchestrator }> {
  const config = loadConfig();
  requireSecrets(config, ['mongodb', ...secrets]);
  await connectToDatabase(config.mongodbUri);
  return { config, orchestrator: createOrchestrator(config) };
}
