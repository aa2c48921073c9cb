/**
 * Check the LinkedIn access token against /v2/userinfo. Posts nothing.
 *
 *   npm run validate-token
 */

import 'dotenv/config';
import { loadConfig, requireSecrets } from '../lib/config';
import { logger } from '../lib/logger';
import { LinkedInAdapter } from '../lib/platforms/linkedin-adapter';
import { EXIT_CODES, runScript } from './cli';

const log = logger.child('validate-token');

void runScript('validate-token', async () => {
  const config = loadConfig();
  requireSecrets(config, ['linkedin']);

  const result = await new LinkedInAdapter(config.linkedin).validateToken();
  if (!result.valid) {
    log.error('Token rejected', { reason: result.reason });
    return EXIT_CODES.auth;
  }

  log.info('Token is valid', { profileId: result.profile?.id, name: result.profile?.name });
  return EXIT_CODES.ok;
});
