/**
 * Issue a bearer token for an agent
 * Usage: npx tsx scripts/issue-token.ts --user <uuid> --agent <id> --consent <id> \
 *          --scopes "memory.read memory.search" [--expires 3600]
 */

import 'dotenv/config';
import { parseArgs } from 'node:util';

import { loadConfig } from '../src/lib/config.js';
import { signAccessToken } from '../src/lib/jwt.js';
import { logger } from '../src/lib/logger.js';

const DEFAULT_EXPIRY_SECONDS = 3600;

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      user: { type: 'string' },
      agent: { type: 'string' },
      consent: { type: 'string' },
      scopes: { type: 'string' },
      expires: { type: 'string' },
    },
  });

  if (values.user === undefined || values.agent === undefined) {
    logger.error('--user and --agent are required');
    process.exit(1);
  }

  const expiresInSeconds =
    values.expires === undefined
      ? DEFAULT_EXPIRY_SECONDS
      : Number.parseInt(values.expires, 10);
  if (!Number.isInteger(expiresInSeconds) || expiresInSeconds <= 0) {
    logger.error('--expires must be a positive number of seconds');
    process.exit(1);
  }

  const config = loadConfig();
  const token = await signAccessToken(
    {
      sub: values.user,
      agent_id: values.agent,
      scope: values.scopes ?? '',
      ...(values.consent !== undefined && {
        consent_id: Number.parseInt(values.consent, 10),
      }),
    },
    config.tokens.signingSecret,
    { expiresInSeconds }
  );

  process.stdout.write(`${token}\n`);
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Failed to issue token');
  process.exit(1);
});
