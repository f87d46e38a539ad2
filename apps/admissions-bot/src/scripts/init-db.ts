import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import pg from 'pg';
import { validateEnv } from '@admissions/config';
import { createLogger } from '@admissions/observability';
import { z } from 'zod';

const log = createLogger('init-db');

const env = validateEnv(z.object({ DATABASE_URL: z.string().min(1) }));
const schemaPath = fileURLToPath(new URL('../../sql/schema.sql', import.meta.url));

async function main(): Promise<void> {
  const client = new pg.Client({ connectionString: env.DATABASE_URL });
  await client.connect();
  try {
    await client.query(readFileSync(schemaPath, 'utf8'));
    log.info({ schemaPath }, 'Schema applied');
  } finally {
    await client.end();
  }
}

main().catch((error: unknown) => {
  log.error({ error: error instanceof Error ? error.message : String(error) }, 'Schema not applied');
  process.exit(1);
});
