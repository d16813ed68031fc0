import { loadGatewayConfig } from '@wxgate/config';
import { log } from '@wxgate/observability';
import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import postgres from 'postgres';

const migrationDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../migrations');

async function runMigrations(): Promise<void> {
  const config = loadGatewayConfig();
  if (!config.DATABASE_URL) {
    throw new Error('DATABASE_URL is required to run migrations.');
  }

  const sql = postgres(config.DATABASE_URL, {
    max: 1,
    idle_timeout: 5,
    connect_timeout: 10,
    prepare: false
  });

  try {
    await sql.unsafe(`
      create table if not exists schema_migrations (
        version text primary key,
        applied_at timestamptz not null default now()
      )
    `);

    const migrationFiles = (await readdir(migrationDir))
      .filter((file) => file.endsWith('.sql'))
      .sort((a, b) => a.localeCompare(b));

    for (const filename of migrationFiles) {
      const alreadyApplied = await sql.unsafe('select 1 from schema_migrations where version = $1 limit 1', [filename]);
      if (alreadyApplied.length > 0) {
        continue;
      }

      const migrationSql = await readFile(path.join(migrationDir, filename), 'utf8');
      await sql.begin(async (transaction) => {
        await transaction.unsafe(migrationSql);
        await transaction.unsafe('insert into schema_migrations(version) values ($1)', [filename]);
      });
      log('info', 'Applied migration', { filename });
    }

    log('info', 'Migration run complete', { count: migrationFiles.length });
  } finally {
    await sql.end({ timeout: 5 });
  }
}

runMigrations().catch((error: unknown) => {
  log('error', 'Migration run failed', { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
