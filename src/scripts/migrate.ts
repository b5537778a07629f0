import { loadConfig } from '../infra/config.js';
import { configureLogger } from '../infra/logger.js';
import { createPool } from '../infra/db/pool.js';
import { runMigrations } from '../infra/db/migrate.js';
import { runScript } from './runScript.js';

runScript('Migration', async () => {
  const config = loadConfig();
  configureLogger({ level: config.logLevel });

  const pool = createPool({
    connectionString: config.databaseUrl,
    max: config.databasePoolMax,
    connectionTimeoutMillis: config.databaseConnectTimeoutMs,
  });

  try {
    console.log('Starting migrations...');
    const applied = await runMigrations(pool);
    if (applied.length === 0) {
      console.log('No pending migrations.');
    } else {
      console.log(`✓ Applied migration(s): ${applied.join(', ')}`);
    }
    return 0;
  } finally {
    await pool.end();
  }
});
