import { loadConfig } from './infra/config.js';
import { configureLogger, createLogger } from './infra/logger.js';
import { checkConnection, createPool } from './infra/db/pool.js';
import { PgAccountStore } from './infra/db/accountStore.js';
import { PasswordHasher } from './domain/auth/password.js';
import { AccountManager } from './application/accounts/accountManager.js';
import { AuthenticationSession } from './application/auth/session.js';
import { AirQualityClient } from './infra/airQuality/airQualityClient.js';
import { ConsoleApp } from './infra/console/app.js';
import { ReadlinePrompter } from './infra/console/prompter.js';
import { runScript } from './scripts/runScript.js';

const log = createLogger('main');

runScript('Console', async () => {
  const config = loadConfig();
  configureLogger({ level: config.logLevel });

  const pool = createPool({
    connectionString: config.databaseUrl,
    max: config.databasePoolMax,
    connectionTimeoutMillis: config.databaseConnectTimeoutMs,
  });

  try {
    console.log('Checking database connection...');
    if (!(await checkConnection(pool, config.databaseConnectTimeoutMs))) {
      console.error('Could not connect to the database. Check DATABASE_URL and that PostgreSQL is running.');
      return 1;
    }

    const accounts = new AccountManager(
      new PgAccountStore(pool),
      new PasswordHasher({ cost: config.passwordHashCost, minLength: config.passwordMinLength })
    );
    const session = new AuthenticationSession(accounts, {
      maxAttempts: config.loginMaxAttempts,
      lockoutMs: config.loginLockoutMs,
    });
    const airQuality = new AirQualityClient({
      baseUrl: config.airQuality.baseUrl,
      token: config.airQuality.token,
      timeoutMs: config.airQuality.timeoutMs,
    });

    const prompter = new ReadlinePrompter();
    try {
      const app = new ConsoleApp({
        prompter,
        accounts,
        session,
        airQuality,
        defaultCity: config.airQuality.defaultCity,
      });
      const code = await app.run();
      log.debug('Console exited', { code });
      return code;
    } finally {
      prompter.close();
    }
  } finally {
    await pool.end();
  }
});
