import { z } from 'zod';
import { loadConfig } from '../infra/config.js';
import { configureLogger } from '../infra/logger.js';
import { createPool } from '../infra/db/pool.js';
import { PgAccountStore } from '../infra/db/accountStore.js';
import { PasswordHasher } from '../domain/auth/password.js';
import { isDomainError } from '../domain/auth/errors.js';
import { AccountManager } from '../application/accounts/accountManager.js';
import { BootstrapAdminUseCase } from '../application/accounts/bootstrapAdmin.js';
import { runScript } from './runScript.js';

const adminEnvSchema = z.object({
  ADMIN_USERNAME: z.string().min(1, 'ADMIN_USERNAME is required'),
  ADMIN_EMAIL: z.string().min(1, 'ADMIN_EMAIL is required'),
  ADMIN_PASSWORD: z.string().min(1, 'ADMIN_PASSWORD is required'),
});

runScript('create-admin', async () => {
  const config = loadConfig();
  configureLogger({ level: config.logLevel });

  const adminEnv = adminEnvSchema.safeParse(process.env);
  if (!adminEnv.success) {
    for (const issue of adminEnv.error.errors) {
      console.error(issue.message);
    }
    return 1;
  }

  const pool = createPool({
    connectionString: config.databaseUrl,
    max: config.databasePoolMax,
    connectionTimeoutMillis: config.databaseConnectTimeoutMs,
  });

  try {
    const accounts = new AccountManager(
      new PgAccountStore(pool),
      new PasswordHasher({ cost: config.passwordHashCost, minLength: config.passwordMinLength })
    );
    const result = await new BootstrapAdminUseCase(accounts).execute({
      username: adminEnv.data.ADMIN_USERNAME,
      email: adminEnv.data.ADMIN_EMAIL,
      password: adminEnv.data.ADMIN_PASSWORD,
    });

    if (result.created) {
      console.log(`✓ Created admin '${result.account.username}' with id ${result.account.id}`);
    } else {
      console.log(`${result.existingAccounts} account(s) already exist, nothing to do.`);
    }
    return 0;
  } catch (error) {
    if (isDomainError(error)) {
      console.error(error.message);
      return 1;
    }
    throw error;
  } finally {
    await pool.end();
  }
});
