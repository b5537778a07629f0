import type { Account } from '../../domain/auth/account.js';
import type { AccountManager } from './accountManager.js';

export interface BootstrapAdminCommand {
  username: string;
  email: string;
  password: string;
}

export type BootstrapAdminResult =
  | { created: true; account: Account }
  | { created: false; existingAccounts: number };

/**
 * Create the first administrator of an empty installation.
 * Does nothing once any account exists.
 */
export class BootstrapAdminUseCase {
  constructor(private accounts: AccountManager) {}

  async execute(command: BootstrapAdminCommand): Promise<BootstrapAdminResult> {
    const existing = await this.accounts.list();
    if (existing.length > 0) {
      return { created: false, existingAccounts: existing.length };
    }

    const account = await this.accounts.create({ ...command, role: 'admin' });
    return { created: true, account };
  }
}
