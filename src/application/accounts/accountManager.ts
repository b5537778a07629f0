import { randomBytes } from 'crypto';
import type { Account, AccountChanges } from '../../domain/auth/account.js';
import {
  AccountNotFoundError,
  DuplicateAccountError,
  InvalidCredentialsError,
  SelfDeletionError,
  StorageFailureError,
  isDomainError,
} from '../../domain/auth/errors.js';
import type { PasswordHasher } from '../../domain/auth/password.js';
import { DuplicateKeyError, type AccountStore } from '../../infra/db/accountStore.js';
import { createLogger } from '../../infra/logger.js';
import {
  createAccountSchema,
  parseInput,
  updateAccountSchema,
  usernameSchema,
} from './schemas.js';

export interface CreateAccountCommand {
  username: string;
  email: string;
  password: string;
  role?: string;
}

export interface UpdateAccountCommand {
  email?: string;
  role?: string;
  password?: string;
}

const log = createLogger('accounts');

/**
 * Account use cases: validation, uniqueness and password handling on top
 * of an AccountStore. Storage errors never reach callers as raw driver text.
 */
export class AccountManager {
  private dummyHash: Promise<string> | undefined;

  constructor(
    private readonly store: AccountStore,
    private readonly hasher: PasswordHasher
  ) {
    // Ready before the first login, so unknown usernames never pay for a hash.
    void this.prepareDummyHash();
  }

  async create(command: CreateAccountCommand): Promise<Account> {
    const input = parseInput(createAccountSchema(this.hasher.minLength), command);
    const passwordHash = await this.hasher.hash(input.password);

    const id = await this.storage(() =>
      this.store.insert({
        username: input.username,
        email: input.email,
        passwordHash,
        role: input.role,
      })
    );

    log.info('Account created', { id, username: input.username, role: input.role });
    return { id, username: input.username, email: input.email, passwordHash, role: input.role };
  }

  async findByUsername(username: string): Promise<Account> {
    const lookup = username.trim();
    const account = await this.storage(() => this.store.findByUsername(lookup));
    if (!account) {
      throw new AccountNotFoundError({ username: lookup });
    }
    return account;
  }

  async findById(id: number): Promise<Account> {
    const account = await this.storage(() => this.store.findById(id));
    if (!account) {
      throw new AccountNotFoundError({ id });
    }
    return account;
  }

  async list(): Promise<Account[]> {
    return await this.storage(() => this.store.listAll());
  }

  /**
   * Check credentials. Unknown usernames and wrong passwords fail identically,
   * and both paths run one password verification.
   */
  async authenticate(username: string, password: string): Promise<Account> {
    const parsed = usernameSchema.safeParse(username);
    const account = parsed.success
      ? await this.storage(() => this.store.findByUsername(parsed.data))
      : null;

    if (!account) {
      await this.verifyAgainstDummy(password);
      throw new InvalidCredentialsError();
    }

    const isValid = await this.hasher.verify(password, account.passwordHash);
    if (!isValid) {
      throw new InvalidCredentialsError();
    }

    return account;
  }

  async update(id: number, command: UpdateAccountCommand): Promise<Account> {
    const input = parseInput(updateAccountSchema(this.hasher.minLength), command);

    const changes: AccountChanges = {
      email: input.email,
      role: input.role,
      passwordHash: input.password === undefined ? undefined : await this.hasher.hash(input.password),
    };

    const account = await this.storage(() => this.store.update(id, changes));
    if (!account) {
      throw new AccountNotFoundError({ id });
    }

    const fields = (['email', 'role', 'password'] as const).filter(
      (key) => input[key] !== undefined
    );
    log.info('Account updated', { id, fields });
    return account;
  }

  /**
   * Hard delete. An account cannot delete itself.
   */
  async delete(id: number, requestingAccountId: number): Promise<void> {
    if (id === requestingAccountId) {
      throw new SelfDeletionError();
    }

    const deleted = await this.storage(() => this.store.delete(id));
    if (!deleted) {
      throw new AccountNotFoundError({ id });
    }

    log.info('Account deleted', { id, by: requestingAccountId });
  }

  private prepareDummyHash(): Promise<string> {
    const pending = this.hasher.hash(randomBytes(16).toString('hex'));
    this.dummyHash = pending;
    // A failed hash is dropped and rebuilt on the next unknown-user login.
    pending.catch(() => {
      if (this.dummyHash === pending) {
        this.dummyHash = undefined;
      }
    });
    return pending;
  }

  private async verifyAgainstDummy(password: string): Promise<void> {
    try {
      await this.hasher.verify(password, await (this.dummyHash ?? this.prepareDummyHash()));
    } catch (error) {
      log.error('Dummy password hash unavailable', { error });
    }
  }

  /**
   * Run a store operation, translating storage errors into domain errors.
   */
  private async storage<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        throw new DuplicateAccountError(error.field);
      }
      if (isDomainError(error)) {
        throw error;
      }
      log.error('Storage operation failed', { error });
      throw new StorageFailureError({ cause: error });
    }
  }
}
