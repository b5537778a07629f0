import type { QueryResultRow } from 'pg';
import type { Queryable } from './pool.js';
import {
  isRole,
  type Account,
  type AccountChanges,
  type NewAccountRecord,
} from '../../domain/auth/account.js';
import type { DuplicateField } from '../../domain/auth/errors.js';

/**
 * Raised when a username or email uniqueness constraint fires.
 */
export class DuplicateKeyError extends Error {
  constructor(public readonly field: DuplicateField) {
    super(`Duplicate value for ${field}`);
    this.name = 'DuplicateKeyError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Any other storage failure. The driver error is kept as `cause` only.
 */
export class StorageError extends Error {
  constructor(operation: string, options?: ErrorOptions) {
    super(`Account storage operation failed: ${operation}`, options);
    this.name = 'StorageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Persistence for accounts. No business validation happens here.
 */
export interface AccountStore {
  insert(record: NewAccountRecord): Promise<number>;
  findByUsername(username: string): Promise<Account | null>;
  findById(id: number): Promise<Account | null>;
  listAll(): Promise<Account[]>;
  update(id: number, changes: AccountChanges): Promise<Account | null>;
  delete(id: number): Promise<boolean>;
}

type AccountRow = {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  role: string;
};

const ACCOUNT_COLUMNS = 'id, username, email, password_hash, role';

// Only these columns can appear in a SET clause.
const UPDATABLE_COLUMNS: ReadonlyArray<readonly [keyof AccountChanges, string]> = [
  ['email', 'email'],
  ['role', 'role'],
  ['passwordHash', 'password_hash'],
];

const UNIQUE_VIOLATION = '23505';

const CONSTRAINT_FIELDS: Record<string, DuplicateField> = {
  accounts_username_key: 'username',
  accounts_email_key: 'email',
};

function toAccount(row: AccountRow): Account {
  if (!isRole(row.role)) {
    throw new StorageError('read', {
      cause: new Error(`Account ${row.id} has unknown role '${row.role}'`),
    });
  }
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    role: row.role,
  };
}

function isUniqueViolation(
  error: unknown
): error is { code: string; constraint?: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

function translateError(operation: string, error: unknown): Error {
  if (isUniqueViolation(error)) {
    const field = (error.constraint && CONSTRAINT_FIELDS[error.constraint]) || 'unknown';
    return new DuplicateKeyError(field);
  }
  return new StorageError(operation, { cause: error });
}

/**
 * PostgreSQL account store. Every statement binds its values as parameters.
 */
export class PgAccountStore implements AccountStore {
  constructor(private readonly db: Queryable) {}

  async insert(record: NewAccountRecord): Promise<number> {
    const rows = await this.run<{ id: number }>(
      'insert',
      `INSERT INTO accounts (username, email, password_hash, role)
       VALUES ($1, $2, $3, $4)
       RETURNING id`,
      [record.username, record.email, record.passwordHash, record.role]
    );

    return rows[0].id;
  }

  async findByUsername(username: string): Promise<Account | null> {
    const rows = await this.run<AccountRow>(
      'findByUsername',
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE username = $1`,
      [username]
    );

    return rows.length === 0 ? null : toAccount(rows[0]);
  }

  async findById(id: number): Promise<Account | null> {
    const rows = await this.run<AccountRow>(
      'findById',
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE id = $1`,
      [id]
    );

    return rows.length === 0 ? null : toAccount(rows[0]);
  }

  async listAll(): Promise<Account[]> {
    const rows = await this.run<AccountRow>(
      'listAll',
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts ORDER BY id ASC`
    );

    return rows.map(toAccount);
  }

  /**
   * Update only the provided fields. With nothing to change, returns the current row.
   */
  async update(id: number, changes: AccountChanges): Promise<Account | null> {
    const assignments: string[] = [];
    const values: unknown[] = [];

    for (const [key, column] of UPDATABLE_COLUMNS) {
      const value = changes[key];
      if (value === undefined) {
        continue;
      }
      values.push(value);
      assignments.push(`${column} = $${values.length}`);
    }

    if (assignments.length === 0) {
      return this.findById(id);
    }

    assignments.push('updated_at = NOW()');
    values.push(id);
    const rows = await this.run<AccountRow>(
      'update',
      `UPDATE accounts SET ${assignments.join(', ')}
       WHERE id = $${values.length}
       RETURNING ${ACCOUNT_COLUMNS}`,
      values
    );

    return rows.length === 0 ? null : toAccount(rows[0]);
  }

  async delete(id: number): Promise<boolean> {
    try {
      const result = await this.db.query('DELETE FROM accounts WHERE id = $1', [id]);
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      throw translateError('delete', error);
    }
  }

  private async run<R extends QueryResultRow>(
    operation: string,
    text: string,
    values?: unknown[]
  ): Promise<R[]> {
    try {
      const result = await this.db.query<R>(text, values);
      return result.rows;
    } catch (error) {
      throw translateError(operation, error);
    }
  }
}
