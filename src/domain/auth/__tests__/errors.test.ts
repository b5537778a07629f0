import { describe, it, expect } from 'vitest';
import {
  AccountNotFoundError,
  DuplicateAccountError,
  InvalidCredentialsError,
  SessionLockedError,
  StorageFailureError,
  ValidationError,
  isDomainError,
} from '../errors.js';

describe('domain errors', () => {
  it('should discriminate by kind', () => {
    const errors = [
      new ValidationError([{ path: 'email', message: 'Email is required' }]),
      new DuplicateAccountError('email'),
      new AccountNotFoundError({ id: 7 }),
      new InvalidCredentialsError(),
    ];

    expect(errors.map((e) => e.kind)).toEqual([
      'VALIDATION',
      'DUPLICATE_ACCOUNT',
      'ACCOUNT_NOT_FOUND',
      'INVALID_CREDENTIALS',
    ]);
  });

  it('should keep class identity and name', () => {
    const error = new DuplicateAccountError('username');

    expect(error).toBeInstanceOf(DuplicateAccountError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('DuplicateAccountError');
    expect(error.message).toBe('An account with this username already exists');
    expect(isDomainError(error)).toBe(true);
    expect(isDomainError(new Error('plain'))).toBe(false);
  });

  it('should use the first issue as the validation message', () => {
    const error = new ValidationError([
      { path: 'username', message: 'Username is required' },
      { path: 'email', message: 'Email is required' },
    ]);

    expect(error.message).toBe('Username is required');
    expect(error.issues).toHaveLength(2);
  });

  it('should describe not-found lookups by username or id', () => {
    expect(new AccountNotFoundError({ username: 'bob' }).message).toBe(
      "Account 'bob' not found"
    );
    expect(new AccountNotFoundError({ id: 3 }).message).toBe(
      'Account with id 3 not found'
    );
  });

  it('should keep the storage cause out of the message', () => {
    const cause = new Error('relation "accounts" does not exist');
    const error = new StorageFailureError({ cause });

    expect(error.message).toBe('Account storage is unavailable, please try again later');
    expect(error.cause).toBe(cause);
  });

  it('should report the lock expiry when there is one', () => {
    expect(new SessionLockedError(null).message).toBe(
      'Too many failed attempts, login is locked'
    );
    expect(new SessionLockedError(new Date('2024-01-01T00:05:00.000Z')).message).toBe(
      'Too many failed attempts, login is locked until 2024-01-01T00:05:00.000Z'
    );
  });
});
