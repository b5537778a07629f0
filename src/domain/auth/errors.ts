export type DomainErrorKind =
  | 'VALIDATION'
  | 'INVALID_INPUT'
  | 'DUPLICATE_ACCOUNT'
  | 'ACCOUNT_NOT_FOUND'
  | 'INVALID_CREDENTIALS'
  | 'SELF_DELETION'
  | 'STORAGE_FAILURE'
  | 'SESSION_LOCKED'
  | 'SESSION_STATE';

/**
 * Base class for account and session errors.
 * Callers discriminate on `kind` rather than on the class chain.
 */
export abstract class DomainError extends Error {
  abstract readonly kind: DomainErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isDomainError(value: unknown): value is DomainError {
  return value instanceof DomainError;
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends DomainError {
  readonly kind = 'VALIDATION';

  constructor(public readonly issues: ValidationIssue[]) {
    super(issues[0]?.message ?? 'Invalid input');
  }
}

/**
 * Raised by the password hasher for passwords it refuses to hash.
 */
export class InvalidInputError extends DomainError {
  readonly kind = 'INVALID_INPUT';
}

export type DuplicateField = 'username' | 'email' | 'unknown';

export class DuplicateAccountError extends DomainError {
  readonly kind = 'DUPLICATE_ACCOUNT';

  constructor(public readonly field: DuplicateField) {
    super(
      field === 'unknown'
        ? 'An account with this username or email already exists'
        : `An account with this ${field} already exists`
    );
  }
}

export class AccountNotFoundError extends DomainError {
  readonly kind = 'ACCOUNT_NOT_FOUND';

  constructor(lookup: { username: string } | { id: number }) {
    super(
      'username' in lookup
        ? `Account '${lookup.username}' not found`
        : `Account with id ${lookup.id} not found`
    );
  }
}

/**
 * Same message whether the username is unknown or the password is wrong.
 */
export class InvalidCredentialsError extends DomainError {
  readonly kind = 'INVALID_CREDENTIALS';

  constructor() {
    super('Invalid username or password');
  }
}

export class SelfDeletionError extends DomainError {
  readonly kind = 'SELF_DELETION';

  constructor() {
    super('You cannot delete the account you are signed in with');
  }
}

export class StorageFailureError extends DomainError {
  readonly kind = 'STORAGE_FAILURE';

  constructor(options?: ErrorOptions) {
    super('Account storage is unavailable, please try again later', options);
  }
}

export class SessionLockedError extends DomainError {
  readonly kind = 'SESSION_LOCKED';

  constructor(public readonly lockedUntil: Date | null) {
    super(
      lockedUntil
        ? `Too many failed attempts, login is locked until ${lockedUntil.toISOString()}`
        : 'Too many failed attempts, login is locked'
    );
  }
}

export class SessionStateError extends DomainError {
  readonly kind = 'SESSION_STATE';
}
