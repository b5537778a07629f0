import { argon2id, hash, verify } from 'argon2';
import { InvalidInputError } from './errors.js';

export const DEFAULT_HASH_COST = 12;
export const MIN_HASH_COST = 10;
export const MAX_HASH_COST = 20;
export const DEFAULT_MIN_PASSWORD_LENGTH = 6;

export interface PasswordHasherOptions {
  /** Base-2 log of the memory cost in KiB (12 -> 4096 KiB). */
  cost?: number;
  minLength?: number;
}

/**
 * Password hashing using Argon2id.
 * Hashes are self-describing: algorithm, cost parameters, salt and digest
 * are all encoded in the returned string.
 */
export class PasswordHasher {
  readonly cost: number;
  readonly minLength: number;

  constructor(options: PasswordHasherOptions = {}) {
    const cost = options.cost ?? DEFAULT_HASH_COST;
    if (!Number.isInteger(cost) || cost < MIN_HASH_COST || cost > MAX_HASH_COST) {
      throw new RangeError(
        `Hash cost must be an integer between ${MIN_HASH_COST} and ${MAX_HASH_COST}`
      );
    }
    const minLength = options.minLength ?? DEFAULT_MIN_PASSWORD_LENGTH;
    if (!Number.isInteger(minLength) || minLength < 1) {
      throw new RangeError('Minimum password length must be a positive integer');
    }
    this.cost = cost;
    this.minLength = minLength;
  }

  /**
   * Hash a plain text password with a fresh random salt.
   */
  async hash(plainPassword: string): Promise<string> {
    if (plainPassword.length === 0) {
      throw new InvalidInputError('Password is required');
    }
    if (plainPassword.length < this.minLength) {
      throw new InvalidInputError(
        `Password must be at least ${this.minLength} characters`
      );
    }

    return await hash(plainPassword, {
      type: argon2id,
      memoryCost: 2 ** this.cost,
      timeCost: 3,
      parallelism: 1,
    });
  }

  /**
   * Verify a plain password against a hash. Malformed hashes never match.
   */
  async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    if (!passwordHash) {
      return false;
    }
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}
