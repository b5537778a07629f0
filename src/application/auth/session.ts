import type { Account } from '../../domain/auth/account.js';
import {
  InvalidCredentialsError,
  SessionLockedError,
  SessionStateError,
} from '../../domain/auth/errors.js';
import { createLogger } from '../../infra/logger.js';

export type SessionState = 'unauthenticated' | 'authenticated' | 'locked';

export type AttemptResult =
  | { outcome: 'authenticated'; account: Account }
  | { outcome: 'rejected'; attemptsRemaining: number }
  | { outcome: 'locked'; lockedUntil: Date | null };

export interface Authenticator {
  authenticate(username: string, password: string): Promise<Account>;
}

export interface SessionOptions {
  maxAttempts?: number;
  /** Cooldown after which a locked session accepts attempts again. Unset = locked for good. */
  lockoutMs?: number | null;
  now?: () => number;
}

export const DEFAULT_MAX_ATTEMPTS = 3;

const log = createLogger('session');

/**
 * Login state machine with a bounded attempt budget.
 *
 * unauthenticated --success--> authenticated --logout--> unauthenticated
 * unauthenticated --budget exhausted--> locked
 */
export class AuthenticationSession {
  readonly maxAttempts: number;
  private readonly lockoutMs: number | null;
  private readonly now: () => number;

  private _state: SessionState = 'unauthenticated';
  private _attemptsRemaining: number;
  private _currentAccount: Account | null = null;
  private lockedAt: number | null = null;
  private attemptInFlight = false;

  constructor(
    private readonly authenticator: Authenticator,
    options: SessionOptions = {}
  ) {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError('maxAttempts must be a positive integer');
    }
    this.maxAttempts = maxAttempts;
    this.lockoutMs = options.lockoutMs ?? null;
    this.now = options.now ?? Date.now;
    this._attemptsRemaining = maxAttempts;
  }

  get state(): SessionState {
    return this._state;
  }

  get attemptsRemaining(): number {
    return this._attemptsRemaining;
  }

  get currentAccount(): Account | null {
    return this._currentAccount;
  }

  get lockedUntil(): Date | null {
    if (this.lockedAt === null || this.lockoutMs === null) {
      return null;
    }
    return new Date(this.lockedAt + this.lockoutMs);
  }

  /**
   * Try one username/password pair. Each invalid-credentials failure costs
   * exactly one attempt; other errors propagate and cost nothing.
   */
  async attempt(username: string, password: string): Promise<AttemptResult> {
    this.reopenIfCooledDown();

    if (this._state === 'locked') {
      throw new SessionLockedError(this.lockedUntil);
    }
    if (this._state === 'authenticated') {
      throw new SessionStateError('Already signed in, log out first');
    }
    if (this.attemptInFlight) {
      throw new SessionStateError('Another login attempt is in progress');
    }

    this.attemptInFlight = true;
    try {
      const account = await this.authenticator.authenticate(username, password);
      this._state = 'authenticated';
      this._currentAccount = account;
      return { outcome: 'authenticated', account };
    } catch (error) {
      if (!(error instanceof InvalidCredentialsError)) {
        throw error;
      }
      return this.recordFailure();
    } finally {
      this.attemptInFlight = false;
    }
  }

  logout(): void {
    if (this._state !== 'authenticated') {
      throw new SessionStateError('Not signed in');
    }
    this.reset();
  }

  /**
   * The signed-in account, for operations that need one.
   */
  requireAccount(): Account {
    if (this._state !== 'authenticated' || !this._currentAccount) {
      throw new SessionStateError('Not signed in');
    }
    return this._currentAccount;
  }

  // Never log the typed username.
  private recordFailure(): AttemptResult {
    this._attemptsRemaining -= 1;
    log.info('Login failed', { attemptsRemaining: this._attemptsRemaining });

    if (this._attemptsRemaining > 0) {
      return { outcome: 'rejected', attemptsRemaining: this._attemptsRemaining };
    }

    this._state = 'locked';
    this.lockedAt = this.now();
    log.warn('Login locked after too many failed attempts', {
      lockedUntil: this.lockedUntil?.toISOString() ?? null,
    });
    return { outcome: 'locked', lockedUntil: this.lockedUntil };
  }

  private reopenIfCooledDown(): void {
    if (
      this._state === 'locked' &&
      this.lockedAt !== null &&
      this.lockoutMs !== null &&
      this.now() >= this.lockedAt + this.lockoutMs
    ) {
      this.reset();
    }
  }

  private reset(): void {
    this._state = 'unauthenticated';
    this._currentAccount = null;
    this._attemptsRemaining = this.maxAttempts;
    this.lockedAt = null;
  }
}
