import { describe, it, expect, vi } from 'vitest';
import { AccountManager } from '../../accounts/accountManager.js';
import { AuthenticationSession } from '../session.js';
import { PasswordHasher } from '../../../domain/auth/password.js';
import { MemoryAccountStore } from '../../../test/memoryAccountStore.js';

describe('login flow', () => {
  it('should create, fail once, sign in and promote alice', async () => {
    const accounts = new AccountManager(new MemoryAccountStore(), new PasswordHasher({ cost: 10 }));
    const session = new AuthenticationSession(accounts);

    const created = await accounts.create({
      username: 'alice',
      email: 'alice@x.com',
      password: 'secret1',
      role: 'user',
    });
    expect(created.id).toBe(1);

    const failed = await session.attempt('alice', 'wrong');
    expect(failed).toEqual({ outcome: 'rejected', attemptsRemaining: 2 });
    expect(session.attemptsRemaining).toBe(2);

    const signedIn = await session.attempt('alice', 'secret1');
    expect(signedIn.outcome).toBe('authenticated');
    expect(session.state).toBe('authenticated');
    expect(session.currentAccount?.username).toBe('alice');

    await accounts.update(1, { role: 'admin' });
    const promoted = await accounts.findById(1);
    expect(promoted.role).toBe('admin');
    expect(promoted.passwordHash).toBe(created.passwordHash);
  });

  it('should lock after three failures and not consult storage on the fourth', async () => {
    const store = new MemoryAccountStore();
    const accounts = new AccountManager(store, new PasswordHasher({ cost: 10 }));
    const session = new AuthenticationSession(accounts);
    await accounts.create({ username: 'alice', email: 'alice@x.com', password: 'secret1' });

    await session.attempt('alice', 'wrong1');
    await session.attempt('nobody', 'wrong2');
    const third = await session.attempt('alice', 'wrong3');
    expect(third.outcome).toBe('locked');

    const lookups = vi.spyOn(store, 'findByUsername');
    await expect(session.attempt('alice', 'secret1')).rejects.toMatchObject({ kind: 'SESSION_LOCKED' });
    expect(lookups).not.toHaveBeenCalled();
  });
});
