import { describe, it, expect, beforeEach } from 'vitest';
import { BootstrapAdminUseCase } from '../bootstrapAdmin.js';
import { AccountManager } from '../accountManager.js';
import { PasswordHasher } from '../../../domain/auth/password.js';
import { ValidationError } from '../../../domain/auth/errors.js';
import { MemoryAccountStore } from '../../../test/memoryAccountStore.js';

describe('BootstrapAdminUseCase', () => {
  let store: MemoryAccountStore;
  let useCase: BootstrapAdminUseCase;

  beforeEach(() => {
    store = new MemoryAccountStore();
    useCase = new BootstrapAdminUseCase(new AccountManager(store, new PasswordHasher({ cost: 10 })));
  });

  it('should create an admin when no account exists', async () => {
    const result = await useCase.execute({
      username: 'root',
      email: 'root@example.com',
      password: 'test-secret',
    });

    expect(result.created).toBe(true);
    expect(await store.findByUsername('root')).toMatchObject({ id: 1, role: 'admin' });
  });

  it('should do nothing once accounts exist', async () => {
    await store.insert({ username: 'alice', email: 'alice@example.com', passwordHash: 'h', role: 'user' });

    const result = await useCase.execute({
      username: 'root',
      email: 'root@example.com',
      password: 'test-secret',
    });

    expect(result).toEqual({ created: false, existingAccounts: 1 });
    expect(await store.findByUsername('root')).toBeNull();
  });

  it('should validate the admin details', async () => {
    await expect(
      useCase.execute({ username: 'root', email: 'not-an-email', password: 'test-secret' })
    ).rejects.toThrow(ValidationError);
  });
});
