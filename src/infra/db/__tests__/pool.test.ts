import { describe, it, expect, vi, afterEach } from 'vitest';
import { checkConnection } from '../pool.js';

describe('checkConnection', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should report a reachable database', async () => {
    const query = vi.fn().mockResolvedValue({ rows: [{ '?column?': 1 }], rowCount: 1 });

    await expect(checkConnection({ query }, 1000)).resolves.toBe(true);
    expect(query).toHaveBeenCalledWith('SELECT 1');
  });

  it('should report a failing database', async () => {
    const query = vi.fn().mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(checkConnection({ query }, 1000)).resolves.toBe(false);
  });

  it('should give up after the timeout', async () => {
    vi.useFakeTimers();
    const query = vi.fn().mockReturnValue(new Promise(() => undefined));

    const check = checkConnection({ query }, 2000);
    await vi.advanceTimersByTimeAsync(2000);

    await expect(check).resolves.toBe(false);
  });
});
