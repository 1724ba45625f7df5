import { describe, it, expect, vi } from 'vitest';
import { connectWithRetry } from '../../src/infrastructure/broker/index.js';
import { ConnectionError } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

describe('connectWithRetry', () => {
  it('returns the first successful dial', async () => {
    const dial = vi.fn().mockResolvedValue('conn');
    const sleep = vi.fn().mockResolvedValue(undefined);

    await expect(connectWithRetry(dial, { attempts: 10, intervalMs: 2000 }, fakeLogger(), sleep)).resolves.toBe('conn');
    expect(dial).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('sleeps a fixed interval between failed attempts', async () => {
    const dial = vi
      .fn()
      .mockRejectedValueOnce(new Error('refused'))
      .mockRejectedValueOnce(new Error('refused'))
      .mockResolvedValue('conn');
    const sleep = vi.fn().mockResolvedValue(undefined);
    const log = fakeLogger();

    await expect(connectWithRetry(dial, { attempts: 10, intervalMs: 2000 }, log, sleep)).resolves.toBe('conn');

    expect(sleep.mock.calls).toEqual([[2000], [2000]]);
    expect(vi.mocked(log.info)).toHaveBeenCalledWith({ attempt: 3 }, 'Broker connected after retry');
  });

  it('gives up after the last attempt with a ConnectionError', async () => {
    const last = new Error('refused #3');
    const dial = vi
      .fn()
      .mockRejectedValueOnce(new Error('refused #1'))
      .mockRejectedValueOnce(new Error('refused #2'))
      .mockRejectedValueOnce(last);
    const sleep = vi.fn().mockResolvedValue(undefined);

    const err = await connectWithRetry(dial, { attempts: 3, intervalMs: 50 }, fakeLogger(), sleep).catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(ConnectionError);
    expect(err).toMatchObject({ attempts: 3, cause: last });
    expect(dial).toHaveBeenCalledTimes(3);
    // no pause after the final attempt
    expect(sleep).toHaveBeenCalledTimes(2);
  });
});
