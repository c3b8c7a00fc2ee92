/**
 * Unit tests for RetryPolicy
 *
 * sleep is replaced so no test waits on a real timer.
 */

import { ConfigError, ExhaustedRetriesError, TransportError } from '../../src/errors';
import { RetryPolicy } from '../../src/polling/retry-policy';
import { createTestLogger, instantSleep } from '../helpers';

describe('RetryPolicy', () => {
  let sleep: ReturnType<typeof instantSleep>;
  let logger: ReturnType<typeof createTestLogger>;
  let policy: RetryPolicy;

  beforeEach(() => {
    sleep = instantSleep();
    logger = createTestLogger();
    policy = new RetryPolicy({ maxAttempts: 3, backoffMs: 500, logger, sleep });
  });

  it('returns the first successful value without sleeping', async () => {
    const operation = jest.fn<Promise<string>, []>().mockResolvedValue('registers');

    const outcome = await policy.execute(operation, 'unit 1', 'soft-fail');

    expect(outcome).toEqual({ ok: true, value: 'registers', attempts: 1 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries transport errors with a constant delay', async () => {
    const operation = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new TransportError('timeout'))
      .mockRejectedValueOnce(new TransportError('timeout'))
      .mockResolvedValue('registers');

    const outcome = await policy.execute(operation, 'unit 1', 'soft-fail');

    expect(outcome).toEqual({ ok: true, value: 'registers', attempts: 3 });
    expect(sleep.mock.calls).toEqual([[500], [500]]);
  });

  it('gives up softly after maxAttempts', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new TransportError('timeout'));

    const outcome = await policy.execute(operation, 'unit 1', 'soft-fail');

    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.attempts).toBe(3);
      expect(outcome.error.fatal).toBe(false);
      expect(outcome.error.message).toBe('Read of unit 1 failed after 3 attempt(s): timeout');
    }
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('throws a fatal error under hard-fail', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new TransportError('refused'));

    const result = policy.execute(operation, 'gateway', 'hard-fail');

    await expect(result).rejects.toBeInstanceOf(ExhaustedRetriesError);
    await expect(result).rejects.toMatchObject({ fatal: true, attempts: 3 });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('does not retry errors other than TransportError', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new ConfigError('bad range'));

    await expect(policy.execute(operation, 'unit 1', 'soft-fail')).rejects.toBeInstanceOf(ConfigError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('makes a single attempt when maxAttempts is 1', async () => {
    const single = new RetryPolicy({ maxAttempts: 1, backoffMs: 500, logger, sleep });
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new TransportError('timeout'));

    const outcome = await single.execute(operation, 'unit 1', 'soft-fail');

    expect(outcome.ok).toBe(false);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('rejects invalid settings', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0, backoffMs: 0, logger })).toThrow(RangeError);
    expect(() => new RetryPolicy({ maxAttempts: 2, backoffMs: -1, logger })).toThrow(RangeError);
  });
});
