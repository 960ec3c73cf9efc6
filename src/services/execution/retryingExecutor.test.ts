import { warning } from '@services/logger';
import { wait } from '@utils/process/process.utils';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { getBackoffDelay, RetryingExecutor } from './retryingExecutor';

vi.mock('@services/logger', () => ({ warning: vi.fn() }));
vi.mock('@utils/process/process.utils', () => ({ wait: vi.fn() }));

const POLICY = { maxAttempts: 3, initialDelay: 1000, backoffFactor: 2 };

const failingTimes = (failures: number, value = 'done') => {
  let calls = 0;
  return vi.fn(async () => {
    calls++;
    if (calls <= failures) throw new Error(`failure ${calls}`);
    return value;
  });
};

describe('RetryingExecutor', () => {
  let executor: RetryingExecutor;

  beforeEach(() => {
    vi.mocked(wait).mockResolvedValue(undefined);
    executor = new RetryingExecutor(POLICY);
  });

  describe('getBackoffDelay', () => {
    it.each`
      attempt | expected
      ${1}    | ${1000}
      ${2}    | ${2000}
      ${3}    | ${4000}
    `('waits $expected ms after attempt $attempt', ({ attempt, expected }) => {
      expect(getBackoffDelay(attempt, POLICY)).toBe(expected);
    });
  });

  it('returns the first successful result without waiting', async () => {
    const operation = failingTimes(0);

    await expect(executor.execute(operation)).resolves.toBe('done');
    expect(operation).toHaveBeenCalledOnce();
    expect(wait).not.toHaveBeenCalled();
  });

  it.each`
    failures | delays
    ${1}     | ${[1000]}
    ${2}     | ${[1000, 2000]}
  `('calls the operation $failures + 1 times with increasing delays', async ({ failures, delays }) => {
    const operation = failingTimes(failures);

    await expect(executor.execute(operation)).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(failures + 1);
    expect(vi.mocked(wait).mock.calls.map(([delay]) => delay)).toEqual(delays);
  });

  it('rethrows the last error once the attempts are exhausted, without a final wait', async () => {
    const operation = failingTimes(5);

    await expect(executor.execute(operation)).rejects.toThrow('failure 3');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(wait).toHaveBeenCalledTimes(2);
  });

  it('logs every failed attempt', async () => {
    await executor.execute(failingTimes(1), 'set leverage on ETHUSDT');

    expect(warning).toHaveBeenCalledExactlyOnceWith(
      'retry',
      'Attempt 1/3 of set leverage on ETHUSDT failed: failure 1',
    );
  });

  it('applies per call policy overrides', async () => {
    const operation = failingTimes(5);

    await expect(executor.execute(operation, 'cancel', { maxAttempts: 1 })).rejects.toThrow('failure 1');
    expect(operation).toHaveBeenCalledOnce();
    expect(wait).not.toHaveBeenCalled();
  });

  it('exposes a copy of its policy', () => {
    expect(executor.getPolicy()).toEqual(POLICY);
  });
});
