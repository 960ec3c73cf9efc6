import type { RetryConfig } from '@models/configuration.types';
import type { Milliseconds } from '@models/utility.types';
import { warning } from '@services/logger';
import { wait } from '@utils/process/process.utils';
import { toErrorMessage } from '@utils/string/string.utils';

export type RetryPolicy = RetryConfig;

/** Delay to observe after the failed `attempt` (1-based) */
export const getBackoffDelay = (attempt: number, { initialDelay, backoffFactor }: RetryPolicy): Milliseconds =>
  initialDelay * backoffFactor ** (attempt - 1);

export const retry = async <T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  description = 'operation',
  attempt = 1,
): Promise<T> => {
  try {
    return await operation();
  } catch (err) {
    warning('retry', `Attempt ${attempt}/${policy.maxAttempts} of ${description} failed: ${toErrorMessage(err)}`);
    if (attempt >= policy.maxAttempts) throw err;
    await wait(getBackoffDelay(attempt, policy));
    return retry(operation, policy, description, attempt + 1);
  }
};

/** Runs exchange calls with a bounded number of attempts and exponential backoff between them. */
export class RetryingExecutor {
  constructor(private readonly policy: RetryPolicy) {}

  public execute<T>(operation: () => Promise<T>, description?: string, overrides: Partial<RetryPolicy> = {}) {
    return retry(operation, { ...this.policy, ...overrides }, description);
  }

  public getPolicy(): RetryPolicy {
    return { ...this.policy };
  }
}
