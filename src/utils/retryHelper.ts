import { logger, toError } from './logger';
import { RetryPolicy } from '../download/core/types';

export type FailureVerdict = 'retry' | 'fail';

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  attempts: 2,
  delayMs: 1000,
});

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry helper with a fixed delay between attempts.
 * The classifier decides whether a failure is worth another attempt;
 * a 'fail' verdict rethrows immediately.
 */
export async function retryWithClassifier<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  classify: (error: Error) => FailureVerdict,
  operationName: string = 'operation',
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = toError(error);
      if (classify(lastError) === 'fail') {
        throw lastError;
      }
      if (attempt === attempts) {
        break;
      }
      logger.warn(
        `${operationName} failed, retrying in ${policy.delayMs}ms (attempt ${attempt}/${attempts})`,
        {
          error: lastError.message,
        },
      );
      await sleep(policy.delayMs);
    }
  }

  logger.error(`${operationName} failed after ${attempts} attempts`, {
    error: lastError?.message,
  });
  throw lastError ?? new Error(`${operationName} failed`);
}
