import { JobRecord } from '../entities/WorkInfo.js';

export interface RetryPolicyOptions {
  backoffMultiplier: number;
  maxRetryDelaySeconds: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyOptions = {
  backoffMultiplier: 2,
  maxRetryDelaySeconds: 3600,
};

type RetryFields = Pick<JobRecord, 'retryCount' | 'retryLimit' | 'retryDelay' | 'retryBackoff'>;

export function canRetry(job: RetryFields): boolean {
  return job.retryCount < job.retryLimit;
}

/**
 * Delay before the next attempt. retryCount is the number of retries already consumed,
 * so the first retry waits retryDelay under both policies.
 */
export function retryDelaySeconds(
  job: RetryFields,
  options: RetryPolicyOptions = DEFAULT_RETRY_POLICY
): number {
  if (!job.retryBackoff) {
    return job.retryDelay;
  }
  const delay = job.retryDelay * Math.pow(options.backoffMultiplier, job.retryCount);
  return Math.min(delay, options.maxRetryDelaySeconds);
}

export function nextStartAfter(
  job: RetryFields,
  now: Date,
  options: RetryPolicyOptions = DEFAULT_RETRY_POLICY
): Date {
  return new Date(now.getTime() + retryDelaySeconds(job, options) * 1000);
}
