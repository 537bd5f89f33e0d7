import type { RetryConfig } from '../config/types.js';
import type { ErrorResult } from '../types/results.js';
import { isErrorResult } from '../types/results.js';

export type FailureClass = 'transient' | 'terminal';

export type RetryPolicyResult = {
  failureClass: FailureClass;
  retryRecommended: boolean;
  failureCode: string;
  reason: string;
};

export function classifyFailure(error: ErrorResult): RetryPolicyResult {
  const message = error.error.toLowerCase();

  if (error.errorKind === 'network') {
    if (message.includes('timed out') || message.includes('timeout')) {
      return { failureClass: 'transient', retryRecommended: true, failureCode: 'TIMEOUT_TEMPORARY', reason: 'timeout_or_temporary' };
    }
    return { failureClass: 'transient', retryRecommended: true, failureCode: 'NETWORK_UNREACHABLE', reason: 'transport_failure' };
  }
  if (error.errorKind === 'http' && error.status === 429) {
    return { failureClass: 'transient', retryRecommended: true, failureCode: 'RATE_LIMITED', reason: 'remote_rate_limit' };
  }
  if (error.errorKind === 'http' && typeof error.status === 'number' && error.status >= 500) {
    return { failureClass: 'transient', retryRecommended: true, failureCode: 'REMOTE_SERVER_ERROR', reason: 'remote_server_error' };
  }
  if (error.errorKind === 'usage') {
    return { failureClass: 'terminal', retryRecommended: false, failureCode: 'INVALID_INPUT', reason: 'caller_input_rejected' };
  }
  if (error.errorKind === 'not-found') {
    return { failureClass: 'terminal', retryRecommended: false, failureCode: 'NOT_FOUND', reason: 'remote_reported_absence' };
  }
  if (error.errorKind === 'unexpected') {
    return { failureClass: 'terminal', retryRecommended: false, failureCode: 'UNEXPECTED_RESPONSE', reason: 'response_shape_mismatch' };
  }
  return { failureClass: 'terminal', retryRecommended: false, failureCode: 'HTTP_REJECTED', reason: 'remote_rejected_request' };
}

export interface RetryOptions extends RetryConfig {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; policy: RetryPolicyResult; error: ErrorResult }) => void;
}

/** Delay before attempt `attempt + 1`: doubles from baseDelayMs, capped at maxDelayMs. */
export function backoffDelay(attempt: number, options: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(options.baseDelayMs * 2 ** (attempt - 1), options.maxDelayMs);
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run a client operation up to `maxAttempts` times, retrying only failures
 * classified as transient. The operation must be idempotent; every client
 * operation in this package is read-only, so it is.
 */
export async function withRetry<T extends { success: boolean }>(
  operation: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    const result = await operation();
    if (!isErrorResult(result) || attempt >= maxAttempts) {
      return result;
    }
    const policy = classifyFailure(result);
    if (!policy.retryRecommended) {
      return result;
    }
    const delayMs = backoffDelay(attempt, options);
    options.onRetry?.({ attempt, delayMs, policy, error: result });
    await sleep(delayMs);
  }
}
