/**
 * Upstream retry loop
 *
 * Retries on transport errors and on configured status codes, sleeping an
 * exponentially growing (capped) backoff between attempts. The sleep and
 * every attempt observe the inbound request's abort signal.
 */

import { setTimeout as sleepFor } from 'node:timers/promises';
import { throwIfAborted } from './abort';
import { RequestAbortedError, UpstreamUnavailableError } from './errors';
import { Logger } from './logger';

export interface RetryPolicy {
  enabled: boolean;
  maxAttempts: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  backoffMultiplier: number;
  retryableStatusCodes: readonly number[];
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  policy: RetryPolicy;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: Sleeper;
}

export interface RetryResult {
  response: Response;
  attempts: number;
}

interface RetryState {
  attempt: number;
  backoffMs: number;
  lastError?: unknown;
}

const defaultSleep: Sleeper = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

export function isRetryableStatus(policy: RetryPolicy, status: number): boolean {
  return policy.enabled && policy.retryableStatusCodes.includes(status);
}

export function maxAttemptsFor(policy: RetryPolicy): number {
  return policy.enabled ? Math.max(1, policy.maxAttempts) : 1;
}

export function nextBackoff(policy: RetryPolicy, currentMs: number): number {
  return Math.min(currentMs * policy.backoffMultiplier, policy.maxBackoffMs);
}

async function waitBeforeRetry(state: RetryState, options: RetryOptions): Promise<void> {
  const sleep = options.sleep ?? defaultSleep;
  try {
    await sleep(state.backoffMs, options.signal);
  } catch (error) {
    if (options.signal?.aborted) {
      throw new RequestAbortedError('retry backoff');
    }
    throw error;
  }
  state.backoffMs = nextBackoff(options.policy, state.backoffMs);
}

// Unread bodies pin the connection; release it before the next attempt
async function discardBody(response: Response, logger: Logger): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.debug('Failed to discard upstream body', { error });
  }
}

export async function executeWithRetry(
  attempt: (attemptNumber: number) => Promise<Response>,
  options: RetryOptions
): Promise<RetryResult> {
  const { policy, logger, signal } = options;
  const maxAttempts = maxAttemptsFor(policy);
  const state: RetryState = { attempt: 0, backoffMs: policy.initialBackoffMs };

  while (state.attempt < maxAttempts) {
    state.attempt++;
    throwIfAborted(signal, 'upstream call');

    let response: Response;
    try {
      response = await attempt(state.attempt);
    } catch (error) {
      if (error instanceof RequestAbortedError || signal?.aborted) {
        throw error instanceof RequestAbortedError ? error : new RequestAbortedError('upstream call');
      }

      state.lastError = error;
      if (state.attempt >= maxAttempts) {
        break;
      }

      logger.warn('Request failed, retrying', {
        attempt: state.attempt,
        max_attempts: maxAttempts,
        error,
        backoff_ms: state.backoffMs
      });
      await waitBeforeRetry(state, options);
      continue;
    }

    if (isRetryableStatus(policy, response.status) && state.attempt < maxAttempts) {
      await discardBody(response, logger);
      state.lastError = new Error(`upstream responded ${response.status}`);
      logger.warn('Retryable status code, retrying', {
        attempt: state.attempt,
        max_attempts: maxAttempts,
        status: response.status,
        backoff_ms: state.backoffMs
      });
      await waitBeforeRetry(state, options);
      continue;
    }

    if (state.attempt > 1) {
      logger.info('Request succeeded after retry', { attempt: state.attempt, status: response.status });
    }
    return { response, attempts: state.attempt };
  }

  logger.error('All retry attempts exhausted', { attempts: state.attempt, error: state.lastError });
  throw new UpstreamUnavailableError(state.attempt, state.lastError);
}
