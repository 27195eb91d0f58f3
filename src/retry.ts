// src/retry.ts

import { ResultAsync, errAsync } from 'neverthrow';
import type { Logger } from './types';

export type RetryPolicy = {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
};

export const defaultRetryPolicy: RetryPolicy = {
  attempts: 8,
  baseDelayMs: 500,
  maxDelayMs: 5_000,
  jitterMs: 250,
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type RetryContext = {
  policy: RetryPolicy;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: Sleep;
  random?: () => number;
};

// Access denied and lock contention. On Windows a sharing violation
// surfaces as EBUSY.
const RETRYABLE_CODES: ReadonlySet<string> = new Set(['EACCES', 'EPERM', 'EBUSY']);

export const toError = (e: unknown): Error =>
  e instanceof Error ? e : new Error(String(e));

export const errorCode = (e: unknown): string | undefined =>
  typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string'
    ? e.code
    : undefined;

export const isRetryable = (e: unknown): boolean => {
  const code = errorCode(e);
  return code !== undefined && RETRYABLE_CODES.has(code);
};

// Resolves early, never rejects, when the signal aborts.
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });

export const backoffDelay = (
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number =>
  Math.min(
    policy.maxDelayMs,
    policy.baseDelayMs * 2 ** (attempt - 1) + random() * policy.jitterMs,
  );

export const withRetry =
  (ctx: RetryContext) =>
    (label: string) =>
      <T>(op: () => Promise<T>): ResultAsync<T, Error> => {
        const { policy, logger, signal } = ctx;
        const pause = ctx.sleep ?? sleep;

        const attempt = (n: number): ResultAsync<T, Error> =>
          ResultAsync.fromPromise(Promise.resolve().then(op), toError).orElse(
            (err): ResultAsync<T, Error> => {
              if (!isRetryable(err)) return errAsync(err);
              if (n >= policy.attempts || signal?.aborted) return errAsync(err);
              logger.warn(`[${label}] Retry ${n}/${policy.attempts} after error: ${err.message}`);

              return ResultAsync.fromSafePromise(
                pause(backoffDelay(policy, n, ctx.random), signal),
              ).andThen(() => attempt(n + 1));
            },
          );

        return attempt(1);
      };
