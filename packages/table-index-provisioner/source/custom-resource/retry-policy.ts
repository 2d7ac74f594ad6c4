// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: Apache-2.0

import { sleep as defaultSleep } from "../solution-utils/helpers";
import { Sleep } from "./lib";

/**
 * How an operation is retried.
 *
 * @example
 * ```ts
 * const policy: RetryPolicy = {
 *   maxAttempts: 5,     // 1 initial call + 4 retries
 *   delayMs: 30_000,    // fixed wait between attempts
 *   shortCircuit: (error) => String(error).includes("already exists"),
 * };
 * ```
 */
export interface RetryPolicy {
  /** Total number of attempts, initial call included. */
  readonly maxAttempts: number;
  /** Fixed delay between two attempts. No delay follows the last attempt. */
  readonly delayMs: number;
  /** Errors for which retrying stops at once. The caller decides what such an error means. */
  readonly shortCircuit: (error: unknown) => boolean;
}

export type RetryOutcome<T> =
  | { readonly status: "SUCCEEDED"; readonly value: T; readonly attempts: number }
  | { readonly status: "SHORT_CIRCUITED"; readonly error: unknown; readonly attempts: number }
  | { readonly status: "EXHAUSTED"; readonly error: unknown; readonly attempts: number };

export interface RetryHooks {
  /** Runs before every attempt. Anything it throws is not retried and propagates to the caller. */
  readonly beforeAttempt?: (attempt: number) => void;
  /** Runs after a failed attempt that will be retried, before the delay. */
  readonly onRetry?: (attempt: number, error: unknown) => void;
  readonly sleep?: Sleep;
}

/**
 * Runs `operation` until it succeeds, hits a short-circuit error or runs out of attempts.
 * Failures are reported in the returned outcome, never thrown.
 * @param operation The call to make; receives the 1-based attempt number.
 * @param policy Attempts, delay and short-circuit predicate.
 * @param hooks Optional callbacks and sleep implementation.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<RetryOutcome<T>> {
  const sleep = hooks.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    hooks.beforeAttempt?.(attempt);
    try {
      const value = await operation(attempt);
      return { status: "SUCCEEDED", value, attempts: attempt };
    } catch (error) {
      if (policy.shortCircuit(error)) {
        return { status: "SHORT_CIRCUITED", error, attempts: attempt };
      }
      lastError = error;
      if (attempt < policy.maxAttempts) {
        hooks.onRetry?.(attempt, error);
        await sleep(policy.delayMs);
      }
    }
  }

  return { status: "EXHAUSTED", error: lastError, attempts: policy.maxAttempts };
}

/**
 * Poll wait in seconds for the given retry count: `floor(base^(retry/base))`.
 * The retry count is capped at `base`, so the wait never exceeds `base` seconds.
 * @param retry Zero-based poll count.
 * @param base Backoff base, also the cap.
 */
export function computeBackoffWait(retry: number, base: number): number {
  const cappedRetry = Math.min(retry, base);
  return Math.floor(Math.pow(base, cappedRetry / base));
}
