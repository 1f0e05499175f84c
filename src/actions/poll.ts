import { z } from "zod";
import { HarnessError, errorMessage } from "../errors.js";
import type { Condition, ConditionResult, PollOutcome, PollPolicy } from "../types.js";

export const MAX_WAIT_MS = 5000;
// Wall-clock ceiling for policies that only bound attempts.
export const HARD_CAP_MS = 30000;

const PolicySchema = z
  .object({
    initialDelayMs: z.number().int().positive(),
    backoffMultiplier: z.number().min(1),
    maxDelayMs: z.number().int().positive(),
    stopAfterAttempts: z.number().int().positive().optional(),
    stopAfterMs: z.number().int().positive().optional(),
  })
  .refine((p) => p.maxDelayMs >= p.initialDelayMs, {
    message: "maxDelayMs must be >= initialDelayMs",
  })
  .refine((p) => p.stopAfterAttempts !== undefined || p.stopAfterMs !== undefined, {
    message: "a policy needs stopAfterAttempts or stopAfterMs",
  });

const DEFAULT_POLICY: PollPolicy = {
  initialDelayMs: 50,
  backoffMultiplier: 2,
  maxDelayMs: 1000,
  stopAfterMs: MAX_WAIT_MS,
};

/**
 * Build a validated policy. Fields left out fall back to the defaults; a
 * partial that names only `stopAfterAttempts` drops the default duration bound.
 */
export function definePolicy(partial: Partial<PollPolicy> = {}): PollPolicy {
  const merged: PollPolicy = { ...DEFAULT_POLICY, ...partial };
  if (partial.stopAfterAttempts !== undefined && partial.stopAfterMs === undefined) {
    delete merged.stopAfterMs;
  }
  const parsed = PolicySchema.safeParse(merged);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => i.message).join("; ");
    throw new HarnessError("CONFIG_INVALID", `Invalid poll policy: ${message}`);
  }
  return parsed.data;
}

/** Delay before attempt `n + 1`, given `n` completed attempts. */
export function backoffDelay(policy: PollPolicy, attempts: number): number {
  const raw = policy.initialDelayMs * policy.backoffMultiplier ** Math.max(0, attempts - 1);
  return Math.min(raw, policy.maxDelayMs);
}

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

const PENDING = Symbol("pending");

// Races one evaluation against the remaining budget. A late rejection is
// observed so it cannot surface as unhandled after the wait has returned.
async function evaluateWithin<T>(
  condition: Condition<T>,
  remainingMs: number,
): Promise<ConditionResult<T> | typeof PENDING> {
  const evaluation = Promise.resolve().then(condition);
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<typeof PENDING>((resolve) => {
    timer = setTimeout(() => resolve(PENDING), Math.max(0, remainingMs));
  });
  try {
    const result = await Promise.race([evaluation, deadline]);
    if (result === PENDING) {
      evaluation.catch((err: unknown) => {
        console.error(`[settlecheck] condition rejected after its deadline: ${errorMessage(err)}`);
      });
    }
    return result;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Poll `condition` until it holds, the policy is exhausted, or `signal`
 * aborts. A condition that throws is not retried: the error propagates.
 */
export async function awaitCondition<T = unknown>(
  condition: Condition<T>,
  policy: PollPolicy,
  opts: { signal?: AbortSignal } = {},
): Promise<PollOutcome<T>> {
  const start = Date.now();
  const budgetMs = policy.stopAfterMs ?? HARD_CAP_MS;
  const deadline = start + budgetMs;
  let attempts = 0;
  let observed: T | undefined;

  while (true) {
    if (opts.signal?.aborted) {
      return { status: "cancelled", attempts, elapsedMs: Date.now() - start, observed };
    }

    const result = await evaluateWithin(condition, deadline - Date.now());
    attempts++;

    if (result !== PENDING) {
      const met = typeof result === "boolean" ? result : result.met;
      if (typeof result !== "boolean") observed = result.observed;
      if (met) return { status: "ok", attempts, elapsedMs: Date.now() - start, observed };
    }

    if (policy.stopAfterAttempts !== undefined && attempts >= policy.stopAfterAttempts) {
      return { status: "timedOut", reason: "attempts", attempts, elapsedMs: Date.now() - start, observed };
    }
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return { status: "timedOut", reason: "duration", attempts, elapsedMs: Date.now() - start, observed };
    }

    const slept = await sleep(Math.min(backoffDelay(policy, attempts), remaining), opts.signal);
    if (!slept) {
      return { status: "cancelled", attempts, elapsedMs: Date.now() - start, observed };
    }
  }
}

export interface RetryOptions {
  /** Returns true for failures worth another attempt. Others rethrow at once. */
  retryIf: (err: unknown) => boolean;
  signal?: AbortSignal;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run a side-effecting `action` until it succeeds, retrying transient
 * failures with the policy's backoff. Rethrows the last error on exhaustion.
 */
export async function withRetry<T>(
  action: () => Promise<T>,
  policy: PollPolicy,
  opts: RetryOptions,
): Promise<T> {
  const deadline = Date.now() + (policy.stopAfterMs ?? HARD_CAP_MS);
  let attempts = 0;

  while (true) {
    try {
      return await action();
    } catch (err) {
      attempts++;
      if (!opts.retryIf(err)) throw err;
      if (policy.stopAfterAttempts !== undefined && attempts >= policy.stopAfterAttempts) throw err;
      const remaining = deadline - Date.now();
      if (remaining <= 0) throw err;

      const delay = Math.min(backoffDelay(policy, attempts), remaining);
      opts.onRetry?.(err, attempts, delay);
      if (!(await sleep(delay, opts.signal))) throw err;
    }
  }
}

/** Convert a non-ok outcome into a WAIT_TIMEOUT error that keeps the last observation. */
export function timeoutError(description: string, outcome: PollOutcome): HarnessError {
  const seen = outcome.observed === undefined ? "" : `; last observed: ${JSON.stringify(outcome.observed)}`;
  const how = outcome.status === "cancelled" ? "cancelled" : "not met";
  return new HarnessError(
    "WAIT_TIMEOUT",
    `${description} ${how} after ${outcome.attempts} attempt(s) in ${outcome.elapsedMs}ms${seen}`,
    { observed: outcome.observed },
  );
}
