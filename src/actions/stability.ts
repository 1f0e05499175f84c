import type { Condition, PageDriver, PollPolicy, SettleState } from "../types.js";
import { awaitCondition, definePolicy, timeoutError } from "./poll.js";

// Quiet window after the last DOM mutation before the page counts as settled.
export const QUIET_MS = 200;

/** No request in flight and no swap or settle phase on any element. */
export function htmxIdle(page: PageDriver): Condition<SettleState> {
  return async () => {
    const state = await page.settleState();
    return { met: state.htmxBusy === 0, observed: state };
  };
}

/**
 * Document loaded, htmx idle (primary and out-of-band targets), no running
 * animation or transition, and no DOM mutation for `quietMs`.
 */
export function settled(page: PageDriver, quietMs = QUIET_MS): Condition<SettleState> {
  return async () => {
    const state = await page.settleState();
    const met =
      state.readyState === "complete" &&
      state.htmxBusy === 0 &&
      state.runningAnimations === 0 &&
      state.quietForMs >= quietMs;
    return { met, observed: state };
  };
}

/** Every listed out-of-band target is in the document and nothing is mid-swap. */
export function fragmentsApplied(
  page: PageDriver,
  selectors: readonly string[],
): Condition<{ missing: string[]; htmxBusy: number }> {
  return async () => {
    const missing: string[] = [];
    for (const selector of selectors) {
      const matches = await page.locate(selector);
      if (matches.length === 0) missing.push(selector);
    }
    const { htmxBusy } = await page.settleState();
    return { met: missing.length === 0 && htmxBusy === 0, observed: { missing, htmxBusy } };
  };
}

export interface SettleOptions {
  quietMs?: number;
  /** Out-of-band targets that must be applied as well. */
  fragments?: readonly string[];
  policy?: PollPolicy;
  signal?: AbortSignal;
}

/**
 * Wait for the page to settle after an action. Throws WAIT_TIMEOUT with the
 * last observed settle state when the policy runs out.
 */
export async function waitForSettle(page: PageDriver, opts: SettleOptions = {}): Promise<void> {
  const policy = opts.policy ?? definePolicy();
  const quiet = settled(page, opts.quietMs);
  const fragments = opts.fragments?.length ? fragmentsApplied(page, opts.fragments) : null;

  const outcome = await awaitCondition<unknown>(
    async () => {
      const base = await quiet();
      if (typeof base === "boolean" || !base.met || !fragments) return base;
      return fragments();
    },
    policy,
    { signal: opts.signal },
  );
  if (outcome.status !== "ok") {
    throw timeoutError("page settle", outcome);
  }
}
