import { describe, it, expect } from "vitest";
import {
  awaitCondition,
  backoffDelay,
  definePolicy,
  timeoutError,
  withRetry,
} from "../../src/actions/poll.js";
import { HarnessError } from "../../src/errors.js";

const fast = definePolicy({ initialDelayMs: 5, maxDelayMs: 20, stopAfterMs: 200 });

describe("definePolicy", () => {
  it("fills the defaults", () => {
    expect(definePolicy()).toEqual({
      initialDelayMs: 50,
      backoffMultiplier: 2,
      maxDelayMs: 1000,
      stopAfterMs: 5000,
    });
  });

  it("drops the default duration when only attempts are bounded", () => {
    expect(definePolicy({ stopAfterAttempts: 3 })).toEqual({
      initialDelayMs: 50,
      backoffMultiplier: 2,
      maxDelayMs: 1000,
      stopAfterAttempts: 3,
    });
  });

  it("rejects a max delay below the initial delay", () => {
    expect(() => definePolicy({ initialDelayMs: 500, maxDelayMs: 100 })).toThrow(
      "Invalid poll policy: maxDelayMs must be >= initialDelayMs",
    );
  });

  it("reports CONFIG_INVALID", () => {
    let caught: unknown;
    try {
      definePolicy({ backoffMultiplier: 0.5 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(HarnessError);
    expect(caught).toMatchObject({ code: "CONFIG_INVALID" });
  });
});

describe("backoffDelay", () => {
  const policy = definePolicy();

  it("grows exponentially from the initial delay", () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(policy, n))).toEqual([50, 100, 200, 400]);
  });

  it("is capped at the max delay", () => {
    expect(backoffDelay(policy, 6)).toBe(1000);
    expect(backoffDelay(policy, 20)).toBe(1000);
  });
});

describe("awaitCondition", () => {
  it("returns on the first true evaluation", async () => {
    const outcome = await awaitCondition(() => true, fast);
    expect(outcome.status).toBe("ok");
    expect(outcome.attempts).toBe(1);
  });

  it("keeps the observed value of the successful attempt", async () => {
    let calls = 0;
    const outcome = await awaitCondition(() => {
      calls++;
      return { met: calls === 3, observed: calls };
    }, fast);
    expect(outcome).toMatchObject({ status: "ok", attempts: 3, observed: 3 });
  });

  it("stays within the duration bound plus one backoff step", async () => {
    const policy = definePolicy({ initialDelayMs: 20, maxDelayMs: 50, stopAfterMs: 200 });
    const start = Date.now();
    const outcome = await awaitCondition(() => ({ met: false, observed: "still loading" }), policy);
    const elapsed = Date.now() - start;

    expect(outcome.status).toBe("timedOut");
    expect(outcome).toMatchObject({ reason: "duration", observed: "still loading" });
    expect(elapsed).toBeLessThan(200 + 50 + 100);
  });

  it("stops after the attempt bound", async () => {
    let calls = 0;
    const outcome = await awaitCondition(
      () => {
        calls++;
        return false;
      },
      definePolicy({ initialDelayMs: 1, maxDelayMs: 2, stopAfterAttempts: 3 }),
    );
    expect(outcome).toMatchObject({ status: "timedOut", reason: "attempts", attempts: 3 });
    expect(calls).toBe(3);
  });

  it("lets the first bound to trigger win", async () => {
    const outcome = await awaitCondition(
      () => false,
      definePolicy({ initialDelayMs: 1, maxDelayMs: 1, stopAfterAttempts: 2, stopAfterMs: 5000 }),
    );
    expect(outcome).toMatchObject({ status: "timedOut", reason: "attempts", attempts: 2 });
  });

  it("propagates a throwing condition without retrying", async () => {
    let calls = 0;
    const boom = new Error("selector syntax");
    await expect(
      awaitCondition(() => {
        calls++;
        throw boom;
      }, fast),
    ).rejects.toBe(boom);
    expect(calls).toBe(1);
  });

  it("counts an evaluation still pending at the deadline as not met", async () => {
    const policy = definePolicy({ initialDelayMs: 10, maxDelayMs: 10, stopAfterMs: 100 });
    const start = Date.now();
    const outcome = await awaitCondition(
      () => new Promise<boolean>((resolve) => setTimeout(() => resolve(true), 500)),
      policy,
    );
    expect(outcome.status).toBe("timedOut");
    expect(Date.now() - start).toBeLessThan(400);
  });

  it("exits promptly when cancelled mid-sleep", async () => {
    const controller = new AbortController();
    const policy = definePolicy({ initialDelayMs: 1000, maxDelayMs: 1000, stopAfterMs: 10000 });
    setTimeout(() => controller.abort(), 30);

    const start = Date.now();
    const outcome = await awaitCondition(() => false, policy, { signal: controller.signal });

    expect(outcome).toMatchObject({ status: "cancelled", attempts: 1 });
    expect(Date.now() - start).toBeLessThan(500);
  });

  it("does not evaluate when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;
    const outcome = await awaitCondition(
      () => {
        calls++;
        return true;
      },
      fast,
      { signal: controller.signal },
    );
    expect(outcome).toMatchObject({ status: "cancelled", attempts: 0 });
    expect(calls).toBe(0);
  });
});

describe("withRetry", () => {
  const policy = definePolicy({ initialDelayMs: 2, maxDelayMs: 5, stopAfterAttempts: 5 });

  it("retries transient failures until the action succeeds", async () => {
    let calls = 0;
    const retries: number[] = [];
    const value = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error("ECONNREFUSED");
        return "up";
      },
      policy,
      { retryIf: () => true, onRetry: (_err, attempt) => retries.push(attempt) },
    );
    expect(value).toBe("up");
    expect(calls).toBe(3);
    expect(retries).toEqual([1, 2]);
  });

  it("rethrows a non-transient failure at once", async () => {
    let calls = 0;
    const fatal = new Error("bad request");
    await expect(
      withRetry(
        async () => {
          calls++;
          throw fatal;
        },
        policy,
        { retryIf: (err) => err !== fatal },
      ),
    ).rejects.toBe(fatal);
    expect(calls).toBe(1);
  });

  it("rethrows the last error when attempts run out", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error(`attempt ${calls}`);
        },
        definePolicy({ initialDelayMs: 1, maxDelayMs: 1, stopAfterAttempts: 3 }),
        { retryIf: () => true },
      ),
    ).rejects.toThrow("attempt 3");
    expect(calls).toBe(3);
  });
});

describe("timeoutError", () => {
  it("carries the last observation", () => {
    const err = timeoutError("page settle", {
      status: "timedOut",
      reason: "attempts",
      attempts: 2,
      elapsedMs: 10,
      observed: { htmxBusy: 1 },
    });
    expect(err.code).toBe("WAIT_TIMEOUT");
    expect(err.message).toBe('page settle not met after 2 attempt(s) in 10ms; last observed: {"htmxBusy":1}');
    expect(err.observed).toEqual({ htmxBusy: 1 });
  });

  it("says when the wait was cancelled", () => {
    const err = timeoutError("resolve button", { status: "cancelled", attempts: 1, elapsedMs: 3 });
    expect(err.message).toBe("resolve button cancelled after 1 attempt(s) in 3ms");
  });
});
