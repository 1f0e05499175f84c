import { HarnessError, errorMessage } from "./errors.js";
import { definePolicy, withRetry } from "./actions/poll.js";
import type { PollPolicy } from "./types.js";

export type Fetcher = (url: string) => Promise<{ ok: boolean; status: number }>;

const READINESS_POLICY = definePolicy({ initialDelayMs: 250, maxDelayMs: 2000, stopAfterMs: 30000 });

class NotReady extends Error {}

/**
 * Wait until the server under test answers `GET /` without a 5xx. Connection
 * refusals and server errors are retried; exhaustion is SERVER_UNREACHABLE.
 */
export async function waitForServer(
  baseUrl: string,
  opts: { policy?: PollPolicy; signal?: AbortSignal; fetcher?: Fetcher } = {},
): Promise<void> {
  const fetcher: Fetcher = opts.fetcher ?? ((url) => fetch(url, { signal: opts.signal }));
  const url = new URL("/", baseUrl).toString();

  try {
    await withRetry(
      async () => {
        const res = await fetcher(url);
        if (res.status >= 500) throw new NotReady(`HTTP ${res.status}`);
      },
      opts.policy ?? READINESS_POLICY,
      {
        retryIf: () => !opts.signal?.aborted,
        signal: opts.signal,
        onRetry: (err, attempt) =>
          console.error(`[settlecheck] ${url} not ready (attempt ${attempt}): ${errorMessage(err)}`),
      },
    );
  } catch (err) {
    throw new HarnessError("SERVER_UNREACHABLE", `${url} unreachable: ${errorMessage(err)}`, { cause: err });
  }
}
