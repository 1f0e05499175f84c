import type { AssertionFailure, ErrorCode, ErrorDetail } from "./types.js";

const INFRASTRUCTURE_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "CDP_DISCONNECTED",
  "PAGE_CRASHED",
  "BROWSER_LAUNCH_FAILED",
  "NAVIGATION_FAILED",
  "NAVIGATION_TIMEOUT",
  "SERVER_UNREACHABLE",
]);

export class HarnessError extends Error {
  readonly code: ErrorCode;
  readonly failures: readonly AssertionFailure[];
  readonly observed: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    opts: { failures?: readonly AssertionFailure[]; observed?: unknown; cause?: unknown } = {},
  ) {
    super(message, { cause: opts.cause });
    this.name = "HarnessError";
    this.code = code;
    this.failures = opts.failures ?? [];
    this.observed = opts.observed;
  }

  detail(): ErrorDetail {
    return { code: this.code, message: this.message };
  }
}

export function isInfrastructure(code: ErrorCode): boolean {
  return INFRASTRUCTURE_CODES.has(code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Anything that is not a HarnessError was thrown by a condition or a
 * scenario body, not by the browser: it keeps its own name and message.
 */
export function toErrorDetail(err: unknown): ErrorDetail {
  if (err instanceof HarnessError) return err.detail();
  const name = err instanceof Error ? err.name : typeof err;
  return { code: "UNEXPECTED_ERROR", message: `${name}: ${errorMessage(err)}` };
}
