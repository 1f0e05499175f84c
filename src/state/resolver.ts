import { HarnessError } from "../errors.js";
import { awaitCondition, definePolicy, timeoutError } from "../actions/poll.js";
import type {
  CandidateSelector,
  ElementHandle,
  LogicalElement,
  PageDriver,
  PollPolicy,
  ViewportClass,
} from "../types.js";

export const MOBILE_BREAKPOINT = 1024;

export function classifyViewport(width: number, breakpoint = MOBILE_BREAKPOINT): ViewportClass {
  return width < breakpoint ? "mobile" : "desktop";
}

export function candidatesFor(logical: LogicalElement, viewport: ViewportClass): CandidateSelector[] {
  return logical.candidates.filter((c) => c.viewports.includes(viewport));
}

interface VisibleMatch {
  selector: string;
  domPath: string;
}

// Collects the visible elements across all candidates for a viewport. Two
// candidates hitting the same element count once.
async function visibleMatches(
  page: PageDriver,
  logical: LogicalElement,
  viewport: ViewportClass,
): Promise<VisibleMatch[]> {
  const byPath = new Map<string, VisibleMatch>();
  for (const candidate of candidatesFor(logical, viewport)) {
    const matches = await page.locate(candidate.selector);
    for (const match of matches) {
      if (!match.visible || byPath.has(match.domPath)) continue;
      byPath.set(match.domPath, { selector: candidate.selector, domPath: match.domPath });
    }
  }
  return [...byPath.values()];
}

export async function visibleCount(
  page: PageDriver,
  logical: LogicalElement,
  viewport: ViewportClass,
): Promise<number> {
  return (await visibleMatches(page, logical, viewport)).length;
}

/**
 * Resolve a logical element to its one visible implementation.
 * Zero visible matches throw ELEMENT_NOT_READY, more than one AMBIGUOUS_STATE.
 */
export async function resolve(
  page: PageDriver,
  logical: LogicalElement,
  viewport: ViewportClass,
): Promise<ElementHandle> {
  if (candidatesFor(logical, viewport).length === 0) {
    throw new HarnessError("CONFIG_INVALID", `${logical.name} has no candidate for ${viewport}`);
  }

  const matches = await visibleMatches(page, logical, viewport);
  if (matches.length === 0) {
    throw new HarnessError("ELEMENT_NOT_READY", `${logical.name}: no visible candidate on ${viewport}`, {
      observed: 0,
    });
  }
  if (matches.length > 1) {
    const where = matches.map((m) => `${m.selector} (${m.domPath})`).join(", ");
    throw new HarnessError(
      "AMBIGUOUS_STATE",
      `${logical.name}: ${matches.length} visible candidates on ${viewport}: ${where}`,
      { observed: matches.length },
    );
  }
  return { logical: logical.name, ...matches[0] };
}

/**
 * Resolve, retrying while the element is not ready yet. Ambiguity and any
 * other error end the wait immediately.
 */
export async function resolveWhenReady(
  page: PageDriver,
  logical: LogicalElement,
  viewport: ViewportClass,
  opts: { policy?: PollPolicy; signal?: AbortSignal } = {},
): Promise<ElementHandle> {
  const outcome = await awaitCondition<{ visible: number; handle?: ElementHandle }>(
    async () => {
      try {
        return { met: true, observed: { visible: 1, handle: await resolve(page, logical, viewport) } };
      } catch (err) {
        if (err instanceof HarnessError && err.code === "ELEMENT_NOT_READY") {
          return { met: false, observed: { visible: 0 } };
        }
        throw err;
      }
    },
    opts.policy ?? definePolicy(),
    { signal: opts.signal },
  );

  const handle = outcome.status === "ok" ? outcome.observed?.handle : undefined;
  if (!handle) {
    throw timeoutError(`resolve ${logical.name} on ${viewport}`, outcome);
  }
  return handle;
}
