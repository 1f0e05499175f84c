import type {
  Condition,
  Expectation,
  LogicalElement,
  PageDriver,
  PollPolicy,
  ProbeSpec,
  ViewportClass,
  ViewportSize,
} from "../types.js";
import { captureSnapshot } from "../state/snapshot.js";
import { checkValues } from "../state/differ.js";

export interface ScenarioContext {
  viewport: ViewportClass;
  baseUrl: string;
  sizes: Readonly<Record<ViewportClass, ViewportSize>>;
}

export type Step =
  | { kind: "navigate"; path: string; timeoutMs?: number }
  | { kind: "setViewport"; viewport: ViewportClass }
  | { kind: "fill"; element: LogicalElement; value: string }
  | { kind: "click"; element: LogicalElement; fragments?: readonly string[] }
  | { kind: "scroll"; selector: string; top: number }
  | { kind: "snapshot"; label: string; probes: readonly ProbeSpec[] }
  | { kind: "assertDiff"; before: string; after: string; expect: Readonly<Record<string, Expectation>> }
  | { kind: "assertSnapshot"; label: string; expect: Readonly<Record<string, Expectation>> }
  | { kind: "assertVisibleCount"; element: LogicalElement; as?: ViewportClass; count: number }
  | {
      kind: "waitFor";
      description: string;
      condition: (page: PageDriver) => Condition;
      policy?: PollPolicy;
    }
  | { kind: "waitForSettle"; fragments?: readonly string[]; quietMs?: number };

export interface Scenario<Row = null> {
  name: string;
  rows: readonly Row[];
  viewports?: readonly ViewportClass[];
  /** Probes captured into the failure snapshot on top of those the steps used. */
  diagnostics?: readonly ProbeSpec[];
  rowLabel(row: Row): string | undefined;
  body(ctx: ScenarioContext, row: Row): Step[];
}

interface ScenarioOptions {
  viewports?: readonly ViewportClass[];
  diagnostics?: readonly ProbeSpec[];
}

/** A scenario with no input table. */
export function scenario(
  name: string,
  body: (ctx: ScenarioContext) => Step[],
  opts: ScenarioOptions = {},
): Scenario {
  return { name, rows: [null], rowLabel: () => undefined, body: (ctx) => body(ctx), ...opts };
}

/** A scenario replayed once per row, on every viewport. */
export function tableScenario<Row>(
  name: string,
  rows: readonly Row[],
  rowLabel: (row: Row) => string,
  body: (ctx: ScenarioContext, row: Row) => Step[],
  opts: ScenarioOptions = {},
): Scenario<Row> {
  return { name, rows, rowLabel, body, ...opts };
}

export const navigate = (path: string, timeoutMs?: number): Step => ({ kind: "navigate", path, timeoutMs });

export const setViewport = (viewport: ViewportClass): Step => ({ kind: "setViewport", viewport });

export const fill = (element: LogicalElement, value: string): Step => ({ kind: "fill", element, value });

export const click = (element: LogicalElement, fragments?: readonly string[]): Step => ({
  kind: "click",
  element,
  fragments,
});

export const scroll = (selector: string, top: number): Step => ({ kind: "scroll", selector, top });

export const snapshot = (label: string, probes: readonly ProbeSpec[]): Step => ({ kind: "snapshot", label, probes });

export const assertDiff = (
  before: string,
  after: string,
  expect: Readonly<Record<string, Expectation>>,
): Step => ({ kind: "assertDiff", before, after, expect });

export const assertSnapshot = (label: string, expect: Readonly<Record<string, Expectation>>): Step => ({
  kind: "assertSnapshot",
  label,
  expect,
});

export const assertVisibleCount = (element: LogicalElement, count: number, as?: ViewportClass): Step => ({
  kind: "assertVisibleCount",
  element,
  count,
  as,
});

export const waitFor = (
  description: string,
  condition: (page: PageDriver) => Condition,
  policy?: PollPolicy,
): Step => ({ kind: "waitFor", description, condition, policy });

export const waitForSettle = (fragments?: readonly string[], quietMs?: number): Step => ({
  kind: "waitForSettle",
  fragments,
  quietMs,
});

/** Wait until one probe's value meets an expectation; the last value is the diagnostic. */
export function waitForValue(probe: ProbeSpec, expectation: Expectation, policy?: PollPolicy): Step {
  return waitFor(
    `${probe.name} ${JSON.stringify(expectation)}`,
    (page) => async () => {
      const snap = await captureSnapshot(page, [probe], `wait:${probe.name}`);
      return { met: checkValues(snap, { [probe.name]: expectation }).length === 0, observed: snap.entries[0].value };
    },
    policy,
  );
}

export function describeStep(step: Step): string {
  switch (step.kind) {
    case "navigate":
      return `navigate ${step.path}`;
    case "setViewport":
      return `set viewport ${step.viewport}`;
    case "fill":
      return `fill ${step.element.name} ${JSON.stringify(step.value)}`;
    case "click":
      return `click ${step.element.name}`;
    case "scroll":
      return `scroll ${step.selector} to ${step.top}`;
    case "snapshot":
      return `snapshot ${step.label}`;
    case "assertDiff":
      return `assert diff ${step.before} -> ${step.after}`;
    case "assertSnapshot":
      return `assert ${step.label}`;
    case "assertVisibleCount":
      return `assert ${step.count} visible ${step.element.name}${step.as ? ` (${step.as} candidates)` : ""}`;
    case "waitFor":
      return `wait for ${step.description}`;
    case "waitForSettle":
      return step.fragments?.length ? `wait for settle + ${step.fragments.join(", ")}` : "wait for settle";
  }
}
