// Error codes. Infrastructure codes, UNEXPECTED_ERROR (something other than
// the harness threw) and CANCELLED end a scenario as "errored", everything
// else as "failed".
export type ErrorCode =
  | "ELEMENT_NOT_READY"
  | "AMBIGUOUS_STATE"
  | "ASSERTION_FAILED"
  | "WAIT_TIMEOUT"
  | "SCRIPT_ERROR"
  | "UNEXPECTED_ERROR"
  | "CANCELLED"
  | "CONFIG_INVALID"
  | "CDP_DISCONNECTED"
  | "PAGE_CRASHED"
  | "BROWSER_LAUNCH_FAILED"
  | "NAVIGATION_FAILED"
  | "NAVIGATION_TIMEOUT"
  | "SERVER_UNREACHABLE";

export interface ErrorDetail {
  code: ErrorCode;
  message: string;
}

// Polling

export interface PollPolicy {
  initialDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
  stopAfterAttempts?: number;
  stopAfterMs?: number;
}

export interface Observation<T> {
  met: boolean;
  observed: T;
}

export type ConditionResult<T = unknown> = boolean | Observation<T>;

/** Pure check of current state. Re-evaluated on every poll. */
export type Condition<T = unknown> = () => Promise<ConditionResult<T>> | ConditionResult<T>;

export type PollOutcome<T = unknown> =
  | { status: "ok"; attempts: number; elapsedMs: number; observed?: T }
  | { status: "timedOut"; attempts: number; elapsedMs: number; observed?: T; reason: "attempts" | "duration" }
  | { status: "cancelled"; attempts: number; elapsedMs: number; observed?: T };

// Viewports and elements

export type ViewportClass = "mobile" | "desktop";

export interface ViewportSize {
  width: number;
  height: number;
}

export interface CandidateSelector {
  selector: string;
  viewports: readonly ViewportClass[];
}

export interface LogicalElement {
  name: string;
  candidates: readonly CandidateSelector[];
}

/** One element matched by a selector, as reported by the page. */
export interface ElementMatch {
  domPath: string;
  visible: boolean;
}

export interface ElementHandle {
  logical: string;
  selector: string;
  domPath: string;
}

// Probes and snapshots

export type ProbeKind =
  | "visible"
  | "classList"
  | "hasClass"
  | "scrollTop"
  | "style"
  | "attribute"
  | "count"
  | "text"
  | "height"
  | "top";

export interface ProbeSpec {
  name: string;
  kind: ProbeKind;
  selector: string;
  /** CSS property for "style", attribute name for "attribute", class for "hasClass". */
  property?: string;
  /** Numeric comparison tolerance; defaults to 1. */
  tolerance?: number;
}

export const ABSENT = Object.freeze({ absent: true as const });
export type Absent = typeof ABSENT;

export type ProbeValue = boolean | number | string | Absent;

export interface RawProbeResult {
  present: boolean;
  value: boolean | number | string | null;
}

export interface SnapshotEntry {
  readonly probe: ProbeSpec;
  readonly value: ProbeValue;
}

export interface StateSnapshot {
  readonly label: string;
  readonly takenAt: number;
  readonly entries: readonly SnapshotEntry[];
}

export interface DiffEntry {
  probe: string;
  before: ProbeValue;
  after: ProbeValue;
  changed: boolean;
}

export type Expectation =
  | "unchanged"
  | "changed"
  | { from?: ProbeValue; to?: ProbeValue }
  | { equals: ProbeValue }
  | { contains: string }
  | { within: readonly [number, number] };

export interface AssertionFailure {
  probe: string;
  expected: string;
  actual: string;
}

// Page state used by settle conditions

export interface SettleState {
  readyState: string;
  htmxBusy: number;
  runningAnimations: number;
  quietForMs: number;
}

// Scenario results

export type ScenarioStatus = "pending" | "running" | "passed" | "failed" | "errored";

export type ArtifactKind = "screenshot" | "snapshot" | "url" | "dom" | "note";

export interface Artifact {
  kind: ArtifactKind;
  label: string;
  path?: string;
  inline?: string;
}

export interface StepRecord {
  index: number;
  description: string;
  ok: boolean;
  timingMs: number;
}

export interface ScenarioResult {
  readonly scenario: string;
  readonly viewport: ViewportClass;
  readonly row?: string;
  readonly status: "passed" | "failed" | "errored";
  readonly failures: readonly AssertionFailure[];
  readonly artifacts: readonly Artifact[];
  readonly steps: readonly StepRecord[];
  readonly error?: ErrorDetail;
  readonly durationMs: number;
}

export interface SuiteReport {
  total: number;
  passed: number;
  failed: number;
  errored: number;
  results: ScenarioResult[];
  durationMs: number;
}

// The seam between the harness and a browser page. Every method is bounded:
// implementations fail with a HarnessError instead of hanging.
export interface PageDriver {
  currentUrl(): Promise<string>;
  navigate(url: string, timeoutMs: number): Promise<void>;
  setViewport(size: ViewportSize): Promise<void>;
  getViewport(): Promise<ViewportSize>;
  locate(selector: string): Promise<ElementMatch[]>;
  click(domPath: string): Promise<void>;
  fill(domPath: string, value: string): Promise<void>;
  scrollTo(selector: string, top: number): Promise<number>;
  probe(specs: readonly ProbeSpec[]): Promise<RawProbeResult[]>;
  settleState(): Promise<SettleState>;
  screenshot(): Promise<Uint8Array>;
  html(): Promise<string>;
  /** Releases the page and its browser context. Safe to call twice. */
  close(): Promise<void>;
}

/** Opens a page in a fresh, isolated browser context. */
export type ContextFactory = () => Promise<PageDriver>;
