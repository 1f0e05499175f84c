import { HarnessError, errorMessage, isInfrastructure, toErrorDetail } from "../errors.js";
import { awaitCondition, definePolicy, timeoutError, withRetry } from "../actions/poll.js";
import { waitForSettle } from "../actions/stability.js";
import { classifyViewport, MOBILE_BREAKPOINT, resolveWhenReady, visibleCount } from "../state/resolver.js";
import { captureSnapshot } from "../state/snapshot.js";
import { checkExpectations, checkValues, diffSnapshots, tolerancesOf } from "../state/differ.js";
import { mergeProbes } from "../state/probes.js";
import type {
  Artifact,
  AssertionFailure,
  ContextFactory,
  ErrorDetail,
  PageDriver,
  PollPolicy,
  ProbeSpec,
  ScenarioResult,
  StateSnapshot,
  StepRecord,
  SuiteReport,
  ViewportClass,
  ViewportSize,
} from "../types.js";
import { captureDiagnostics } from "./artifacts.js";
import { RunState } from "./state.js";
import { describeStep, type Scenario, type ScenarioContext, type Step } from "./steps.js";

export const DESKTOP_VIEWPORT: ViewportSize = { width: 1400, height: 900 };
export const MOBILE_VIEWPORT: ViewportSize = { width: 390, height: 844 };
export const NAVIGATION_TIMEOUT_MS = 10000;

export interface RunnerOptions {
  baseUrl: string;
  /** Opens a fresh, isolated browser context per run. */
  openContext: ContextFactory;
  sizes?: Partial<Record<ViewportClass, ViewportSize>>;
  breakpoint?: number;
  /** Where failure artifacts are written; kept inline when unset. */
  artifactsDir?: string;
  navigationTimeoutMs?: number;
  /** Default policy for waits that do not bring their own. */
  policy?: PollPolicy;
  signal?: AbortSignal;
}

export interface ReplayOptions<Row> {
  viewports?: readonly ViewportClass[];
  rows?: readonly Row[];
  concurrency?: number;
}

// Per-run mutable state. Snapshots live only until the run ends.
interface RunScratch {
  page: PageDriver;
  ctx: ScenarioContext;
  snapshots: Map<string, StateSnapshot>;
  probesUsed: ProbeSpec[];
}

async function mapPool<T, R>(items: readonly T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;
  const worker = async () => {
    while (next < items.length) {
      const i = next++;
      results[i] = await fn(items[i]);
    }
  };
  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
  await Promise.all(workers);
  return results;
}

function snapshotOrThrow(scratch: RunScratch, label: string): StateSnapshot {
  const snap = scratch.snapshots.get(label);
  if (!snap) throw new HarnessError("CONFIG_INVALID", `No snapshot labelled "${label}" taken yet`);
  return snap;
}

function assertionError(description: string, failures: AssertionFailure[]): HarnessError {
  const summary = failures.map((f) => `${f.probe}: expected ${f.expected}, got ${f.actual}`).join("; ");
  return new HarnessError("ASSERTION_FAILED", `${description}: ${summary}`, { failures });
}

/**
 * Runs scenarios step by step against fresh browser contexts and turns every
 * outcome into a ScenarioResult. Failures never escape as exceptions.
 */
export class ScenarioRunner {
  private readonly sizes: Record<ViewportClass, ViewportSize>;
  private readonly policy: PollPolicy;

  constructor(private readonly opts: RunnerOptions) {
    this.sizes = { desktop: DESKTOP_VIEWPORT, mobile: MOBILE_VIEWPORT, ...opts.sizes };
    this.policy = opts.policy ?? definePolicy();
    for (const viewport of ["desktop", "mobile"] as const) {
      const actual = classifyViewport(this.sizes[viewport].width, this.breakpoint);
      if (actual !== viewport) {
        throw new HarnessError(
          "CONFIG_INVALID",
          `${viewport} size ${this.sizes[viewport].width}px classifies as ${actual} (breakpoint ${this.breakpoint}px)`,
        );
      }
    }
  }

  private get breakpoint(): number {
    return this.opts.breakpoint ?? MOBILE_BREAKPOINT;
  }

  async run<Row>(scenario: Scenario<Row>, viewport: ViewportClass, row: Row): Promise<ScenarioResult> {
    const start = Date.now();
    const state = new RunState();
    const rowLabel = scenario.rowLabel(row);
    const title = [scenario.name, rowLabel, viewport].filter(Boolean).join(" / ");
    const steps: StepRecord[] = [];
    const artifacts: Artifact[] = [];
    let failures: readonly AssertionFailure[] = [];
    let error: ErrorDetail | undefined;
    let page: PageDriver | null = null;
    let probesUsed: ProbeSpec[] = [];

    state.transition("running");
    try {
      if (this.opts.signal?.aborted) {
        throw new HarnessError("CANCELLED", "aborted before the run started");
      }
      page = await this.opts.openContext();
      await page.setViewport(this.sizes[viewport]);

      const ctx: ScenarioContext = { viewport, baseUrl: this.opts.baseUrl, sizes: this.sizes };
      const scratch: RunScratch = { page, ctx, snapshots: new Map(), probesUsed: [] };
      const plan = scenario.body(ctx, row);

      for (const [index, step] of plan.entries()) {
        const description = describeStep(step);
        const stepStart = Date.now();
        try {
          await this.execute(step, scratch);
          steps.push({ index, description, ok: true, timingMs: Date.now() - stepStart });
        } catch (err) {
          steps.push({ index, description, ok: false, timingMs: Date.now() - stepStart });
          throw err;
        } finally {
          probesUsed = scratch.probesUsed;
        }
      }
      state.transition("passed");
    } catch (err) {
      error = toErrorDetail(err);
      if (err instanceof HarnessError) failures = err.failures;
      const infrastructure =
        !(err instanceof HarnessError) ||
        isInfrastructure(err.code) ||
        err.code === "CANCELLED" ||
        this.opts.signal?.aborted;
      state.transition(infrastructure ? "errored" : "failed");
      console.error(`[settlecheck] ${title}: ${error.code} ${error.message}`);

      if (page) {
        const probes = mergeProbes(probesUsed, scenario.diagnostics ?? []);
        artifacts.push(
          ...(await captureDiagnostics(page, probes, { dir: this.opts.artifactsDir, baseName: title })),
        );
      }
    } finally {
      if (page) {
        try {
          await page.close();
        } catch (err) {
          console.error(`[settlecheck] ${title}: closing context failed: ${errorMessage(err)}`);
          artifacts.push({ kind: "note", label: "teardown", inline: `close failed: ${errorMessage(err)}` });
        }
      }
    }

    const status = state.status;
    if (status !== "passed" && status !== "failed" && status !== "errored") {
      throw new Error(`Scenario ${title} ended in non-terminal state ${status}`);
    }
    return Object.freeze({
      scenario: scenario.name,
      viewport,
      row: rowLabel,
      status,
      failures: Object.freeze([...failures]),
      artifacts: Object.freeze(artifacts),
      steps: Object.freeze(steps),
      error,
      durationMs: Date.now() - start,
    });
  }

  /** Run the cross-product viewport × row, each in its own context. */
  async replay<Row>(scenario: Scenario<Row>, opts: ReplayOptions<Row> = {}): Promise<ScenarioResult[]> {
    const viewports = opts.viewports ?? scenario.viewports ?? (["desktop", "mobile"] as const);
    const rows = opts.rows ?? scenario.rows;
    const jobs = viewports.flatMap((viewport) => rows.map((row) => ({ viewport, row })));
    return mapPool(jobs, opts.concurrency ?? 1, ({ viewport, row }) => this.run(scenario, viewport, row));
  }

  async runSuite(
    scenarios: ReadonlyArray<Scenario<unknown>>,
    opts: { viewports?: readonly ViewportClass[]; concurrency?: number } = {},
  ): Promise<SuiteReport> {
    const start = Date.now();
    const jobs = scenarios.flatMap((s) => {
      const viewports = (s.viewports ?? ["desktop", "mobile"]).filter(
        (v) => !opts.viewports || opts.viewports.includes(v),
      );
      return viewports.flatMap((viewport) => s.rows.map((row) => ({ scenario: s, viewport, row })));
    });
    const results = await mapPool(jobs, opts.concurrency ?? 1, (job) => this.run(job.scenario, job.viewport, job.row));
    return {
      total: results.length,
      passed: results.filter((r) => r.status === "passed").length,
      failed: results.filter((r) => r.status === "failed").length,
      errored: results.filter((r) => r.status === "errored").length,
      results,
      durationMs: Date.now() - start,
    };
  }

  private async execute(step: Step, scratch: RunScratch): Promise<void> {
    const { page, ctx } = scratch;
    const signal = this.opts.signal;

    switch (step.kind) {
      case "navigate": {
        const url = new URL(step.path, this.opts.baseUrl).toString();
        const timeoutMs = step.timeoutMs ?? this.opts.navigationTimeoutMs ?? NAVIGATION_TIMEOUT_MS;
        await withRetry(
          () => page.navigate(url, timeoutMs),
          definePolicy({ initialDelayMs: 500, maxDelayMs: 2000, stopAfterAttempts: 3 }),
          {
            retryIf: (err) => err instanceof HarnessError && err.code === "NAVIGATION_TIMEOUT",
            signal,
            onRetry: (err, attempt) => console.error(`[settlecheck] retry ${attempt} of ${url}: ${errorMessage(err)}`),
          },
        );
        await waitForSettle(page, { policy: this.policy, signal });
        return;
      }

      case "setViewport": {
        await page.setViewport(ctx.sizes[step.viewport]);
        await waitForSettle(page, { policy: this.policy, signal });
        const { width } = await page.getViewport();
        const actual = classifyViewport(width, this.breakpoint);
        if (actual !== step.viewport) {
          throw assertionError(describeStep(step), [
            { probe: "viewport class", expected: step.viewport, actual: `${actual} (${width}px)` },
          ]);
        }
        ctx.viewport = step.viewport;
        return;
      }

      case "fill": {
        const handle = await resolveWhenReady(page, step.element, ctx.viewport, { policy: this.policy, signal });
        await page.fill(handle.domPath, step.value);
        return;
      }

      case "click": {
        const handle = await resolveWhenReady(page, step.element, ctx.viewport, { policy: this.policy, signal });
        await page.click(handle.domPath);
        await waitForSettle(page, { fragments: step.fragments, policy: this.policy, signal });
        return;
      }

      case "scroll": {
        await page.scrollTo(step.selector, step.top);
        await waitForSettle(page, { policy: this.policy, signal });
        return;
      }

      case "snapshot": {
        scratch.snapshots.set(step.label, await captureSnapshot(page, step.probes, step.label));
        scratch.probesUsed = mergeProbes(scratch.probesUsed, step.probes);
        return;
      }

      case "assertDiff": {
        const before = snapshotOrThrow(scratch, step.before);
        const after = snapshotOrThrow(scratch, step.after);
        const failures = checkExpectations(diffSnapshots(before, after), step.expect, tolerancesOf(after));
        if (failures.length > 0) throw assertionError(describeStep(step), failures);
        return;
      }

      case "assertSnapshot": {
        const failures = checkValues(snapshotOrThrow(scratch, step.label), step.expect);
        if (failures.length > 0) throw assertionError(describeStep(step), failures);
        return;
      }

      case "assertVisibleCount": {
        const actual = await visibleCount(page, step.element, step.as ?? ctx.viewport);
        if (actual !== step.count) {
          throw assertionError(describeStep(step), [
            { probe: `${step.element.name} visible candidates`, expected: String(step.count), actual: String(actual) },
          ]);
        }
        return;
      }

      case "waitFor": {
        const outcome = await awaitCondition(step.condition(page), step.policy ?? this.policy, { signal });
        if (outcome.status !== "ok") throw timeoutError(step.description, outcome);
        return;
      }

      case "waitForSettle": {
        await waitForSettle(page, { fragments: step.fragments, quietMs: step.quietMs, policy: this.policy, signal });
        return;
      }
    }
  }
}
