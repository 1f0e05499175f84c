// Public API for writing scenarios against other partial-page-update apps.

export * from "./types.js";
export { HarnessError, isInfrastructure, toErrorDetail } from "./errors.js";
export {
  awaitCondition,
  backoffDelay,
  definePolicy,
  HARD_CAP_MS,
  MAX_WAIT_MS,
  timeoutError,
  withRetry,
  type RetryOptions,
} from "./actions/poll.js";
export { fragmentsApplied, htmxIdle, QUIET_MS, settled, waitForSettle, type SettleOptions } from "./actions/stability.js";
export {
  candidatesFor,
  classifyViewport,
  MOBILE_BREAKPOINT,
  resolve,
  resolveWhenReady,
  visibleCount,
} from "./state/resolver.js";
export * as probes from "./state/probes.js";
export { captureSnapshot, snapshotToJson, valueOf } from "./state/snapshot.js";
export {
  changedEntries,
  checkExpectations,
  checkValues,
  DEFAULT_TOLERANCE,
  diffSnapshots,
  formatValue,
  isAbsent,
  sameValue,
} from "./state/differ.js";
export * as steps from "./scenario/steps.js";
export { scenario, tableScenario, type Scenario, type ScenarioContext, type Step } from "./scenario/steps.js";
export { RunState, isTerminal } from "./scenario/state.js";
export { captureDiagnostics } from "./scenario/artifacts.js";
export {
  DESKTOP_VIEWPORT,
  MOBILE_VIEWPORT,
  ScenarioRunner,
  type ReplayOptions,
  type RunnerOptions,
} from "./scenario/runner.js";
export { exitCodeFor, formatReport, formatResult } from "./scenario/report.js";
export { BrowserSession, type CdpBrowser, type LaunchOptions, type TargetConnector } from "./cdp/client.js";
export { CdpPage, type CdpTarget } from "./cdp/page.js";
export { waitForServer } from "./server.js";
export { parseConfig, type HarnessConfig } from "./config.js";
