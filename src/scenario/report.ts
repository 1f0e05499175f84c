import type { ScenarioResult, SuiteReport } from "../types.js";

const LABEL: Record<ScenarioResult["status"], string> = {
  passed: "PASS",
  failed: "FAIL",
  errored: "ERROR",
};

export function resultTitle(result: ScenarioResult): string {
  return [result.scenario, result.row, result.viewport].filter(Boolean).join(" / ");
}

export function formatResult(result: ScenarioResult): string {
  const lines = [`${LABEL[result.status]} ${resultTitle(result)} (${result.durationMs}ms)`];
  if (result.status === "passed") return lines[0];

  const failedStep = result.steps.find((s) => !s.ok);
  if (failedStep) lines.push(`  at step ${failedStep.index + 1}: ${failedStep.description}`);
  for (const f of result.failures) {
    lines.push(`  ${f.probe}: expected ${f.expected}, got ${f.actual}`);
  }
  if (result.error && result.failures.length === 0) {
    lines.push(`  ${result.error.code}: ${result.error.message}`);
  }
  for (const a of result.artifacts) {
    if (a.path) lines.push(`  ${a.kind}: ${a.path}`);
    else if (a.kind === "url" || a.kind === "note") lines.push(`  ${a.kind}: ${a.inline ?? ""}`);
  }
  return lines.join("\n");
}

export function formatReport(report: SuiteReport): string {
  const lines = report.results.map(formatResult);
  lines.push(
    "",
    `${report.total} run(s): ${report.passed} passed, ${report.failed} failed, ${report.errored} errored in ${report.durationMs}ms`,
  );
  return lines.join("\n");
}

/** 0 when everything passed, 2 when anything errored, 1 otherwise. */
export function exitCodeFor(report: SuiteReport): number {
  if (report.errored > 0) return 2;
  if (report.failed > 0) return 1;
  return 0;
}
