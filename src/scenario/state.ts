import type { ScenarioStatus } from "../types.js";

const TRANSITIONS: Record<ScenarioStatus, readonly ScenarioStatus[]> = {
  pending: ["running"],
  running: ["passed", "failed", "errored"],
  passed: [],
  failed: [],
  errored: [],
};

export function isTerminal(status: ScenarioStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/** Lifecycle of one scenario run: pending -> running -> passed | failed | errored. */
export class RunState {
  private current: ScenarioStatus = "pending";

  get status(): ScenarioStatus {
    return this.current;
  }

  transition(to: ScenarioStatus): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new Error(`Illegal scenario transition ${this.current} -> ${to}`);
    }
    this.current = to;
  }
}
