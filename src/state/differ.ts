import { HarnessError } from "../errors.js";
import { ABSENT } from "../types.js";
import type {
  Absent,
  AssertionFailure,
  DiffEntry,
  Expectation,
  ProbeSpec,
  ProbeValue,
  StateSnapshot,
} from "../types.js";
import { valueOf } from "./snapshot.js";

export const DEFAULT_TOLERANCE = 1;

export function isAbsent(value: ProbeValue): value is Absent {
  return typeof value === "object";
}

export function formatValue(value: ProbeValue): string {
  if (isAbsent(value)) return "<absent>";
  if (typeof value === "string") return JSON.stringify(value);
  return String(value);
}

/** Type-aware equality: numbers within tolerance, everything else exact. */
export function sameValue(a: ProbeValue, b: ProbeValue, tolerance = DEFAULT_TOLERANCE): boolean {
  if (isAbsent(a) || isAbsent(b)) return isAbsent(a) && isAbsent(b);
  if (typeof a === "number" && typeof b === "number") return Math.abs(a - b) <= tolerance;
  return a === b;
}

/**
 * Pairwise comparison by probe name, in `before` order; probes only present in
 * `after` follow in their own order and compare against ABSENT.
 */
export function diffSnapshots(before: StateSnapshot, after: StateSnapshot): DiffEntry[] {
  const afterByName = new Map<string, { probe: ProbeSpec; value: ProbeValue }>();
  for (const entry of after.entries) afterByName.set(entry.probe.name, entry);

  const entries: DiffEntry[] = [];
  for (const { probe, value } of before.entries) {
    const next = afterByName.get(probe.name);
    const afterValue = next ? next.value : ABSENT;
    afterByName.delete(probe.name);
    entries.push({
      probe: probe.name,
      before: value,
      after: afterValue,
      changed: !sameValue(value, afterValue, probe.tolerance),
    });
  }
  for (const { probe, value } of afterByName.values()) {
    entries.push({ probe: probe.name, before: ABSENT, after: value, changed: !isAbsent(value) });
  }
  return entries;
}

export function changedEntries(entries: readonly DiffEntry[]): DiffEntry[] {
  return entries.filter((e) => e.changed);
}

function describeExpectation(expectation: Expectation): string {
  if (expectation === "unchanged" || expectation === "changed") return expectation;
  if ("equals" in expectation) return formatValue(expectation.equals);
  if ("contains" in expectation) return `contains ${JSON.stringify(expectation.contains)}`;
  if ("within" in expectation) return `${expectation.within[0]} ±${expectation.within[1]}`;
  const from = expectation.from === undefined ? "*" : formatValue(expectation.from);
  const to = expectation.to === undefined ? "*" : formatValue(expectation.to);
  return `${from} -> ${to}`;
}

function isTransition(expectation: Expectation): boolean {
  return expectation === "unchanged" || expectation === "changed" || "from" in expectation || "to" in expectation;
}

function checkValue(value: ProbeValue, expectation: Expectation, tolerance?: number): boolean {
  if (expectation === "unchanged" || expectation === "changed") return false;
  if ("equals" in expectation) return sameValue(value, expectation.equals, tolerance);
  if ("contains" in expectation) return typeof value === "string" && value.includes(expectation.contains);
  if ("within" in expectation) {
    const [target, range] = expectation.within;
    return typeof value === "number" && Math.abs(value - target) <= range;
  }
  return false;
}

/**
 * Judge diff entries against expectations keyed by probe name. An expectation
 * for a probe the diff does not contain is itself a failure.
 */
export function checkExpectations(
  entries: readonly DiffEntry[],
  expectations: Readonly<Record<string, Expectation>>,
  tolerances: Readonly<Record<string, number | undefined>> = {},
): AssertionFailure[] {
  const failures: AssertionFailure[] = [];
  for (const [probe, expectation] of Object.entries(expectations)) {
    const entry = entries.find((e) => e.probe === probe);
    const expected = describeExpectation(expectation);
    if (!entry) {
      failures.push({ probe, expected, actual: "<not captured>" });
      continue;
    }
    const actual = `${formatValue(entry.before)} -> ${formatValue(entry.after)}`;
    const tolerance = tolerances[probe];

    let ok: boolean;
    if (expectation === "unchanged") ok = !entry.changed;
    else if (expectation === "changed") ok = entry.changed;
    else if ("from" in expectation || "to" in expectation) {
      const { from, to } = expectation;
      ok =
        (from === undefined || sameValue(entry.before, from, tolerance)) &&
        (to === undefined || sameValue(entry.after, to, tolerance));
    } else ok = checkValue(entry.after, expectation, tolerance);

    if (!ok) failures.push({ probe, expected, actual });
  }
  return failures;
}

/**
 * Judge the values of a single snapshot. A transition expectation
 * ("unchanged", "changed", from/to) needs two snapshots and throws
 * CONFIG_INVALID before any value is judged.
 */
export function checkValues(
  snapshot: StateSnapshot,
  expectations: Readonly<Record<string, Expectation>>,
): AssertionFailure[] {
  for (const [probe, expectation] of Object.entries(expectations)) {
    if (isTransition(expectation)) {
      throw new HarnessError(
        "CONFIG_INVALID",
        `Expectation for "${probe}" (${describeExpectation(expectation)}) needs two snapshots`,
      );
    }
  }
  const failures: AssertionFailure[] = [];
  for (const [probe, expectation] of Object.entries(expectations)) {
    const entry = snapshot.entries.find((e) => e.probe.name === probe);
    const value = valueOf(snapshot, probe);
    if (!checkValue(value, expectation, entry?.probe.tolerance)) {
      failures.push({
        probe,
        expected: describeExpectation(expectation),
        actual: entry ? formatValue(value) : "<not captured>",
      });
    }
  }
  return failures;
}

/** Tolerances of a snapshot's probes, keyed by name. */
export function tolerancesOf(snapshot: StateSnapshot): Record<string, number | undefined> {
  const out: Record<string, number | undefined> = {};
  for (const entry of snapshot.entries) out[entry.probe.name] = entry.probe.tolerance;
  return out;
}
