import { HarnessError } from "../errors.js";
import { ABSENT } from "../types.js";
import type { PageDriver, ProbeSpec, ProbeValue, RawProbeResult, SnapshotEntry, StateSnapshot } from "../types.js";

function toValue(probe: ProbeSpec, raw: RawProbeResult): ProbeValue {
  if (probe.kind === "count") return typeof raw.value === "number" ? raw.value : 0;
  if (!raw.present || raw.value === null) return ABSENT;
  return raw.value;
}

/**
 * Evaluate `probes` in order against the current page. A probe whose target
 * is missing records ABSENT instead of failing the capture.
 */
export async function captureSnapshot(
  page: PageDriver,
  probes: readonly ProbeSpec[],
  label = "snapshot",
): Promise<StateSnapshot> {
  const names = new Set<string>();
  for (const probe of probes) {
    if (names.has(probe.name)) {
      throw new HarnessError("CONFIG_INVALID", `Duplicate probe name "${probe.name}" in ${label}`);
    }
    names.add(probe.name);
  }

  const raw = probes.length > 0 ? await page.probe(probes) : [];
  if (raw.length !== probes.length) {
    throw new HarnessError(
      "SCRIPT_ERROR",
      `Probe evaluation returned ${raw.length} result(s) for ${probes.length} probe(s)`,
    );
  }

  const entries: SnapshotEntry[] = probes.map((probe, i) =>
    Object.freeze({ probe: Object.freeze({ ...probe }), value: toValue(probe, raw[i]) }),
  );
  return Object.freeze({ label, takenAt: Date.now(), entries: Object.freeze(entries) });
}

export function valueOf(snapshot: StateSnapshot, probe: string): ProbeValue {
  return snapshot.entries.find((e) => e.probe.name === probe)?.value ?? ABSENT;
}

/** Plain-object form for diagnostics and artifacts. */
export function snapshotToJson(snapshot: StateSnapshot): Record<string, unknown> {
  const values: Record<string, ProbeValue> = {};
  for (const entry of snapshot.entries) values[entry.probe.name] = entry.value;
  return { label: snapshot.label, takenAt: new Date(snapshot.takenAt).toISOString(), values };
}
