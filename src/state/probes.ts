import type { ProbeSpec } from "../types.js";

// Builders for the probe kinds a snapshot can capture.

export const visible = (name: string, selector: string): ProbeSpec => ({ name, kind: "visible", selector });

export const classList = (name: string, selector: string): ProbeSpec => ({ name, kind: "classList", selector });

export const hasClass = (name: string, selector: string, className: string): ProbeSpec => ({
  name,
  kind: "hasClass",
  selector,
  property: className,
});

export const scrollTop = (name: string, selector: string, tolerance?: number): ProbeSpec => ({
  name,
  kind: "scrollTop",
  selector,
  tolerance,
});

export const style = (name: string, selector: string, cssProperty: string): ProbeSpec => ({
  name,
  kind: "style",
  selector,
  property: cssProperty,
});

export const attribute = (name: string, selector: string, attr: string): ProbeSpec => ({
  name,
  kind: "attribute",
  selector,
  property: attr,
});

export const count = (name: string, selector: string): ProbeSpec => ({ name, kind: "count", selector });

export const text = (name: string, selector: string): ProbeSpec => ({ name, kind: "text", selector });

export const height = (name: string, selector: string, tolerance?: number): ProbeSpec => ({
  name,
  kind: "height",
  selector,
  tolerance,
});

/** Viewport-relative top edge, for "stays put while content scrolls" checks. */
export const top = (name: string, selector: string, tolerance?: number): ProbeSpec => ({
  name,
  kind: "top",
  selector,
  tolerance,
});

/** Concatenate probe sets, keeping the first probe of each name. */
export function mergeProbes(...sets: ReadonlyArray<readonly ProbeSpec[]>): ProbeSpec[] {
  const byName = new Map<string, ProbeSpec>();
  for (const set of sets) {
    for (const probe of set) {
      if (!byName.has(probe.name)) byName.set(probe.name, probe);
    }
  }
  return [...byName.values()];
}
