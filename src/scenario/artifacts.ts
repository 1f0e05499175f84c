import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../errors.js";
import type { Artifact, ArtifactKind, PageDriver, ProbeSpec } from "../types.js";
import { captureSnapshot, snapshotToJson } from "../state/snapshot.js";

export function safeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-+|-+$/g, "");
}

async function store(
  kind: ArtifactKind,
  label: string,
  content: string | Uint8Array,
  dir: string | undefined,
  fileName: string,
): Promise<Artifact> {
  if (!dir) {
    const inline = typeof content === "string" ? content : Buffer.from(content).toString("base64");
    return { kind, label, inline };
  }
  await mkdir(dir, { recursive: true });
  const file = path.join(dir, fileName);
  await writeFile(file, content);
  return { kind, label, path: file };
}

/**
 * Collect the failure payload: state snapshot, URL, screenshot and page HTML.
 * A piece that cannot be captured becomes a "note" artifact; capture never throws.
 */
export async function captureDiagnostics(
  page: PageDriver,
  probes: readonly ProbeSpec[],
  opts: { dir?: string; baseName: string },
): Promise<Artifact[]> {
  const base = safeName(opts.baseName);
  const pieces: Array<{ label: string; capture: () => Promise<Artifact> }> = [
    {
      label: "url",
      capture: async () => ({ kind: "url", label: "url", inline: await page.currentUrl() }),
    },
    {
      label: "state",
      capture: async () => {
        const snap = await captureSnapshot(page, probes, "failure");
        return store("snapshot", "state", JSON.stringify(snapshotToJson(snap), null, 2), opts.dir, `${base}.state.json`);
      },
    },
    {
      label: "screenshot",
      capture: async () => store("screenshot", "screenshot", await page.screenshot(), opts.dir, `${base}.png`),
    },
    {
      label: "dom",
      capture: async () => store("dom", "dom", await page.html(), opts.dir, `${base}.html`),
    },
  ];

  const artifacts: Artifact[] = [];
  for (const piece of pieces) {
    try {
      artifacts.push(await piece.capture());
    } catch (err) {
      console.error(`[settlecheck] ${opts.baseName}: could not capture ${piece.label}: ${errorMessage(err)}`);
      artifacts.push({ kind: "note", label: piece.label, inline: `capture failed: ${errorMessage(err)}` });
    }
  }
  return artifacts;
}
