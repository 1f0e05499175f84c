import { describe, it, expect } from "vitest";
import { definePolicy } from "../../src/actions/poll.js";
import {
  candidatesFor,
  classifyViewport,
  resolve,
  resolveWhenReady,
  visibleCount,
} from "../../src/state/resolver.js";
import type { LogicalElement } from "../../src/types.js";
import { FakePage } from "../support/fake-page.js";

const addButton: LogicalElement = {
  name: "add button",
  candidates: [
    { selector: "#sidebar .add", viewports: ["desktop"] },
    { selector: "#drawer .add", viewports: ["mobile"] },
    { selector: "form .add", viewports: ["desktop", "mobile"] },
  ],
};

const fast = definePolicy({ initialDelayMs: 5, maxDelayMs: 10, stopAfterMs: 150 });

describe("classifyViewport", () => {
  it("splits at the breakpoint", () => {
    expect(classifyViewport(390)).toBe("mobile");
    expect(classifyViewport(1023)).toBe("mobile");
    expect(classifyViewport(1024)).toBe("desktop");
    expect(classifyViewport(1400)).toBe("desktop");
  });

  it("takes a custom breakpoint", () => {
    expect(classifyViewport(800, 768)).toBe("desktop");
  });
});

describe("candidatesFor", () => {
  it("keeps only the candidates tagged for the viewport", () => {
    expect(candidatesFor(addButton, "mobile").map((c) => c.selector)).toEqual(["#drawer .add", "form .add"]);
  });
});

describe("resolve", () => {
  it("returns the single visible candidate", async () => {
    const page = new FakePage();
    page.matches.set("#sidebar .add", [{ domPath: "#sidebar > button:nth-of-type(1)", visible: true }]);
    page.matches.set("#drawer .add", [{ domPath: "#drawer > button:nth-of-type(1)", visible: true }]);

    await expect(resolve(page, addButton, "desktop")).resolves.toEqual({
      logical: "add button",
      selector: "#sidebar .add",
      domPath: "#sidebar > button:nth-of-type(1)",
    });
  });

  it("ignores hidden matches", async () => {
    const page = new FakePage();
    page.matches.set("#sidebar .add", [
      { domPath: "#sidebar > button:nth-of-type(1)", visible: false },
      { domPath: "#sidebar > button:nth-of-type(2)", visible: true },
    ]);

    const handle = await resolve(page, addButton, "desktop");
    expect(handle.domPath).toBe("#sidebar > button:nth-of-type(2)");
  });

  it("counts one element matched by two candidates once", async () => {
    const page = new FakePage();
    page.matches.set("#sidebar .add", [{ domPath: "#add", visible: true }]);
    page.matches.set("form .add", [{ domPath: "#add", visible: true }]);

    const handle = await resolve(page, addButton, "desktop");
    expect(handle).toEqual({ logical: "add button", selector: "#sidebar .add", domPath: "#add" });
  });

  it("fails with AMBIGUOUS_STATE when two elements are visible", async () => {
    const page = new FakePage();
    page.matches.set("#sidebar .add", [{ domPath: "#add-a", visible: true }]);
    page.matches.set("form .add", [{ domPath: "#add-b", visible: true }]);

    await expect(resolve(page, addButton, "desktop")).rejects.toMatchObject({
      code: "AMBIGUOUS_STATE",
      message: "add button: 2 visible candidates on desktop: #sidebar .add (#add-a), form .add (#add-b)",
    });
  });

  it("fails with ELEMENT_NOT_READY when nothing is visible", async () => {
    const page = new FakePage();
    page.matches.set("#drawer .add", [{ domPath: "#drawer-add", visible: false }]);

    await expect(resolve(page, addButton, "mobile")).rejects.toMatchObject({
      code: "ELEMENT_NOT_READY",
      message: "add button: no visible candidate on mobile",
    });
  });

  it("never consults candidates of the other viewport", async () => {
    const page = new FakePage();
    page.matches.set("#sidebar .add", [{ domPath: "#add", visible: true }]);

    await expect(resolve(page, addButton, "mobile")).rejects.toMatchObject({ code: "ELEMENT_NOT_READY" });
  });

  it("rejects an element with no candidate for the viewport", async () => {
    const desktopOnly: LogicalElement = { name: "icon bar", candidates: [{ selector: "#icons", viewports: ["desktop"] }] };
    await expect(resolve(new FakePage(), desktopOnly, "mobile")).rejects.toMatchObject({
      code: "CONFIG_INVALID",
      message: "icon bar has no candidate for mobile",
    });
  });
});

describe("visibleCount", () => {
  it("counts distinct visible elements", async () => {
    const page = new FakePage();
    page.matches.set("#sidebar .add", [
      { domPath: "#add-a", visible: true },
      { domPath: "#add-b", visible: false },
    ]);
    page.matches.set("form .add", [{ domPath: "#add-a", visible: true }]);

    expect(await visibleCount(page, addButton, "desktop")).toBe(1);
    expect(await visibleCount(page, addButton, "mobile")).toBe(1);
  });
});

describe("resolveWhenReady", () => {
  it("waits for the element to appear", async () => {
    const page = new FakePage();
    setTimeout(() => page.matches.set("#drawer .add", [{ domPath: "#drawer-add", visible: true }]), 30);

    const handle = await resolveWhenReady(page, addButton, "mobile", { policy: fast });
    expect(handle.domPath).toBe("#drawer-add");
  });

  it("does not retry ambiguity", async () => {
    const page = new FakePage();
    page.matches.set("#drawer .add", [{ domPath: "#a", visible: true }]);
    page.matches.set("form .add", [{ domPath: "#b", visible: true }]);

    await expect(resolveWhenReady(page, addButton, "mobile", { policy: fast })).rejects.toMatchObject({
      code: "AMBIGUOUS_STATE",
    });
  });

  it("turns exhaustion into WAIT_TIMEOUT", async () => {
    const err = await resolveWhenReady(new FakePage(), addButton, "desktop", { policy: fast }).catch(
      (e: unknown) => e,
    );
    expect(err).toMatchObject({ code: "WAIT_TIMEOUT" });
    expect(err).toHaveProperty(
      "message",
      expect.stringMatching(
        /^resolve add button on desktop not met after \d+ attempt\(s\) in \d+ms; last observed: \{"visible":0\}$/,
      ),
    );
  });
});
