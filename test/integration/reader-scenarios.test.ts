import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { definePolicy } from "../../src/actions/poll.js";
import { ScenarioRunner } from "../../src/scenario/runner.js";
import {
  addFeedEdgeCases,
  filterTabs,
  headerStable,
  readerSuite,
  readStateTransition,
  scrollParamRestore,
  scrollRoundTrip,
  viewportSwitch,
} from "../../src/reader/scenarios.js";
import { FakeReaderPage, READER_URL, type FakeReaderOptions } from "../support/fake-reader.js";

const fast = definePolicy({ initialDelayMs: 5, maxDelayMs: 20, stopAfterMs: 300 });
const FEED_URL = "http://feeds.test/rss.xml";

function readerRunner(opts: FakeReaderOptions = {}): { runner: ScenarioRunner; pages: FakeReaderPage[] } {
  const pages: FakeReaderPage[] = [];
  const runner = new ScenarioRunner({
    baseUrl: READER_URL,
    policy: fast,
    openContext: async () => {
      const page = new FakeReaderPage(opts);
      pages.push(page);
      return page;
    },
  });
  return { runner, pages };
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("reader suite against a healthy reader", () => {
  it("passes every run", async () => {
    const { runner, pages } = readerRunner();
    const report = await runner.runSuite(readerSuite());

    expect(report.results.filter((r) => r.status !== "passed").map((r) => r.error)).toEqual([]);
    expect([report.total, report.passed]).toEqual([17, 17]);
    expect(pages.every((p) => p.closed)).toBe(true);
  });

  it("adds the duplicate-subscription row when a feed URL is known", async () => {
    const { runner } = readerRunner();
    const report = await runner.runSuite(readerSuite({ feedUrl: FEED_URL }));

    expect([report.total, report.passed]).toEqual([19, 19]);
    const rows = report.results.filter((r) => r.scenario === "add feed rejects").map((r) => `${r.row} / ${r.viewport}`);
    expect(rows).toEqual(["empty url / desktop", "duplicate url / desktop", "empty url / mobile", "duplicate url / mobile"]);
  });

  it("honours a server whose default tab is All Posts", async () => {
    const { runner } = readerRunner({ defaultFilter: "all" });
    const results = await runner.replay(filterTabs({ defaultFilter: "all" }));
    expect(results.map((r) => r.status)).toEqual(Array(6).fill("passed"));
  });

  it("drives the mobile drawer before using the add-feed form", async () => {
    const { runner, pages } = readerRunner();
    await runner.run(addFeedEdgeCases(), "mobile", { label: "empty url", url: "", seed: false, message: "Please enter a URL" });

    expect(pages[0].log).toEqual([
      "viewport 390x844",
      "navigate http://reader.test/?unread=0",
      "click #mobile-nav-button",
      'fill #mobile-feed-url ""',
      "click #mobile-add-feed",
    ]);
  });
});

describe("reader suite against a broken reader", () => {
  it("catches a row that grows once read", async () => {
    const { runner } = readerRunner({ defects: { readRowGrowth: 8 } });
    const result = await runner.run(readStateTransition(), "desktop", null);

    expect(result.status).toBe("failed");
    expect(result.failures).toEqual([{ probe: "item height", expected: "unchanged", actual: "72 -> 80" }]);
  });

  it("catches both layouts rendering at once", async () => {
    const { runner } = readerRunner({ defects: { bothLayoutsVisible: true } });
    const result = await runner.run(viewportSwitch(), "desktop", null);

    expect(result.status).toBe("failed");
    expect(result.failures).toEqual([{ probe: "hamburger button visible candidates", expected: "0", actual: "1" }]);
  });

  it("catches a header that scrolls away", async () => {
    const { runner } = readerRunner({ defects: { headerScrolls: true } });
    const results = await runner.replay(headerStable());

    expect(results.map((r) => r.failures)).toEqual([
      [{ probe: "header top", expected: "unchanged", actual: "0 -> -400" }],
      [{ probe: "header top", expected: "unchanged", actual: "0 -> -400" }],
    ]);
  });

  it("catches a _scroll parameter left in the URL", async () => {
    const { runner } = readerRunner({ defects: { keepsScrollParam: true } });
    const result = await runner.run(scrollParamRestore(), "desktop", null);

    expect(result.status).toBe("failed");
    expect(result.error?.code).toBe("WAIT_TIMEOUT");
    expect(result.error?.message).toMatch(
      /^_scroll stripped from the URL not met after \d+ attempt\(s\) in \d+ms; last observed: "http:\/\/reader\.test\/\?unread=0&_scroll=400"$/,
    );
    const state = result.artifacts.find((a) => a.kind === "snapshot");
    expect(JSON.parse(state?.inline ?? "{}")).toMatchObject({
      values: { "desktop list scroll": 400, "mobile list scroll": 400 },
    });
  });

  it("catches a list that loses its place after the back button", async () => {
    const { runner } = readerRunner({ defects: { dropsScroll: true } });
    const result = await runner.run(scrollRoundTrip(), "mobile", null);

    expect(result.failures).toEqual([{ probe: "list scroll", expected: "unchanged", actual: "200 -> 0" }]);
  });

  it("catches a default tab that differs from the expected one", async () => {
    const { runner } = readerRunner({ defaultFilter: "all" });
    const result = await runner.run(filterTabs(), "desktop", { label: "default", path: "/", tab: "Unread" });

    expect(result.failures).toEqual([{ probe: "active tab", expected: '"Unread"', actual: '"All Posts"' }]);
  });

  it("catches a duplicate subscription that is accepted", async () => {
    const { runner, pages } = readerRunner({ defects: { acceptsDuplicates: true } });
    const result = await runner.run(addFeedEdgeCases({ feedUrl: FEED_URL }), "desktop", {
      label: "duplicate url",
      url: FEED_URL,
      seed: true,
      message: "Already subscribed to",
    });

    expect(result.status).toBe("failed");
    expect(result.error?.code).toBe("WAIT_TIMEOUT");
    expect(pages[0].feeds).toEqual([FEED_URL, FEED_URL]);
  });
});
