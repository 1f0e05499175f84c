import { scrollTop, visible } from "../state/probes.js";
import {
  assertDiff,
  assertSnapshot,
  assertVisibleCount,
  click,
  fill,
  navigate,
  scenario,
  scroll,
  setViewport,
  snapshot,
  tableScenario,
  waitFor,
  waitForValue,
  type Scenario,
  type Step,
} from "../scenario/steps.js";
import type { ViewportClass } from "../types.js";
import {
  addFeedButton,
  addFeedInput,
  backButton,
  desktopLayout,
  feedItem,
  feedList,
  hamburgerButton,
  mobileLayout,
  REGIONS,
  searchInput,
  sidebar,
} from "./elements.js";
import {
  activeTabProbes,
  headerProbes,
  layoutProbes,
  listScrollProbes,
  readStateProbes,
  SCROLL_TOLERANCE,
  sidebarProbes,
} from "./probes.js";
import { hasScrollParam, listUrl, MESSAGES } from "./routes.js";

export type DefaultFilter = "unread" | "all";

export interface ReaderSuiteOptions {
  /** Tab the reader selects when "/" is opened without parameters. */
  defaultFilter?: DefaultFilter;
  /** A feed the server can fetch. Enables the duplicate-subscription row. */
  feedUrl?: string;
}

export interface AddFeedRow {
  label: string;
  url: string;
  /** Subscribe once before the checked submission. */
  seed: boolean;
  message: string;
}

export interface FilterRow {
  label: string;
  path: string;
  tab: string;
}

const TAB_LABEL: Record<DefaultFilter, string> = { unread: "Unread", all: "All Posts" };

const SCROLL_OFFSET = 400;
const ROUND_TRIP_SCROLL = 200;
const ROUND_TRIP_ITEM = 3;

// On mobile the add-feed form lives in a drawer behind the hamburger button.
function openSidebar(viewport: ViewportClass): Step[] {
  if (viewport === "desktop") return [];
  return [click(hamburgerButton), waitForValue(visible("sidebar visible", REGIONS.mobile.sidebar), { equals: true })];
}

function submitFeed(viewport: ViewportClass, url: string): Step[] {
  return [fill(addFeedInput, url), click(addFeedButton, [REGIONS[viewport].sidebar])];
}

export function addFeedRows(opts: ReaderSuiteOptions = {}): AddFeedRow[] {
  const rows: AddFeedRow[] = [{ label: "empty url", url: "", seed: false, message: MESSAGES.emptyUrl }];
  if (opts.feedUrl) {
    rows.push({ label: "duplicate url", url: opts.feedUrl, seed: true, message: MESSAGES.duplicate });
  }
  return rows;
}

export function addFeedEdgeCases(opts: ReaderSuiteOptions = {}): Scenario<AddFeedRow> {
  return tableScenario(
    "add feed rejects",
    addFeedRows(opts),
    (row) => row.label,
    ({ viewport }, row) => {
      const probes = sidebarProbes(viewport);
      const [, sidebarText] = probes;
      return [
        navigate(listUrl({ unread: false })),
        ...openSidebar(viewport),
        ...(row.seed ? submitFeed(viewport, row.url) : []),
        snapshot("before", probes),
        ...submitFeed(viewport, row.url),
        waitForValue(sidebarText, { contains: row.message }),
        snapshot("after", probes),
        assertDiff("before", "after", { "feed count": "unchanged", "sidebar visible": "unchanged" }),
      ];
    },
  );
}

export function readStateTransition(): Scenario {
  return scenario(
    "read-state transition",
    ({ viewport }) => {
      const probes = readStateProbes(viewport);
      const [dot] = probes;
      return [
        navigate(listUrl({ unread: false })),
        snapshot("unread", probes),
        assertSnapshot("unread", { "blue dot opacity": { equals: "1" }, "title weight": { equals: "600" } }),
        click(feedItem(1)),
        waitForValue(dot, { equals: "0" }),
        snapshot("read", probes),
        assertDiff("unread", "read", {
          "blue dot opacity": { from: "1", to: "0" },
          "title weight": { from: "600", to: "400" },
          "item height": "unchanged",
        }),
      ];
    },
    // On mobile the item replaces the list, so the row cannot be observed in place.
    { viewports: ["desktop"] },
  );
}

export function viewportSwitch(): Scenario {
  return scenario(
    "viewport switch",
    () => [
      navigate("/"),
      assertVisibleCount(desktopLayout, 1),
      assertVisibleCount(sidebar, 1),
      assertVisibleCount(hamburgerButton, 0, "mobile"),
      setViewport("mobile"),
      assertVisibleCount(desktopLayout, 0, "desktop"),
      assertVisibleCount(sidebar, 0, "desktop"),
      assertVisibleCount(mobileLayout, 1),
      assertVisibleCount(hamburgerButton, 1),
      snapshot("mobile", layoutProbes()),
      assertSnapshot("mobile", {
        "desktop layout visible": { equals: false },
        "mobile layout visible": { equals: true },
      }),
    ],
    { viewports: ["desktop"] },
  );
}

export function layoutAffordances(): Scenario {
  return scenario("layout affordances", ({ viewport }) => {
    const steps: Step[] = [navigate("/"), assertVisibleCount(feedList, 1), assertVisibleCount(searchInput, 1)];
    if (viewport === "mobile") {
      steps.push(assertVisibleCount(sidebar, 0), ...openSidebar(viewport), assertVisibleCount(sidebar, 1));
    }
    return steps;
  });
}

export function scrollParamRestore(): Scenario {
  return scenario(
    "scroll restored from _scroll",
    ({ viewport }) => {
      const [listScroll] = listScrollProbes(viewport);
      return [
        navigate(listUrl({ unread: false, scroll: SCROLL_OFFSET })),
        waitFor("_scroll stripped from the URL", (page) => async () => {
          const url = await page.currentUrl();
          return { met: !hasScrollParam(url), observed: url };
        }),
        waitForValue(listScroll, { within: [SCROLL_OFFSET, SCROLL_TOLERANCE] }),
      ];
    },
    {
      diagnostics: [
        scrollTop("desktop list scroll", REGIONS.desktop.list),
        scrollTop("mobile list scroll", REGIONS.mobile.list),
      ],
    },
  );
}

export function scrollRoundTrip(): Scenario {
  return scenario(
    "scroll survives an item round trip",
    () => {
      const probes = listScrollProbes("mobile");
      return [
        navigate(listUrl({ unread: false })),
        scroll(REGIONS.mobile.list, ROUND_TRIP_SCROLL),
        snapshot("list", probes),
        click(feedItem(ROUND_TRIP_ITEM)),
        click(backButton),
        snapshot("returned", probes),
        assertDiff("list", "returned", { "list scroll": "unchanged" }),
      ];
    },
    { viewports: ["mobile"] },
  );
}

export function headerStable(): Scenario {
  return scenario("header stays put while the list scrolls", ({ viewport }) => {
    const probes = headerProbes(viewport);
    return [
      navigate(listUrl({ unread: false })),
      snapshot("top", probes),
      scroll(REGIONS[viewport].list, SCROLL_OFFSET),
      snapshot("scrolled", probes),
      assertDiff("top", "scrolled", {
        "header visible": "unchanged",
        "header top": "unchanged",
        "header height": "unchanged",
      }),
    ];
  });
}

export function filterRows(opts: ReaderSuiteOptions = {}): FilterRow[] {
  return [
    { label: "default", path: "/", tab: TAB_LABEL[opts.defaultFilter ?? "unread"] },
    { label: "unread=0", path: listUrl({ unread: false }), tab: TAB_LABEL.all },
    { label: "unread=1", path: listUrl({ unread: true }), tab: TAB_LABEL.unread },
  ];
}

export function filterTabs(opts: ReaderSuiteOptions = {}): Scenario<FilterRow> {
  return tableScenario(
    "filter tab",
    filterRows(opts),
    (row) => row.label,
    ({ viewport }, row) => [
      navigate(row.path),
      snapshot("landing", activeTabProbes(viewport)),
      assertSnapshot("landing", { "active tab": { equals: row.tab } }),
    ],
  );
}

/** Every reader scenario, in run order. */
export function readerSuite(opts: ReaderSuiteOptions = {}): Array<Scenario<unknown>> {
  return [
    layoutAffordances(),
    viewportSwitch(),
    filterTabs(opts),
    addFeedEdgeCases(opts),
    readStateTransition(),
    headerStable(),
    scrollParamRestore(),
    scrollRoundTrip(),
  ];
}
