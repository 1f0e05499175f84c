import type { LogicalElement, ViewportClass } from "../types.js";

// The reader renders both layouts into one document and toggles them with
// media queries, so every affordance has one implementation per layout.
//
// This catalog targets the dual-layout markup: #desktop-layout and
// #mobile-layout, #sidebar and #mobile-sidebar, #mobile-nav-button. The
// three-pane layout (#app-root holding #feeds, #summary and #detail, with
// .hamburger-btn and .back-btn inside a repeated #universal-header) shares
// none of these selectors and needs a catalog of its own.

const desktop = (selector: string) => ({ selector, viewports: ["desktop"] as const });
const mobile = (selector: string) => ({ selector, viewports: ["mobile"] as const });

export const sidebar: LogicalElement = {
  name: "sidebar",
  candidates: [desktop("#sidebar"), mobile("#mobile-sidebar")],
};

export const addFeedInput: LogicalElement = {
  name: "add-feed input",
  candidates: [
    desktop("#sidebar input[name='new_feed_url']"),
    mobile("#mobile-sidebar input[name='new_feed_url']"),
  ],
};

export const addFeedButton: LogicalElement = {
  name: "add-feed button",
  candidates: [desktop("#sidebar button.add-feed-button"), mobile("#mobile-sidebar button.add-feed-button")],
};

// Both selectors name the same button; it must still resolve to one element.
export const hamburgerButton: LogicalElement = {
  name: "hamburger button",
  candidates: [mobile("#mobile-nav-button"), mobile("#mobile-header button[onclick*='mobile-sidebar']")],
};

export const backButton: LogicalElement = {
  name: "back button",
  candidates: [mobile("#mobile-header button.back-btn")],
};

export const searchInput: LogicalElement = {
  name: "search input",
  candidates: [desktop("#desktop-feeds-content input[type='search']"), mobile("#mobile-persistent-search")],
};

export const feedList: LogicalElement = {
  name: "feed list",
  candidates: [desktop("#desktop-feeds-content"), mobile("#main-content")],
};

/** The list item at `position` (1-based) in the visible layout's list. */
export function feedItem(position: number): LogicalElement {
  const item = `li[id^='feed-item-']:nth-of-type(${position})`;
  return {
    name: `feed item ${position}`,
    candidates: [desktop(`#desktop-feeds-content ${item}`), mobile(`#main-content ${item}`)],
  };
}

export const desktopLayout: LogicalElement = { name: "desktop layout", candidates: [desktop("#desktop-layout")] };

export const mobileLayout: LogicalElement = { name: "mobile layout", candidates: [mobile("#mobile-layout")] };

/** Containers the probes are scoped to, per layout. */
export interface Regions {
  sidebar: string;
  list: string;
  header: string;
  tabs: string;
}

export const REGIONS: Readonly<Record<ViewportClass, Regions>> = {
  desktop: {
    sidebar: "#sidebar",
    list: "#desktop-feeds-content",
    header: "#desktop-feeds-content #universal-header",
    tabs: "#desktop-feeds-content",
  },
  mobile: {
    sidebar: "#mobile-sidebar",
    list: "#main-content",
    header: "#mobile-persistent-header",
    tabs: "#mobile-persistent-header",
  },
};
