import { count, height, scrollTop, style, text, top, visible } from "../state/probes.js";
import type { ProbeSpec, ViewportClass } from "../types.js";
import { REGIONS } from "./elements.js";

// Restored scroll offsets may land this many pixels off the saved one.
export const SCROLL_TOLERANCE = 50;

export function itemSelector(viewport: ViewportClass, position = 1): string {
  return `${REGIONS[viewport].list} li[id^='feed-item-']:nth-of-type(${position})`;
}

/** Message area and subscription count of the add-feed form. */
export function sidebarProbes(viewport: ViewportClass): ProbeSpec[] {
  const { sidebar } = REGIONS[viewport];
  return [
    visible("sidebar visible", sidebar),
    text("sidebar text", sidebar),
    count("feed count", `${sidebar} a[href*='feed_id=']`),
  ];
}

/**
 * Read/unread styling of one list item: the blue dot fades out and the
 * title drops from semibold to normal, without the row changing height.
 */
export function readStateProbes(viewport: ViewportClass, position = 1): ProbeSpec[] {
  const item = itemSelector(viewport, position);
  return [
    style("blue dot opacity", `${item} .bg-blue-600`, "opacity"),
    style("title weight", `${item} div[id^='title-container-'] span:first-child`, "font-weight"),
    height("item height", item, 1),
  ];
}

export function listScrollProbes(viewport: ViewportClass): ProbeSpec[] {
  return [scrollTop("list scroll", REGIONS[viewport].list, SCROLL_TOLERANCE)];
}

export function headerProbes(viewport: ViewportClass): ProbeSpec[] {
  const { header } = REGIONS[viewport];
  return [visible("header visible", header), top("header top", header), height("header height", header)];
}

export function activeTabProbes(viewport: ViewportClass): ProbeSpec[] {
  return [text("active tab", `${REGIONS[viewport].tabs} li.uk-active a`)];
}

export function layoutProbes(): ProbeSpec[] {
  return [visible("desktop layout visible", "#desktop-layout"), visible("mobile layout visible", "#mobile-layout")];
}
