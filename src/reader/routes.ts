// URL shapes and user-facing messages of the reader under test.

export const ADD_FEED_PATH = "/api/feed/add";

export interface ListQuery {
  /** false selects "All Posts"; omitted leaves the server default. */
  unread?: boolean;
  feedId?: number;
  page?: number;
  /** Scroll offset the server restores once, then strips from the URL. */
  scroll?: number;
}

export interface ItemQuery {
  unreadView?: boolean;
  feedId?: number;
  page?: number;
}

function withQuery(path: string, params: URLSearchParams): string {
  const qs = params.toString();
  return qs ? `${path}?${qs}` : path;
}

export function listUrl(query: ListQuery = {}): string {
  const params = new URLSearchParams();
  if (query.unread !== undefined) params.set("unread", query.unread ? "1" : "0");
  if (query.feedId !== undefined) params.set("feed_id", String(query.feedId));
  if (query.page !== undefined && query.page > 1) params.set("page", String(query.page));
  if (query.scroll !== undefined) params.set("_scroll", String(Math.round(query.scroll)));
  return withQuery("/", params);
}

export function itemUrl(id: number, query: ItemQuery = {}): string {
  const params = new URLSearchParams();
  params.set("unread_view", query.unreadView ? "true" : "false");
  if (query.feedId !== undefined) params.set("feed_id", String(query.feedId));
  if (query.page !== undefined && query.page > 1) params.set("page", String(query.page));
  return withQuery(`/item/${id}`, params);
}

/** True when `url` still carries the one-shot scroll parameter. */
export function hasScrollParam(url: string): boolean {
  return new URL(url).searchParams.has("_scroll");
}

export const MESSAGES = {
  emptyUrl: "Please enter a URL",
  duplicate: "Already subscribed to",
  added: "Feed added successfully",
  partial: "Feed added but background update failed - refresh manually",
  failed: "Failed to add feed",
} as const;

export type AddFeedOutcome = keyof typeof MESSAGES;
