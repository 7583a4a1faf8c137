// =============================================================================
// @paper-courier/shared — Feed adapter capability interface
// =============================================================================
// Each feed family (arXiv, MDPI, OpenAlex) implements FeedProvider over its own
// raw entry type. ArticleSource drives a provider over one fetched batch of
// entries; loaders in the registry fetch that batch.
// =============================================================================

import type { CanonicalArticle, PatternSet, PublisherKind, UtcDate } from "../types.js";
import type { Logger } from "../logger.js";

/** Yielded for entries published before today; lets callers count stale items */
export const NO_MATCH: unique symbol = Symbol("no-match");
export type NoMatch = typeof NO_MATCH;

export interface FeedProvider<TEntry> {
  readonly kind: PublisherKind;
  /** UTC calendar date the entry counts as published on */
  getPublishDate(entry: TEntry): UtcDate;
  /** Title exactly as the feed delivers it */
  rawTitle(entry: TEntry): string;
  /** Strip provider decoration from a raw title */
  parseTitle(rawTitle: string): string;
  extractFields(entry: TEntry): CanonicalArticle;
}

/** A loaded feed ready for a single filtering pass */
export interface MatchingSource {
  readonly label: string;
  readonly size: number;
  iterateMatching(
    patterns: PatternSet,
  ): Generator<CanonicalArticle | NoMatch, void, undefined>;
}

/** Normalized subset of an rss-parser item */
export interface RssItem {
  title?: string;
  link?: string;
  content?: string;
  contentSnippet?: string;
  description?: string;
  creator?: string;
  creators?: string[];
  pubDate?: string;
  isoDate?: string;
  dcDate?: string;
}

export interface RssFeed {
  /** Channel-level lastBuildDate, falling back to pubDate */
  updated?: string;
  items: RssItem[];
}

export type RssFetcher = (url: string) => Promise<RssFeed>;

export interface SourceContext {
  today: UtcDate;
  logger: Logger;
  openAlex: {
    daysBack: number;
    perPage: number;
    mailto?: string;
  };
  fetchRss?: RssFetcher;
  fetchFn?: typeof fetch;
}
