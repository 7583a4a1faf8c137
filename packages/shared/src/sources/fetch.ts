// =============================================================================
// @paper-courier/shared — Feed retrieval
// =============================================================================
// RSS/RDF feeds go through rss-parser; OpenAlex is a JSON API validated with
// zod. Both are plain read-only GETs with a 30s timeout.
// =============================================================================

import Parser from "rss-parser";
import { OpenAlexResponseSchema, type OpenAlexWork } from "../schemas.js";
import { errorMessage } from "../errors.js";
import { logExternalCall, type Logger } from "../logger.js";
import type { RssFeed, RssItem } from "./types.js";

const REQUEST_TIMEOUT_MS = 30_000;
const USER_AGENT = "paper-courier/0.1";

interface FeedExtras {
  lastBuildDate?: string;
  pubDate?: string;
}

interface ItemExtras {
  description?: string;
  creators?: string[];
  dcDate?: string;
}

const parser: Parser<FeedExtras, ItemExtras> = new Parser({
  timeout: REQUEST_TIMEOUT_MS,
  headers: {
    "User-Agent": USER_AGENT,
    Accept: "application/rss+xml,application/rdf+xml,application/xml,text/xml,*/*",
  },
  customFields: {
    feed: ["lastBuildDate", "pubDate"],
    item: [
      "description",
      ["dc:creator", "creators", { keepArray: true }],
      ["dc:date", "dcDate"],
    ],
  },
});

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export async function fetchRssFeed(url: string): Promise<RssFeed> {
  const feed = await parser.parseURL(url);
  return {
    updated: feed.lastBuildDate ?? feed.pubDate,
    items: feed.items.map(
      (item): RssItem => ({
        title: item.title,
        link: item.link,
        content: item.content,
        contentSnippet: item.contentSnippet,
        description: optionalString(item.description),
        creator: item.creator,
        creators: Array.isArray(item.creators)
          ? item.creators.filter((c): c is string => typeof c === "string")
          : undefined,
        pubDate: item.pubDate,
        isoDate: item.isoDate,
        dcDate: optionalString(item.dcDate),
      }),
    ),
  };
}

/** Fetch and time a feed, logging the external call either way */
export async function timedFetch<T>(
  logger: Logger,
  service: "rss" | "openalex",
  url: string,
  fn: () => Promise<T>,
): Promise<T> {
  const start = performance.now();
  try {
    const result = await fn();
    logExternalCall(logger, service, url, Math.round(performance.now() - start));
    return result;
  } catch (err) {
    logExternalCall(
      logger,
      service,
      url,
      Math.round(performance.now() - start),
      errorMessage(err),
    );
    throw err;
  }
}

export async function fetchOpenAlexWorks(
  url: string,
  fetchFn: typeof fetch = fetch,
): Promise<OpenAlexWork[]> {
  const response = await fetchFn(url, {
    headers: { "User-Agent": USER_AGENT, Accept: "application/json" },
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  });
  if (!response.ok) {
    throw new Error(`OpenAlex responded ${response.status}`);
  }
  return OpenAlexResponseSchema.parse(await response.json()).results;
}
