import type { CanonicalArticle, UtcDate } from "../types.js";
import { parseUtcDate } from "./dates.js";
import type { FeedProvider, RssItem } from "./types.js";

export function arxivFeedUrl(category: string): string {
  return `https://rss.arxiv.org/rss/${category}`;
}

export interface ArxivEntry {
  title: string;
  link: string;
  /** HTML description: "arXiv:… Announce Type: new Abstract: …" */
  description: string;
  /** Comma-separated, possibly wrapped in <a href="…"> anchors */
  author: string;
}

export function toArxivEntry(item: RssItem): ArxivEntry {
  return {
    title: item.title ?? "",
    link: item.link ?? "",
    description: item.description ?? item.content ?? "",
    author: item.creator ?? "",
  };
}

const ARXIV_ID_SUFFIX = / .(arXiv:.*)/g;
const AUTHOR_ANCHOR = /<a href=.*">/g;

/**
 * arXiv publishes a whole day's announcements at once, so every entry takes
 * the channel's build date.
 */
export class ArxivProvider implements FeedProvider<ArxivEntry> {
  readonly kind = "arxiv" as const;

  constructor(private readonly feedUpdated: string | undefined) {}

  getPublishDate(): UtcDate {
    return parseUtcDate(this.feedUpdated, "arXiv lastBuildDate");
  }

  rawTitle(entry: ArxivEntry): string {
    return entry.title;
  }

  parseTitle(rawTitle: string): string {
    return rawTitle.replace(ARXIV_ID_SUFFIX, "");
  }

  extractFields(entry: ArxivEntry): CanonicalArticle {
    return {
      title: this.parseTitle(entry.title),
      link: entry.link.replace(/^http:/, "https:"),
      authors: parseAuthors(entry.author),
      rawDescription: parseAbstract(entry.description),
    };
  }
}

export function parseAuthors(author: string): string {
  return author
    .split(",")
    .map((name) => name.replace(AUTHOR_ANCHOR, "").replace(/<\/a>/g, "").trim())
    .filter((name) => name.length > 0)
    .join(", ");
}

export function parseAbstract(description: string): string {
  const marker = description.indexOf("Abstract:");
  const body =
    marker === -1 ? description : description.slice(marker + "Abstract:".length);
  return body.replace(/\s*\n\s*/g, " ").split("</p>")[0].trim();
}
