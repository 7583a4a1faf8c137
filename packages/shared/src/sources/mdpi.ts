import type { CanonicalArticle, UtcDate } from "../types.js";
import { addDays, parseUtcDate } from "./dates.js";
import type { FeedProvider, RssItem } from "./types.js";

export function mdpiFeedUrl(journal: string): string {
  return `https://www.mdpi.com/rss/journal/${journal}`;
}

export interface MdpiEntry {
  title: string;
  link: string;
  summary: string;
  authors: string[];
  published?: string;
}

export function toMdpiEntry(item: RssItem): MdpiEntry {
  return {
    title: item.title ?? "",
    link: item.link ?? "",
    summary: item.content ?? item.description ?? item.contentSnippet ?? "",
    authors: item.creators ?? (item.creator ? [item.creator] : []),
    published: item.isoDate ?? item.dcDate ?? item.pubDate,
  };
}

/** Numbered-list prefix such as "Remote Sens., Vol. 16, Pages 12: " */
export const NUMBERED_PREFIX = /.*[0-9]: /g;

/** MDPI and OpenAlex date entries one day before the RSS delivers them */
export const PUBLICATION_LAG_DAYS = 1;

export class MdpiProvider implements FeedProvider<MdpiEntry> {
  readonly kind = "mdpi" as const;

  getPublishDate(entry: MdpiEntry): UtcDate {
    return addDays(
      parseUtcDate(entry.published, "MDPI publish date"),
      PUBLICATION_LAG_DAYS,
    );
  }

  rawTitle(entry: MdpiEntry): string {
    return entry.title;
  }

  parseTitle(rawTitle: string): string {
    return rawTitle.replace(NUMBERED_PREFIX, "");
  }

  extractFields(entry: MdpiEntry): CanonicalArticle {
    return {
      title: this.parseTitle(entry.title),
      link: entry.link,
      authors: entry.authors.join(", "),
      rawDescription: entry.summary.replace(/'/g, ""),
    };
  }
}
