import type { OpenAlexWork } from "../schemas.js";
import type { CanonicalArticle, UtcDate } from "../types.js";
import { addDays, parseUtcDate } from "./dates.js";
import { NUMBERED_PREFIX, PUBLICATION_LAG_DAYS } from "./mdpi.js";
import type { FeedProvider } from "./types.js";

export const OPENALEX_WORKS_URL = "https://api.openalex.org/works";

const SELECT_FIELDS = [
  "doi",
  "title",
  "publication_date",
  "primary_location",
  "authorships",
  "abstract_inverted_index",
].join(",");

export interface OpenAlexQuery {
  issn: string;
  today: UtcDate;
  daysBack: number;
  perPage: number;
  mailto?: string;
}

/** Works of one journal published within the last `daysBack` days, newest first */
export function openAlexWorksUrl(query: OpenAlexQuery): string {
  const fromDate = addDays(query.today, -query.daysBack);
  const params = new URLSearchParams({
    filter: `primary_location.source.issn:${query.issn},from_publication_date:${fromDate}`,
    sort: "publication_date:desc",
    "per-page": String(query.perPage),
    select: SELECT_FIELDS,
  });
  if (query.mailto) params.set("mailto", query.mailto);
  return `${OPENALEX_WORKS_URL}?${params.toString()}`;
}

/** Rebuild abstract text from OpenAlex's word → positions index */
export function abstractFromInvertedIndex(
  index: Record<string, number[]> | null | undefined,
): string {
  if (!index) return "";
  const positions = new Map<number, string>();
  for (const [word, wordPositions] of Object.entries(index)) {
    for (const position of wordPositions) positions.set(position, word);
  }
  return [...positions.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, word]) => word)
    .join(" ");
}

export class OpenAlexProvider implements FeedProvider<OpenAlexWork> {
  readonly kind = "openalex" as const;

  getPublishDate(work: OpenAlexWork): UtcDate {
    return addDays(
      parseUtcDate(work.publication_date, "OpenAlex publication_date"),
      PUBLICATION_LAG_DAYS,
    );
  }

  rawTitle(work: OpenAlexWork): string {
    return work.title ?? "";
  }

  parseTitle(rawTitle: string): string {
    return rawTitle.replace(NUMBERED_PREFIX, "");
  }

  extractFields(work: OpenAlexWork): CanonicalArticle {
    return {
      title: this.parseTitle(this.rawTitle(work)),
      link: work.doi ?? work.primary_location?.landing_page_url ?? "",
      authors: (work.authorships ?? [])
        .map((a) => a.author.display_name ?? "")
        .filter((name) => name.length > 0)
        .join(", "),
      rawDescription: abstractFromInvertedIndex(work.abstract_inverted_index),
    };
  }
}
