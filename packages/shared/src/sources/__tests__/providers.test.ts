import { describe, it, expect } from "vitest";
import {
  ArxivProvider,
  parseAbstract,
  parseAuthors,
  toArxivEntry,
} from "../arxiv.js";
import { MdpiProvider, toMdpiEntry, type MdpiEntry } from "../mdpi.js";
import {
  OpenAlexProvider,
  abstractFromInvertedIndex,
  openAlexWorksUrl,
} from "../openalex.js";
import { addDays, parseUtcDate } from "../dates.js";
import { FeedEntryError } from "../../errors.js";
import type { OpenAlexWork } from "../../schemas.js";

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

describe("dates", () => {
  it("takes the UTC calendar date of an offset timestamp", () => {
    expect(parseUtcDate("Mon, 15 Jan 2024 23:30:00 -0500", "x")).toBe("2024-01-16");
  });

  it("rejects missing and unparseable values", () => {
    expect(() => parseUtcDate(undefined, "pubDate")).toThrow(FeedEntryError);
    expect(() => parseUtcDate("yesterday", "pubDate")).toThrow(
      "Unparseable pubDate: yesterday",
    );
  });

  it("adds days across month boundaries", () => {
    expect(addDays("2024-01-31", 1)).toBe("2024-02-01");
    expect(addDays("2024-03-01", -2)).toBe("2024-02-28");
  });
});

// ---------------------------------------------------------------------------
// arXiv
// ---------------------------------------------------------------------------

describe("ArxivProvider", () => {
  const provider = new ArxivProvider("Mon, 15 Jan 2024 05:00:00 +0000");

  it("dates every entry by the feed's build date", () => {
    expect(provider.getPublishDate()).toBe("2024-01-15");
  });

  it("fails on a feed without a build date", () => {
    expect(() => new ArxivProvider(undefined).getPublishDate()).toThrow(FeedEntryError);
  });

  it("strips the identifier suffix from legacy titles", () => {
    expect(
      provider.parseTitle("Deep Learning for X. (arXiv:2401.00001v1 [cs.CV])"),
    ).toBe("Deep Learning for X.");
    expect(provider.parseTitle("Deep Learning for X")).toBe("Deep Learning for X");
  });

  it("strips author anchors", () => {
    expect(
      parseAuthors(
        '<a href="http://arxiv.org/a/alice_1">Alice</a>, <a href="http://arxiv.org/a/bob_1">Bob</a>',
      ),
    ).toBe("Alice, Bob");
    expect(parseAuthors("Alice,  Bob ,")).toBe("Alice, Bob");
  });

  it("keeps only the abstract paragraph", () => {
    expect(
      parseAbstract(
        "arXiv:2401.00001v1 Announce Type: new \nAbstract: We detect\nbuildings.</p><p>extra",
      ),
    ).toBe("We detect buildings.");
  });

  it("extracts canonical fields with an https link", () => {
    const entry = toArxivEntry({
      title: "Deep Learning for X",
      link: "http://arxiv.org/abs/2401.00001",
      description: "arXiv:2401.00001v1 Announce Type: new Abstract: We detect buildings.",
      creator: "Alice, Bob",
    });
    expect(provider.extractFields(entry)).toEqual({
      title: "Deep Learning for X",
      link: "https://arxiv.org/abs/2401.00001",
      authors: "Alice, Bob",
      rawDescription: "We detect buildings.",
    });
  });
});

// ---------------------------------------------------------------------------
// MDPI
// ---------------------------------------------------------------------------

describe("MdpiProvider", () => {
  const provider = new MdpiProvider();
  const entry: MdpiEntry = {
    title: "Remote Sens., Vol. 16, Pages 12: Deep Learning for Buildings",
    link: "https://www.mdpi.com/2072-4292/16/1/12",
    summary: "We map the city's buildings.",
    authors: ["Alice", "Bob"],
    published: "2024-01-14T09:00:00.000Z",
  };

  it("shifts the publish date forward by one day", () => {
    expect(provider.getPublishDate(entry)).toBe("2024-01-15");
  });

  it("removes the numbered volume prefix", () => {
    expect(provider.parseTitle(entry.title)).toBe("Deep Learning for Buildings");
  });

  it("joins authors and drops apostrophes from the summary", () => {
    expect(provider.extractFields(entry)).toEqual({
      title: "Deep Learning for Buildings",
      link: "https://www.mdpi.com/2072-4292/16/1/12",
      authors: "Alice, Bob",
      rawDescription: "We map the citys buildings.",
    });
  });

  it("maps rss-parser items, preferring every dc:creator", () => {
    expect(
      toMdpiEntry({
        title: "t",
        link: "l",
        content: "c",
        creator: "Alice",
        creators: ["Alice", "Bob"],
        dcDate: "2024-01-14",
      }),
    ).toEqual({
      title: "t",
      link: "l",
      summary: "c",
      authors: ["Alice", "Bob"],
      published: "2024-01-14",
    });
  });
});

// ---------------------------------------------------------------------------
// OpenAlex
// ---------------------------------------------------------------------------

describe("OpenAlexProvider", () => {
  const provider = new OpenAlexProvider();
  const work: OpenAlexWork = {
    doi: "https://doi.org/10.1000/xyz",
    title: "Deep Learning for Buildings",
    publication_date: "2024-01-14",
    primary_location: { landing_page_url: "https://example.org/paper" },
    authorships: [
      { author: { display_name: "Alice" } },
      { author: { display_name: null } },
      { author: { display_name: "Bob" } },
    ],
    abstract_inverted_index: { buildings: [2], We: [0], detect: [1] },
  };

  it("rebuilds the abstract in word order", () => {
    expect(abstractFromInvertedIndex(work.abstract_inverted_index)).toBe(
      "We detect buildings",
    );
    expect(abstractFromInvertedIndex(null)).toBe("");
  });

  it("shifts the publication date forward by one day", () => {
    expect(provider.getPublishDate(work)).toBe("2024-01-15");
  });

  it("extracts canonical fields", () => {
    expect(provider.extractFields(work)).toEqual({
      title: "Deep Learning for Buildings",
      link: "https://doi.org/10.1000/xyz",
      authors: "Alice, Bob",
      rawDescription: "We detect buildings",
    });
  });

  it("links to the landing page when there is no DOI", () => {
    expect(provider.extractFields({ ...work, doi: null }).link).toBe(
      "https://example.org/paper",
    );
  });

  it("builds a works query for one journal", () => {
    const url = new URL(
      openAlexWorksUrl({
        issn: "2072-4292",
        today: "2024-01-15",
        daysBack: 2,
        perPage: 50,
        mailto: "digest@example.org",
      }),
    );
    expect(url.origin + url.pathname).toBe("https://api.openalex.org/works");
    expect(url.searchParams.get("filter")).toBe(
      "primary_location.source.issn:2072-4292,from_publication_date:2024-01-13",
    );
    expect(url.searchParams.get("sort")).toBe("publication_date:desc");
    expect(url.searchParams.get("per-page")).toBe("50");
    expect(url.searchParams.get("mailto")).toBe("digest@example.org");
  });
});
