// =============================================================================
// @paper-courier/shared — Publisher registry
// =============================================================================
// Maps each configured publisher kind to a loader that fetches one genre's
// entries and wraps them in an ArticleSource. Selection is a plain lookup in
// a typed table, so an unknown publisher is rejected by config validation.
// =============================================================================

import type { PublisherKind } from "../types.js";
import { ArticleSource } from "./article-source.js";
import { ArxivProvider, arxivFeedUrl, toArxivEntry } from "./arxiv.js";
import { MdpiProvider, mdpiFeedUrl, toMdpiEntry } from "./mdpi.js";
import { OpenAlexProvider, openAlexWorksUrl } from "./openalex.js";
import { fetchOpenAlexWorks, fetchRssFeed, timedFetch } from "./fetch.js";
import type { MatchingSource, SourceContext } from "./types.js";

export type SourceLoader = (
  genre: string,
  ctx: SourceContext,
) => Promise<MatchingSource>;

const loadArxiv: SourceLoader = async (category, ctx) => {
  const url = arxivFeedUrl(category);
  const feed = await timedFetch(ctx.logger, "rss", url, () =>
    (ctx.fetchRss ?? fetchRssFeed)(url),
  );
  return new ArticleSource(
    new ArxivProvider(feed.updated),
    feed.items.map(toArxivEntry),
    { today: ctx.today, label: `arxiv:${category}`, logger: ctx.logger },
  );
};

const loadMdpi: SourceLoader = async (journal, ctx) => {
  const url = mdpiFeedUrl(journal);
  const feed = await timedFetch(ctx.logger, "rss", url, () =>
    (ctx.fetchRss ?? fetchRssFeed)(url),
  );
  return new ArticleSource(new MdpiProvider(), feed.items.map(toMdpiEntry), {
    today: ctx.today,
    label: `mdpi:${journal}`,
    logger: ctx.logger,
  });
};

const loadOpenAlex: SourceLoader = async (issn, ctx) => {
  const url = openAlexWorksUrl({
    issn,
    today: ctx.today,
    daysBack: ctx.openAlex.daysBack,
    perPage: ctx.openAlex.perPage,
    mailto: ctx.openAlex.mailto,
  });
  const works = await timedFetch(ctx.logger, "openalex", url, () =>
    fetchOpenAlexWorks(url, ctx.fetchFn),
  );
  return new ArticleSource(new OpenAlexProvider(), works, {
    today: ctx.today,
    label: `openalex:${issn}`,
    logger: ctx.logger,
  });
};

export const SOURCE_LOADERS: Readonly<Record<PublisherKind, SourceLoader>> = {
  arxiv: loadArxiv,
  mdpi: loadMdpi,
  openalex: loadOpenAlex,
};

export function loadSource(
  kind: PublisherKind,
  genre: string,
  ctx: SourceContext,
): Promise<MatchingSource> {
  return SOURCE_LOADERS[kind](genre, ctx);
}
