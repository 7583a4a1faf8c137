export {
  NO_MATCH,
  type NoMatch,
  type FeedProvider,
  type MatchingSource,
  type RssItem,
  type RssFeed,
  type RssFetcher,
  type SourceContext,
} from "./types.js";
export { addDays, parseUtcDate, toUtcDate, utcToday } from "./dates.js";
export { ArticleSource, type ArticleSourceOptions } from "./article-source.js";
export {
  type ArxivEntry,
  ArxivProvider,
  arxivFeedUrl,
  toArxivEntry,
  parseAuthors,
  parseAbstract,
} from "./arxiv.js";
export { type MdpiEntry, MdpiProvider, mdpiFeedUrl, toMdpiEntry } from "./mdpi.js";
export {
  type OpenAlexQuery,
  OpenAlexProvider,
  openAlexWorksUrl,
  abstractFromInvertedIndex,
} from "./openalex.js";
export { fetchRssFeed, fetchOpenAlexWorks } from "./fetch.js";
export { type SourceLoader, SOURCE_LOADERS, loadSource } from "./registry.js";
