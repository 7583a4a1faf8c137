import { errorMessage } from "../errors.js";
import { matchesAny } from "../keywords.js";
import { silentLogger, type Logger } from "../logger.js";
import type { CanonicalArticle, PatternSet, UtcDate } from "../types.js";
import {
  NO_MATCH,
  type FeedProvider,
  type MatchingSource,
  type NoMatch,
} from "./types.js";

export interface ArticleSourceOptions {
  today: UtcDate;
  label?: string;
  logger?: Logger;
}

export class ArticleSource<TEntry> implements MatchingSource {
  readonly label: string;
  private readonly logger: Logger;
  private consumed = false;

  constructor(
    private readonly provider: FeedProvider<TEntry>,
    private readonly entries: readonly TEntry[],
    private readonly options: ArticleSourceOptions,
  ) {
    this.label = options.label ?? provider.kind;
    this.logger = options.logger ?? silentLogger;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Single lazy pass over the entries. Entries published before today yield
   * NO_MATCH; current entries whose parsed title matches any pattern yield
   * their canonical record; other current entries yield nothing.
   */
  *iterateMatching(
    patterns: PatternSet,
  ): Generator<CanonicalArticle | NoMatch, void, undefined> {
    if (this.consumed) {
      throw new Error(`Source ${this.label} has already been iterated`);
    }
    this.consumed = true;

    for (const entry of this.entries) {
      let published: UtcDate;
      try {
        published = this.provider.getPublishDate(entry);
      } catch (err) {
        this.logger.warn("Skipping entry without a usable date", {
          source: this.label,
          error: errorMessage(err),
        });
        yield NO_MATCH;
        continue;
      }

      if (published < this.options.today) {
        yield NO_MATCH;
        continue;
      }

      const title = this.provider.parseTitle(this.provider.rawTitle(entry));
      if (matchesAny(title, patterns)) {
        yield this.provider.extractFields(entry);
      }
    }
  }
}
