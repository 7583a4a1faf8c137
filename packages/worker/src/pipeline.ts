// =============================================================================
// @paper-courier/worker — One digest pass
// =============================================================================
// For every configured publisher genre: load the feed, walk its matching
// entries, enrich each match, render it and post it to every Slack target.
// Articles are handled strictly one after another so that Gemini calls never
// overlap. A failing feed or post is logged and the run carries on.
// =============================================================================

import {
  NO_MATCH,
  buildAttachmentMessage,
  buildMessageBlocks,
  errorMessage,
  loadSource,
  type EnrichedArticle,
  type Logger,
  type MatchingSource,
  type MessageFormat,
  type OutgoingMessage,
  type PatternSet,
  type PublisherKind,
  type PublisherMap,
  type SlackTarget,
  type SourceContext,
  type TextEnricher,
} from "@paper-courier/shared";
import type { MessagePoster } from "./slack.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DigestDependencies {
  publishers: PublisherMap;
  patterns: PatternSet;
  enricher: TextEnricher;
  poster: MessagePoster;
  targets: SlackTarget[];
  format: MessageFormat;
  sourceContext: SourceContext;
  logger: Logger;
  /** Override feed loading; defaults to the publisher registry */
  loadSource?: (
    kind: PublisherKind,
    genre: string,
    ctx: SourceContext,
  ) => Promise<MatchingSource>;
}

export interface DigestResult {
  sources: number;
  failedSources: number;
  stale: number;
  matched: number;
  skipped: number;
  posted: number;
  failedPosts: number;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export function renderMessage(
  article: EnrichedArticle,
  format: MessageFormat,
  index: number,
): OutgoingMessage {
  if (format === "attachment") {
    return { format, ...buildAttachmentMessage(article, index) };
  }
  return { format, text: article.title, blocks: buildMessageBlocks(article) };
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

function publisherGenres(
  publishers: PublisherMap,
): Array<[PublisherKind, string]> {
  const kinds: PublisherKind[] = ["arxiv", "mdpi", "openalex"];
  return kinds.flatMap((kind) =>
    (publishers[kind] ?? []).map((genre): [PublisherKind, string] => [kind, genre]),
  );
}

export async function runDigest(deps: DigestDependencies): Promise<DigestResult> {
  const { logger } = deps;
  const load = deps.loadSource ?? loadSource;
  const result: DigestResult = {
    sources: 0,
    failedSources: 0,
    stale: 0,
    matched: 0,
    skipped: 0,
    posted: 0,
    failedPosts: 0,
  };

  for (const [kind, genre] of publisherGenres(deps.publishers)) {
    result.sources++;
    let source: MatchingSource;
    try {
      source = await load(kind, genre, deps.sourceContext);
    } catch (err) {
      result.failedSources++;
      logger.error("Feed load failed", {
        publisher: kind,
        genre,
        error: errorMessage(err),
      });
      continue;
    }
    logger.info("Feed loaded", { source: source.label, entries: source.size });

    for (const item of source.iterateMatching(deps.patterns)) {
      if (item === NO_MATCH) {
        result.stale++;
        continue;
      }

      result.matched++;
      logger.info("Progress", { source: source.label, matched: result.matched });

      const article = await deps.enricher.enrich(item);
      if (!article.description) {
        result.skipped++;
        logger.info("Skipping article without description", {
          link: article.link,
        });
        continue;
      }

      const message = renderMessage(article, deps.format, result.matched - 1);
      for (const target of deps.targets) {
        try {
          await deps.poster.post(target, message);
          result.posted++;
        } catch (err) {
          result.failedPosts++;
          logger.error("Post failed", {
            channel: target.channel,
            link: article.link,
            error: errorMessage(err),
          });
        }
      }
    }
  }

  logger.info("Digest complete", { ...result });
  return result;
}
