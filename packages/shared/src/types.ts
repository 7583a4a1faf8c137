// =============================================================================
// @paper-courier/shared — Domain types for the article pipeline
// =============================================================================
// Covers the canonical article record produced by feed adapters, the enriched
// record consumed by the block builder, rendered Slack blocks, and the
// constrained string unions used by configuration.
// =============================================================================

import type {
  DividerBlock,
  HeaderBlock,
  RichTextBlock,
  MessageAttachment,
} from "@slack/types";

// ---------------------------------------------------------------------------
// Enums & Union Types
// ---------------------------------------------------------------------------

/** Feed families with a registered adapter */
export type PublisherKind = "arxiv" | "mdpi" | "openalex";

/** How an article's description is produced */
export type EnrichMode = "summarize" | "translate" | "auto";

/** Which enrichment produced an EnrichedArticle's description */
export type EnrichmentKind = "summary" | "translation";

/** Outgoing Slack message layout */
export type MessageFormat = "blocks" | "attachment";

/** A calendar date in UTC, formatted YYYY-MM-DD */
export type UtcDate = string;

// ---------------------------------------------------------------------------
// Articles
// ---------------------------------------------------------------------------

/** Provider-independent article record, created once per feed entry */
export interface CanonicalArticle {
  readonly title: string;
  readonly link: string;
  readonly authors: string;
  readonly rawDescription: string;
}

export interface EnrichedArticle extends CanonicalArticle {
  /** Translated or summarized text, already normalized for Slack */
  readonly description: string;
  readonly enrichment: EnrichmentKind;
}

// ---------------------------------------------------------------------------
// Keyword patterns
// ---------------------------------------------------------------------------

/** Compiled keyword matchers, loaded once per run */
export type PatternSet = readonly RegExp[];

/** Keyword groups as written in the keyword file */
export interface KeywordGroups {
  /** Case-sensitive expressions */
  fixed: string[];
  /** Case-insensitive expressions; multi-word entries also match without spaces */
  variable: string[];
}

// ---------------------------------------------------------------------------
// Rendered messages
// ---------------------------------------------------------------------------

export type MessageBlock = DividerBlock | HeaderBlock | RichTextBlock;

export interface AttachmentField {
  title: string;
  value: string;
  short: boolean;
}

/** Legacy layout: mrkdwn header text plus one colored attachment */
export interface AttachmentMessage {
  text: string;
  attachments: MessageAttachment[];
}

/** One rendered article, ready for the posting collaborator */
export type OutgoingMessage =
  | { format: "blocks"; text: string; blocks: MessageBlock[] }
  | ({ format: "attachment" } & AttachmentMessage);

/** A Slack workspace token paired with the channel it posts to */
export interface SlackTarget {
  token: string;
  channel: string;
}
