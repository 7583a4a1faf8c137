// =============================================================================
// @paper-courier/shared — EnrichedArticle → Slack Block Kit blocks
// =============================================================================
// Fixed layout: divider, header (split in two for long titles), the article
// link, a hashtag line, then one bold-titled section per description
// paragraph. Paragraphs are separated by a blank line; the last paragraph of
// the description is reserved for hashtags.
// =============================================================================

import type {
  DividerBlock,
  HeaderBlock,
  RichTextBlock,
  RichTextSection,
  RichTextText,
} from "@slack/types";
import type { EnrichedArticle, MessageBlock } from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Slack rejects header text longer than this */
export const HEADER_MAX_LENGTH = 150;

const PARAGRAPH_SEPARATOR = "\n\n";

/** Bold heading above a translated abstract */
export const TRANSLATION_HEADING = "Abstract";
const ELLIPSIS = "…";

// ---------------------------------------------------------------------------
// Text helpers
// ---------------------------------------------------------------------------

export function splitParagraphs(description: string): string[] {
  return description.split(PARAGRAPH_SEPARATOR);
}

/**
 * Split a title into at most two header lines. Long titles break at the last
 * space at or before HEADER_MAX_LENGTH (the space is dropped); without one
 * they are cut hard at HEADER_MAX_LENGTH.
 */
export function splitTitle(title: string): string[] {
  if (title.length <= HEADER_MAX_LENGTH) return [title];

  const space = title.lastIndexOf(" ", HEADER_MAX_LENGTH);
  const [head, tail] =
    space > 0
      ? [title.slice(0, space).trimEnd(), title.slice(space + 1).trim()]
      : [title.slice(0, HEADER_MAX_LENGTH), title.slice(HEADER_MAX_LENGTH).trim()];

  // Slack rejects an empty header
  if (!tail) return [head];
  return [head, truncate(tail, HEADER_MAX_LENGTH)];
}

function truncate(text: string, max: number): string {
  return text.length <= max ? text : text.slice(0, max - ELLIPSIS.length) + ELLIPSIS;
}

/** Tags in the last paragraph: whitespace removed, split on '#', empties dropped */
export function parseHashtags(description: string): string[] {
  const paragraphs = splitParagraphs(description);
  const last = paragraphs[paragraphs.length - 1] ?? "";
  return last
    .replace(/\s+/g, "")
    .split("#")
    // text before the first '#' is not a tag
    .slice(1)
    .filter((tag) => tag.length > 0);
}

export interface DescriptionSection {
  title: string;
  text: string;
}

/** Every paragraph but the last: first line is the title, the rest the body */
export function parseSections(description: string): DescriptionSection[] {
  return splitParagraphs(description)
    .slice(0, -1)
    .map((paragraph) => {
      const [title, ...body] = paragraph.split("\n");
      return { title, text: body.join("\n") };
    });
}

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

export function dividerBlock(): DividerBlock {
  return { type: "divider" };
}

export function headerBlocks(title: string): HeaderBlock[] {
  return splitTitle(title).map((text): HeaderBlock => ({
    type: "header",
    text: { type: "plain_text", text },
  }));
}

export function linkBlock(url: string): RichTextBlock {
  return {
    type: "rich_text",
    elements: [
      {
        type: "rich_text_section",
        elements: [{ type: "link", url }],
      },
    ],
  };
}

export function hashtagBlock(tags: readonly string[]): RichTextBlock {
  if (tags.length === 0) {
    return { type: "rich_text", elements: [] };
  }

  const elements: RichTextText[] = [];
  tags.forEach((tag, i) => {
    if (i > 0) elements.push({ type: "text", text: " " });
    elements.push({
      type: "text",
      text: `#${tag}`,
      style: { italic: true, code: true },
    });
  });

  return {
    type: "rich_text",
    elements: [{ type: "rich_text_section", elements }],
  };
}

export function bodyBlock(sections: readonly DescriptionSection[]): RichTextBlock {
  const elements = sections.map((section): RichTextSection => ({
    type: "rich_text_section",
    elements: [
      { type: "text", text: `${section.title}\n`, style: { bold: true } },
      { type: "text", text: section.text },
    ],
  }));
  return { type: "rich_text", elements };
}

/**
 * Render an enriched article as [divider, header(s), link, hashtags, body].
 * A translation carries no section or tag structure, so it becomes a single
 * body section under TRANSLATION_HEADING with no tags.
 */
export function buildMessageBlocks(article: EnrichedArticle): MessageBlock[] {
  const translated = article.enrichment === "translation";
  return [
    dividerBlock(),
    ...headerBlocks(article.title),
    linkBlock(article.link),
    hashtagBlock(translated ? [] : parseHashtags(article.description)),
    bodyBlock(
      translated
        ? [{ title: TRANSLATION_HEADING, text: article.description }]
        : parseSections(article.description),
    ),
  ];
}
