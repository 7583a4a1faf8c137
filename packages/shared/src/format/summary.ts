// =============================================================================
// @paper-courier/shared — Summary post-processing for Slack mrkdwn
// =============================================================================
// Pure text transforms applied to model output: drop any preamble before the
// expected section marker, normalize line endings, and turn Markdown bold
// (**x**, __x__) into Slack's *x*.
// =============================================================================

import type { AttachmentField } from "../types.js";
import { parseSections } from "./blocks.js";

const DOUBLE_ASTERISK_BOLD = /\*\*(.+?)\*\*/g;
const DOUBLE_UNDERSCORE_BOLD = /__(.+?)__/g;

/**
 * Suffix of `text` starting at the last occurrence of `marker`, or undefined
 * when the marker does not occur.
 */
export function extractAfterMarker(
  text: string,
  marker: string,
): string | undefined {
  const idx = text.lastIndexOf(marker);
  if (idx === -1) return undefined;
  return text.slice(idx);
}

function convertBold(s: string): string {
  return s
    .replace(DOUBLE_ASTERISK_BOLD, "*$1*")
    .replace(DOUBLE_UNDERSCORE_BOLD, "*$1*");
}

/**
 * Normalize model output for Slack: LF line endings, trimmed, Markdown bold
 * converted to single-asterisk bold. Idempotent; absent input gives "".
 */
export function normalizeForChat(text: string | undefined | null): string {
  if (!text) return "";

  let s = text.replace(/\r\n/g, "\n").replace(/\r/g, "\n").trim();

  // Runs like ***x*** only collapse fully over several passes
  for (let next = convertBold(s); next !== s; next = convertBold(s)) {
    s = next;
  }
  return s;
}

// ---------------------------------------------------------------------------
// Legacy attachment fields
// ---------------------------------------------------------------------------

const SECTION_PATTERN = /^##\s+([^\n]+)\n([\s\S]*?)(?=\n##\s+|(?![\s\S]))/gm;

function spaceListItems(value: string): string {
  return value
    .replace(/([^\n])\n(\d+\.)/g, "$1\n\n$2")
    .replace(/([^\n])\n([-*]\s)/g, "$1\n\n$2");
}

/** "*見出し*" → "見出し"; field titles are plain text */
function plainHeading(title: string): string {
  return title.trim().replace(/^\*(.+)\*$/, "$1");
}

/**
 * Split a summary into attachment fields. `## heading` sections are used when
 * present; otherwise blank-line paragraphs whose first line is the heading,
 * with the final hashtag paragraph left out. List items get a blank line
 * before them so Slack renders them on separate lines. Sections with an empty
 * heading or body are dropped.
 */
export function summaryToFields(summary: string): AttachmentField[] {
  const normalized = summary.replace(/\r\n/g, "\n").replace(/\r/g, "\n").trim();

  const headed = [...normalized.matchAll(SECTION_PATTERN)].map((match) => ({
    title: match[1],
    text: match[2],
  }));
  const sections = headed.length > 0 ? headed : parseSections(normalized);

  const fields: AttachmentField[] = [];
  for (const section of sections) {
    const title = plainHeading(section.title);
    const value = spaceListItems(section.text.trim());
    if (!title || !value) continue;
    fields.push({ title, value, short: false });
  }
  return fields;
}
