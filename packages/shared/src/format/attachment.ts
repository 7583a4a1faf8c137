import type {
  AttachmentField,
  AttachmentMessage,
  EnrichedArticle,
} from "../types.js";
import { summaryToFields } from "./summary.js";

/** Attachment side-bar colors, cycled per posted article */
export const ATTACHMENT_COLORS = [
  "#d7003a",
  "#f6ad49",
  "#ffdb4f",
  "#00a381",
  "#89c3eb",
  "#bbc8e6",
  "#a59aca",
] as const;

export function attachmentHeader(article: EnrichedArticle): string {
  return `*${article.title}*\n${article.link}\n${article.authors}\n`;
}

function attachmentFields(article: EnrichedArticle): AttachmentField[] {
  if (article.enrichment === "translation") {
    return [
      { title: "English", value: article.rawDescription, short: true },
      { title: "Japanese", value: article.description, short: true },
    ];
  }
  return summaryToFields(article.description);
}

/**
 * Legacy layout: mrkdwn header text plus an "Abstract" attachment.
 * `index` is the article's position in the run and picks the color.
 */
export function buildAttachmentMessage(
  article: EnrichedArticle,
  index: number,
): AttachmentMessage {
  return {
    text: attachmentHeader(article),
    attachments: [
      {
        title: "Abstract",
        fields: attachmentFields(article),
        color: ATTACHMENT_COLORS[index % ATTACHMENT_COLORS.length],
      },
    ],
  };
}
