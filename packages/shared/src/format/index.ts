export {
  extractAfterMarker,
  normalizeForChat,
  summaryToFields,
} from "./summary.js";
export {
  HEADER_MAX_LENGTH,
  TRANSLATION_HEADING,
  type DescriptionSection,
  splitParagraphs,
  splitTitle,
  parseHashtags,
  parseSections,
  dividerBlock,
  headerBlocks,
  linkBlock,
  hashtagBlock,
  bodyBlock,
  buildMessageBlocks,
} from "./blocks.js";
export {
  ATTACHMENT_COLORS,
  attachmentHeader,
  buildAttachmentMessage,
} from "./attachment.js";
