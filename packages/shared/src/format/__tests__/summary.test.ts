import { describe, it, expect } from "vitest";
import {
  extractAfterMarker,
  normalizeForChat,
  summaryToFields,
} from "../summary.js";

describe("extractAfterMarker", () => {
  it("returns the suffix starting at the last occurrence", () => {
    expect(extractAfterMarker("noise *M* keep *M* tail", "*M*")).toBe("*M* tail");
  });

  it("returns the whole text when the marker is at the start", () => {
    expect(extractAfterMarker("*M* only", "*M*")).toBe("*M* only");
  });

  it("returns undefined when the marker is absent", () => {
    expect(extractAfterMarker("no marker here", "*M*")).toBeUndefined();
  });

  it("drops model preamble before the summary heading", () => {
    const raw = "はい、要約します。\n\n*研究の概要*\n目的\n\n#a";
    expect(extractAfterMarker(raw, "*研究の概要*")).toBe("*研究の概要*\n目的\n\n#a");
  });
});

describe("normalizeForChat", () => {
  it("returns an empty string for absent input", () => {
    expect(normalizeForChat(undefined)).toBe("");
    expect(normalizeForChat(null)).toBe("");
    expect(normalizeForChat("")).toBe("");
  });

  it("normalizes CRLF and CR line endings and trims", () => {
    expect(normalizeForChat("  a\r\nb\rc \n")).toBe("a\nb\nc");
  });

  it("converts both Markdown bold dialects to single asterisks", () => {
    expect(normalizeForChat("**Title** and __other__")).toBe("*Title* and *other*");
  });

  it("leaves text without emphasis untouched", () => {
    const plain = "Results: 3 * 4 = 12\n\n#remote-sensing";
    expect(normalizeForChat(plain)).toBe(plain);
  });

  it("does not join bold markers across lines", () => {
    expect(normalizeForChat("**a\nb**")).toBe("**a\nb**");
  });

  it("collapses nested runs completely", () => {
    expect(normalizeForChat("***x***")).toBe("*x*");
  });

  it("is idempotent", () => {
    const inputs = [
      "**bold** __under__\r\n",
      "***x***",
      "____y____",
      "plain text",
      "*already* slack",
      "**a** **b**\n\n__c__",
    ];
    for (const input of inputs) {
      const once = normalizeForChat(input);
      expect(normalizeForChat(once)).toBe(once);
    }
  });
});

describe("summaryToFields", () => {
  it("splits ## sections and spaces out list items", () => {
    const summary = [
      "## 概要",
      "This paper studies X.",
      "## 手法",
      "Steps:",
      "1. first",
      "2. second",
      "## 結果",
      "Bullets:",
      "- one",
    ].join("\n");

    expect(summaryToFields(summary)).toEqual([
      { title: "概要", value: "This paper studies X.", short: false },
      { title: "手法", value: "Steps:\n\n1. first\n\n2. second", short: false },
      { title: "結果", value: "Bullets:\n\n- one", short: false },
    ]);
  });

  it("drops sections with an empty body", () => {
    expect(summaryToFields("## Empty\n\n## Kept\nbody")).toEqual([
      { title: "Kept", value: "body", short: false },
    ]);
  });

  it("falls back to blank-line paragraphs and skips the tag paragraph", () => {
    expect(summaryToFields("*背景*\n課題。\n\n*結果*\n\n#cv")).toEqual([
      { title: "背景", value: "課題。", short: false },
    ]);
  });

  it("returns no fields for text without headings", () => {
    expect(summaryToFields("just text")).toEqual([]);
  });
});
