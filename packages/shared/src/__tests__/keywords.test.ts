import { describe, it, expect } from "vitest";
import {
  compilePatterns,
  matchesAny,
  parseKeywordGroups,
} from "../keywords.js";
import { ConfigError } from "../errors.js";

describe("parseKeywordGroups", () => {
  it("reads both groups", () => {
    const groups = parseKeywordGroups(
      ["fixed:", "  - SAR", "variable:", "  - deep learning", "  - 3"].join("\n"),
    );
    expect(groups).toEqual({ fixed: ["SAR"], variable: ["deep learning", "3"] });
  });

  it("treats missing or empty groups as empty", () => {
    expect(parseKeywordGroups("fixed:\n")).toEqual({ fixed: [], variable: [] });
    expect(parseKeywordGroups("")).toEqual({ fixed: [], variable: [] });
  });

  it("rejects unknown groups", () => {
    expect(() => parseKeywordGroups("fixed: [SAR]\ntopics: [x]")).toThrow(ConfigError);
    expect(() => parseKeywordGroups("fixed: [SAR]\ntopics: [x]")).toThrow(
      "unknown keyword group(s): topics",
    );
  });

  it("rejects invalid YAML", () => {
    expect(() => parseKeywordGroups("fixed: [SAR")).toThrow(
      /^Keyword file is not valid YAML/,
    );
  });
});

describe("compilePatterns", () => {
  const patterns = compilePatterns({
    fixed: ["SAR"],
    variable: ["deep learning", "deep learning"],
  });

  it("adds a no-space variant for multi-word variable keywords", () => {
    expect(patterns.map(String)).toEqual(["/SAR/", "/deep learning/i", "/deeplearning/i"]);
  });

  it("matches fixed keywords case-sensitively", () => {
    expect(matchesAny("SAR imaging of ice", patterns)).toBe(true);
    expect(matchesAny("sar imaging of ice", patterns)).toBe(false);
  });

  it("matches variable keywords in any case, with or without the space", () => {
    expect(matchesAny("Deep Learning for X", patterns)).toBe(true);
    expect(matchesAny("DeepLearning for X", patterns)).toBe(true);
    expect(matchesAny("Shallow methods", patterns)).toBe(false);
  });

  it("rejects invalid expressions", () => {
    expect(() => compilePatterns({ fixed: ["("], variable: [] })).toThrow(ConfigError);
  });
});
