// =============================================================================
// @paper-courier/shared — Keyword file loading and pattern compilation
// =============================================================================
// The keyword file is YAML with two groups:
//
//   fixed:      # case-sensitive, e.g. acronyms
//     - SAR
//   variable:   # case-insensitive; "deep learning" also matches "deeplearning"
//     - deep learning
//
// Entries are regular-expression sources. Unknown groups or invalid
// expressions raise ConfigError before the run touches the network.
// =============================================================================

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { ZodError } from "zod";
import { KeywordFileSchema } from "./schemas.js";
import { ConfigError, errorMessage } from "./errors.js";
import type { KeywordGroups, PatternSet } from "./types.js";

export function parseKeywordGroups(source: string): KeywordGroups {
  let document: unknown;
  try {
    document = parse(source);
  } catch (err) {
    throw new ConfigError(`Keyword file is not valid YAML: ${errorMessage(err)}`);
  }

  try {
    return KeywordFileSchema.parse(document ?? {});
  } catch (err) {
    if (err instanceof ZodError) {
      const detail = err.issues
        .map((issue) =>
          issue.code === "unrecognized_keys"
            ? `unknown keyword group(s): ${issue.keys.join(", ")}`
            : `${issue.path.join(".") || "<root>"}: ${issue.message}`,
        )
        .join("; ");
      throw new ConfigError(`Invalid keyword file: ${detail}`);
    }
    throw err;
  }
}

function compile(source: string, flags: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (err) {
    throw new ConfigError(`Invalid keyword "${source}": ${errorMessage(err)}`);
  }
}

/** Compile keyword groups into an ordered, de-duplicated pattern set. */
export function compilePatterns(groups: KeywordGroups): PatternSet {
  const seen = new Set<string>();
  const patterns: RegExp[] = [];

  function add(source: string, flags: string): void {
    const key = `${flags}/${source}`;
    if (seen.has(key)) return;
    seen.add(key);
    patterns.push(compile(source, flags));
  }

  for (const keyword of groups.fixed) add(keyword, "");
  for (const keyword of groups.variable) {
    add(keyword, "i");
    if (/\s/.test(keyword.trim())) add(keyword.replace(/\s+/g, ""), "i");
  }
  return patterns;
}

export async function loadPatternSet(path: string): Promise<PatternSet> {
  let source: string;
  try {
    source = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read keyword file ${path}: ${errorMessage(err)}`);
  }
  return compilePatterns(parseKeywordGroups(source));
}

export function matchesAny(title: string, patterns: PatternSet): boolean {
  return patterns.some((pattern) => pattern.test(title));
}
