// =============================================================================
// @paper-courier/shared — Zod schemas for files and remote responses
// =============================================================================
// Everything read from disk or over HTTP is validated here so that adapters
// downstream can trust the shapes they receive.
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Keyword file
// ---------------------------------------------------------------------------

const keywordListSchema = z
  .array(z.union([z.string().min(1), z.number().transform(String)]))
  .nullish()
  .transform((v) => v ?? []);

/** Only `fixed` and `variable` groups are known; anything else is rejected */
export const KeywordFileSchema = z
  .object({
    fixed: keywordListSchema,
    variable: keywordListSchema,
  })
  .strict();

export type KeywordFile = z.infer<typeof KeywordFileSchema>;

// ---------------------------------------------------------------------------
// Microsoft Translator v3 response
// ---------------------------------------------------------------------------

/** `[{ translations: [{ text, to }] }]`, one outer entry per input text */
export const MicrosoftTranslateResponseSchema = z
  .array(
    z.object({
      translations: z
        .array(z.object({ text: z.string(), to: z.string().optional() }))
        .min(1),
    }),
  )
  .min(1);

// ---------------------------------------------------------------------------
// OpenAlex works API
// ---------------------------------------------------------------------------

export const OpenAlexWorkSchema = z.object({
  doi: z.string().nullish(),
  title: z.string().nullish(),
  publication_date: z.string(),
  primary_location: z
    .object({
      landing_page_url: z.string().nullish(),
    })
    .passthrough()
    .nullish(),
  authorships: z
    .array(
      z
        .object({
          author: z.object({ display_name: z.string().nullish() }).passthrough(),
        })
        .passthrough(),
    )
    .nullish(),
  abstract_inverted_index: z.record(z.array(z.number().int())).nullish(),
});

export type OpenAlexWork = z.infer<typeof OpenAlexWorkSchema>;

export const OpenAlexResponseSchema = z.object({
  results: z.array(OpenAlexWorkSchema).default([]),
});
