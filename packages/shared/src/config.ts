// =============================================================================
// @paper-courier/shared — Environment variable config with validation
// =============================================================================
// Loads configuration from environment variables with sensible defaults.
// GEMINI_API_KEY is required unless ENRICH_MODE is "translate". PUBLISHERS is
// validated as JSON. Slack tokens and channels are collected from every
// variable whose name contains SLACK_API_TOKEN / POST_CHANNEL, sorted by name
// and paired by position; at least one pair is required and the counts must
// match, so one digest can go to several channels.
// =============================================================================

import { z } from "zod";
import { DEFAULT_SUMMARY_PROMPT, DEFAULT_SUMMARY_MARKER } from "./enrich/prompt.js";
import type { PublisherKind, SlackTarget } from "./types.js";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const publisherKindSchema = z.enum(["arxiv", "mdpi", "openalex"]);

const publisherMapSchema = z.record(
  publisherKindSchema,
  z.array(z.string().min(1)).min(1),
);

/**
 * JSON string that parses to a map of publisher -> genres.
 * Genres are arXiv categories, MDPI journal codes or OpenAlex ISSNs.
 * Example: '{"arxiv": ["cs.CV"], "mdpi": ["remotesensing"]}'
 */
const publishersSchema = z.string().transform((val, ctx) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(val);
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "PUBLISHERS must be valid JSON",
    });
    return z.NEVER;
  }
  const result = publisherMapSchema.safeParse(parsed);
  if (!result.success) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `PUBLISHERS must map arxiv/mdpi/openalex to non-empty genre lists: ${result.error.issues
        .map((i) => i.message)
        .join("; ")}`,
    });
    return z.NEVER;
  }
  return result.data;
});

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const configSchema = z
  .object({
    // Optional with defaults
    GEMINI_API_KEY: z.string().min(1).optional(),
    GEMINI_MODEL: z.string().default("gemini-2.5-flash"),
    GEMINI_FALLBACK_MODEL: z.string().default("gemini-2.5-flash-lite"),
    SUMMARY_PROMPT: z.string().min(1).default(DEFAULT_SUMMARY_PROMPT),
    SUMMARY_MARKER: z.string().min(1).default(DEFAULT_SUMMARY_MARKER),
    DEEPL_API_KEY: z.string().min(1).optional(),
    MS_TRANSLATE_KEY: z.string().min(1).optional(),
    MS_TRANSLATE_REGION: z.string().min(1).optional(),
    ENRICH_MODE: z.enum(["summarize", "translate", "auto"]).default("auto"),
    MESSAGE_FORMAT: z.enum(["blocks", "attachment"]).default("blocks"),
    KEYWORD_FILE: z.string().min(1).default("keyword.yml"),
    PUBLISHERS: publishersSchema.default(
      '{"arxiv":["cs.CV"],"mdpi":["remotesensing"]}',
    ),
    OPENALEX_DAYS_BACK: z.coerce.number().int().min(0).default(2),
    OPENALEX_PER_PAGE: z.coerce.number().int().min(1).max(200).default(200),
    OPENALEX_MAILTO: z.string().email().optional(),
    LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal"])
      .default("info"),
    CRON_ENABLED: booleanFlag,
    CRON_SCHEDULE: z.string().default("0 3 * * *"),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.ENRICH_MODE !== "translate" && !cfg.GEMINI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GEMINI_API_KEY"],
        message: `GEMINI_API_KEY is required when ENRICH_MODE is "${cfg.ENRICH_MODE}"`,
      });
    }
  });

// ---------------------------------------------------------------------------
// Exported type
// ---------------------------------------------------------------------------

export type Config = z.infer<typeof configSchema> & {
  SLACK_TARGETS: SlackTarget[];
};

export type PublisherMap = Partial<Record<PublisherKind, string[]>>;

// ---------------------------------------------------------------------------
// Slack targets
// ---------------------------------------------------------------------------

function collectByName(
  env: Record<string, string | undefined>,
  name: string,
): string[] {
  return Object.keys(env)
    .filter((key) => key.includes(name))
    .sort()
    .map((key) => env[key])
    .filter((value): value is string => value !== undefined && value !== "");
}

const slackTargetsSchema = z
  .object({
    tokens: z.array(z.string()).min(1, "At least one SLACK_API_TOKEN is required"),
    channels: z.array(z.string()).min(1, "At least one POST_CHANNEL is required"),
  })
  .refine((v) => v.tokens.length === v.channels.length, {
    message: "SLACK_API_TOKEN* and POST_CHANNEL* variables must pair up one to one",
  })
  .transform(({ tokens, channels }) =>
    tokens.map((token, i) => ({ token, channel: channels[i] })),
  );

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Load and validate configuration from environment variables.
 *
 * Throws a ZodError with detailed messages if any required variable is
 * missing or any value fails validation.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  const base = configSchema.parse(env);
  const targets = slackTargetsSchema.parse({
    tokens: collectByName(env, "SLACK_API_TOKEN"),
    channels: collectByName(env, "POST_CHANNEL"),
  });
  return { ...base, SLACK_TARGETS: targets };
}
