// =============================================================================
// @paper-courier/shared — Gemini summarization with rate-limit pacing
// =============================================================================
// Asks Gemini to read the article URL (url_context tool, temperature 0) and
// write a structured Japanese summary. Each successful call is followed by a
// blocking pause so the next request starts no earlier than the model's
// per-minute quota allows. A 429 from the primary model is retried once on the
// lighter model; every other failure yields no summary.
// =============================================================================

import { ApiError, GoogleGenAI } from "@google/genai";
import { errorMessage } from "../errors.js";
import { logExternalCall, silentLogger, type Logger } from "../logger.js";
import { extractAfterMarker, normalizeForChat } from "../format/summary.js";
import {
  monotonicNow,
  rateLimitDelayMs,
  sleep,
  type ClockFn,
  type SleepFn,
} from "./rate-limit.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Seconds between request starts on the primary model (5 RPM free tier) */
const PRIMARY_FLOOR_SECONDS = 12;

/** Seconds between request starts on the light model (10 RPM free tier) */
const LIGHT_FLOOR_SECONDS = 6;

const RATE_LIMITED_STATUS = 429;

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

/** The one Gemini capability the summarizer needs */
export interface GenerativeModel {
  generate(model: string, contents: string): Promise<string | undefined>;
}

export function createGeminiModel(apiKey: string): GenerativeModel {
  const ai = new GoogleGenAI({ apiKey });
  return {
    async generate(model, contents) {
      const response = await ai.models.generateContent({
        model,
        contents,
        config: {
          tools: [{ urlContext: {} }],
          temperature: 0,
        },
      });
      return response.text;
    },
  };
}

export function isRateLimited(err: unknown): boolean {
  return err instanceof ApiError && err.status === RATE_LIMITED_STATUS;
}

// ---------------------------------------------------------------------------
// Summarizer
// ---------------------------------------------------------------------------

export interface ArticleSummarizerOptions {
  model: GenerativeModel;
  prompt: string;
  marker: string;
  primaryModel: string;
  lightModel: string;
  logger?: Logger;
  sleepFn?: SleepFn;
  now?: ClockFn;
}

export class ArticleSummarizer {
  private readonly logger: Logger;
  private readonly sleepFn: SleepFn;
  private readonly now: ClockFn;

  constructor(private readonly options: ArticleSummarizerOptions) {
    this.logger = options.logger ?? silentLogger;
    this.sleepFn = options.sleepFn ?? sleep;
    this.now = options.now ?? monotonicNow;
  }

  /**
   * Summarize the article at `link`. Resolves to the normalized text that
   * follows the summary marker, or "" when there is no usable summary.
   */
  async summarize(link: string): Promise<string> {
    try {
      const raw = await this.generate(link);
      const extracted =
        raw === undefined ? undefined : extractAfterMarker(raw, this.options.marker);
      if (raw !== undefined && extracted === undefined) {
        this.logger.info("Summary marker not found", {
          link,
          marker: this.options.marker,
        });
      }
      return normalizeForChat(extracted);
    } catch (err) {
      this.logger.warn("Summarization failed", {
        link,
        error: errorMessage(err),
      });
      return "";
    }
  }

  /** Raw model output; undefined when the model gave nothing usable */
  private async generate(link: string): Promise<string | undefined> {
    const contents = `${this.options.prompt}${link}`;
    try {
      return await this.paced(this.options.primaryModel, contents, PRIMARY_FLOOR_SECONDS);
    } catch (err) {
      if (!isRateLimited(err)) {
        this.logger.warn("Gemini request failed", {
          model: this.options.primaryModel,
          error: errorMessage(err),
        });
        return undefined;
      }
      this.logger.warn("Gemini rate limited, retrying on light model", {
        model: this.options.primaryModel,
        fallback: this.options.lightModel,
      });
      return this.paced(this.options.lightModel, contents, LIGHT_FLOOR_SECONDS);
    }
  }

  private async paced(
    model: string,
    contents: string,
    floorSeconds: number,
  ): Promise<string | undefined> {
    const start = this.now();
    let text: string | undefined;
    try {
      text = await this.options.model.generate(model, contents);
    } catch (err) {
      logExternalCall(
        this.logger,
        "gemini",
        model,
        Math.round(this.now() - start),
        errorMessage(err),
      );
      throw err;
    }
    const elapsedMs = this.now() - start;
    logExternalCall(this.logger, "gemini", model, Math.round(elapsedMs));
    await this.sleepFn(rateLimitDelayMs(elapsedMs, floorSeconds));
    return text;
  }
}
