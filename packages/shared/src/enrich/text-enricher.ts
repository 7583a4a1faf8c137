// =============================================================================
// @paper-courier/shared — Article enrichment
// =============================================================================
// Fills an article's description from the configured mode: a Gemini summary
// of the article URL, a translation of the feed abstract, or (auto) a summary
// with translation as the fallback when the summary comes back empty.
// Never throws; an empty description means "skip this article".
// =============================================================================

import type { Config } from "../config.js";
import type {
  CanonicalArticle,
  EnrichedArticle,
  EnrichMode,
} from "../types.js";
import { silentLogger, type Logger } from "../logger.js";
import { errorMessage } from "../errors.js";
import { normalizeForChat } from "../format/summary.js";
import {
  ArticleTranslator,
  createDeepLTranslator,
  createMicrosoftTranslator,
} from "./translate.js";
import { ArticleSummarizer, createGeminiModel } from "./summarize.js";

export interface TextEnricherOptions {
  mode: EnrichMode;
  translator: ArticleTranslator;
  /** Required unless mode is "translate" */
  summarizer?: ArticleSummarizer;
  logger?: Logger;
}

export class TextEnricher {
  private readonly logger: Logger;

  constructor(private readonly options: TextEnricherOptions) {
    this.logger = options.logger ?? silentLogger;
    if (options.mode !== "translate" && !options.summarizer) {
      throw new Error(`Enrich mode "${options.mode}" needs a summarizer`);
    }
  }

  get mode(): EnrichMode {
    return this.options.mode;
  }

  /** Translated text, or `text` unchanged when no provider succeeds */
  async translate(text: string): Promise<string> {
    return normalizeForChat(await this.options.translator.translate(text));
  }

  /** Normalized summary of the article at `link`, or "" */
  async summarize(link: string): Promise<string> {
    if (!this.options.summarizer) return "";
    return this.options.summarizer.summarize(link);
  }

  async enrich(article: CanonicalArticle): Promise<EnrichedArticle> {
    try {
      return await this.enrichByMode(article);
    } catch (err) {
      this.logger.error("Enrichment failed unexpectedly", {
        link: article.link,
        error: errorMessage(err),
      });
      return { ...article, description: "", enrichment: "summary" };
    }
  }

  private async enrichByMode(
    article: CanonicalArticle,
  ): Promise<EnrichedArticle> {
    if (this.options.mode === "translate") {
      return this.translated(article);
    }

    const summary = await this.summarize(article.link);
    if (summary || this.options.mode === "summarize") {
      return { ...article, description: summary, enrichment: "summary" };
    }

    this.logger.info("No summary, translating abstract instead", {
      link: article.link,
    });
    return this.translated(article);
  }

  private async translated(article: CanonicalArticle): Promise<EnrichedArticle> {
    const description = article.rawDescription
      ? await this.translate(article.rawDescription)
      : "";
    return { ...article, description, enrichment: "translation" };
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Wire real providers from configuration; providers without credentials are left out. */
export function createTextEnricher(config: Config, logger: Logger): TextEnricher {
  const translator = new ArticleTranslator({
    primary: config.DEEPL_API_KEY
      ? createDeepLTranslator(config.DEEPL_API_KEY)
      : undefined,
    secondary:
      config.MS_TRANSLATE_KEY && config.MS_TRANSLATE_REGION
        ? createMicrosoftTranslator({
            key: config.MS_TRANSLATE_KEY,
            region: config.MS_TRANSLATE_REGION,
          })
        : undefined,
    logger: logger.child({ component: "translator" }),
  });

  const summarizer = config.GEMINI_API_KEY
    ? new ArticleSummarizer({
        model: createGeminiModel(config.GEMINI_API_KEY),
        prompt: config.SUMMARY_PROMPT,
        marker: config.SUMMARY_MARKER,
        primaryModel: config.GEMINI_MODEL,
        lightModel: config.GEMINI_FALLBACK_MODEL,
        logger: logger.child({ component: "summarizer" }),
      })
    : undefined;

  return new TextEnricher({
    mode: config.ENRICH_MODE,
    translator,
    summarizer,
    logger,
  });
}
