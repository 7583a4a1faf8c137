// =============================================================================
// @paper-courier/shared — English → Japanese translation with fallback
// =============================================================================
// DeepL is tried first. A DeepLError (quota, auth, service) hands over to
// Microsoft Translator; any other failure, or a failure of the last provider,
// returns the input text unchanged.
// =============================================================================

import { randomUUID } from "node:crypto";
import * as deepl from "deepl-node";
import { MicrosoftTranslateResponseSchema } from "../schemas.js";
import { logExternalCall, silentLogger, type Logger } from "../logger.js";
import { errorMessage } from "../errors.js";
import { runFallbackChain, type Attempt } from "./fallback.js";

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

export interface TextTranslator {
  readonly name: "deepl" | "microsoft";
  translate(text: string): Promise<string>;
}

export function createDeepLTranslator(authKey: string): TextTranslator {
  const client = new deepl.Translator(authKey);
  return {
    name: "deepl",
    async translate(text) {
      const result = await client.translateText(text, "en", "ja");
      return result.text;
    },
  };
}

export function isDeepLError(err: unknown): boolean {
  return err instanceof deepl.DeepLError;
}

const MICROSOFT_ENDPOINT =
  "https://api.cognitive.microsofttranslator.com/translate?api-version=3.0&from=en&to=ja";

export interface MicrosoftTranslatorOptions {
  key: string;
  region: string;
  fetchFn?: typeof fetch;
  /** Produces the per-request X-ClientTraceId */
  newTraceId?: () => string;
}

export function createMicrosoftTranslator(
  options: MicrosoftTranslatorOptions,
): TextTranslator {
  const fetchFn = options.fetchFn ?? fetch;
  const newTraceId = options.newTraceId ?? randomUUID;
  return {
    name: "microsoft",
    async translate(text) {
      const response = await fetchFn(MICROSOFT_ENDPOINT, {
        method: "POST",
        headers: {
          "Ocp-Apim-Subscription-Key": options.key,
          "Ocp-Apim-Subscription-Region": options.region,
          "Content-Type": "application/json",
          "X-ClientTraceId": newTraceId(),
        },
        body: JSON.stringify([{ text }]),
      });
      if (!response.ok) {
        throw new Error(`Microsoft Translator responded ${response.status}`);
      }
      const body = MicrosoftTranslateResponseSchema.parse(await response.json());
      return body[0].translations[0].text;
    },
  };
}

// ---------------------------------------------------------------------------
// Chain
// ---------------------------------------------------------------------------

export interface ArticleTranslatorOptions {
  /** Paid primary provider; its DeepLError hands over to `secondary` */
  primary?: TextTranslator;
  secondary?: TextTranslator;
  logger?: Logger;
}

export class ArticleTranslator {
  private readonly logger: Logger;

  constructor(private readonly options: ArticleTranslatorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /** Best-effort translation; resolves to `text` itself when every provider fails. */
  async translate(text: string): Promise<string> {
    const attempts: Attempt<string>[] = [];
    const { primary, secondary } = this.options;
    if (primary) {
      attempts.push(this.attempt(primary, text, isDeepLError));
    }
    if (secondary) {
      attempts.push(this.attempt(secondary, text, () => false));
    }

    const outcome = await runFallbackChain(attempts, () => text, this.logger);
    if (outcome.source === undefined && attempts.length > 0) {
      this.logger.warn("Translation fell back to original text", {
        chars: text.length,
      });
    }
    return outcome.value;
  }

  private attempt(
    translator: TextTranslator,
    text: string,
    recoverable: (err: unknown) => boolean,
  ): Attempt<string> {
    return {
      name: translator.name,
      recoverable,
      run: async () => {
        const start = performance.now();
        try {
          const translated = await translator.translate(text);
          logExternalCall(
            this.logger,
            translator.name,
            "translate",
            Math.round(performance.now() - start),
          );
          return translated;
        } catch (err) {
          logExternalCall(
            this.logger,
            translator.name,
            "translate",
            Math.round(performance.now() - start),
            errorMessage(err),
          );
          throw err;
        }
      },
    };
  }
}
