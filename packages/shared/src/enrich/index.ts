export {
  type Attempt,
  type ChainOutcome,
  runFallbackChain,
} from "./fallback.js";
export {
  type SleepFn,
  type ClockFn,
  sleep,
  monotonicNow,
  rateLimitDelayMs,
} from "./rate-limit.js";
export {
  type TextTranslator,
  type MicrosoftTranslatorOptions,
  type ArticleTranslatorOptions,
  createDeepLTranslator,
  createMicrosoftTranslator,
  isDeepLError,
  ArticleTranslator,
} from "./translate.js";
export {
  type GenerativeModel,
  type ArticleSummarizerOptions,
  createGeminiModel,
  isRateLimited,
  ArticleSummarizer,
} from "./summarize.js";
export {
  type TextEnricherOptions,
  TextEnricher,
  createTextEnricher,
} from "./text-enricher.js";
export { DEFAULT_SUMMARY_PROMPT, DEFAULT_SUMMARY_MARKER } from "./prompt.js";
