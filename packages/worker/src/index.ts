// =============================================================================
// @paper-courier/worker — Entry point
// =============================================================================
// Loads .env and config, compiles the keyword patterns (fatal on error, before
// any network call), then runs one digest pass and exits. With CRON_ENABLED
// the process stays up and runs the digest on CRON_SCHEDULE instead.
// =============================================================================

import dotenv from "dotenv";
import {
  createLogger,
  createTextEnricher,
  errorMessage,
  loadConfig,
  loadPatternSet,
  utcToday,
  type Config,
  type Logger,
  type PatternSet,
} from "@paper-courier/shared";
import { runDigest, type DigestResult } from "./pipeline.js";
import { SlackPoster } from "./slack.js";
import { startScheduler } from "./scheduler.js";

dotenv.config();

function createDigestJob(
  config: Config,
  patterns: PatternSet,
  logger: Logger,
): () => Promise<DigestResult> {
  const enricher = createTextEnricher(config, logger.child({ component: "enricher" }));
  const poster = new SlackPoster();

  // today is taken per run so scheduled runs filter by their own date
  return () =>
    runDigest({
      publishers: config.PUBLISHERS,
      patterns,
      enricher,
      poster,
      targets: config.SLACK_TARGETS,
      format: config.MESSAGE_FORMAT,
      logger,
      sourceContext: {
        today: utcToday(),
        logger: logger.child({ component: "source" }),
        openAlex: {
          daysBack: config.OPENALEX_DAYS_BACK,
          perPage: config.OPENALEX_PER_PAGE,
          mailto: config.OPENALEX_MAILTO,
        },
      },
    });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.LOG_LEVEL });
  const patterns = await loadPatternSet(config.KEYWORD_FILE);

  logger.info("Configuration loaded", {
    publishers: config.PUBLISHERS,
    patterns: patterns.length,
    targets: config.SLACK_TARGETS.length,
    enrichMode: config.ENRICH_MODE,
    format: config.MESSAGE_FORMAT,
  });

  const job = createDigestJob(config, patterns, logger);

  if (!config.CRON_ENABLED) {
    await job();
    return;
  }

  const scheduler = startScheduler(config, logger, job);
  const shutdown = () => {
    scheduler.stop();
    process.exit(0);
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

main().catch((err) => {
  console.error("paper-courier failed:", errorMessage(err));
  process.exit(1);
});
