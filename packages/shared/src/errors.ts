/** Invalid configuration or keyword file. Fatal: raised before any network call. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A feed entry lacks a field the adapter needs (e.g. an unparseable date). */
export class FeedEntryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FeedEntryError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
