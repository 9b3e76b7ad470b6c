import * as ss from 'superstruct';

const int = (fallback: number, min = 0) => ss.defaulted(
  ss.coerce(ss.min(ss.integer(), min), ss.string(), value => value.trim() === '' ? fallback : Number(value.trim())),
  fallback
);

const text = ss.optional(ss.coerce(ss.string(), ss.string(), value => value.trim()));

const ConfigSchema = ss.type({
  INSTAGRAM_USERNAME: text,
  INSTAGRAM_PASSWORD: ss.optional(ss.string()),
  ARCHIVE_BASE: text,
  FEED_AMOUNT: int(20, 1),
  FEED_MAX_PAGES: int(5, 1),
  FEED_DELAY_MIN_MS: int(1000),
  FEED_DELAY_MAX_MS: int(3000),
  COMMENT_LIMIT: int(50),
  ARCHIVE_CONCURRENCY: int(1, 1),
  REQUEST_TIMEOUT_MS: int(30_000, 1),
});

export type ArchiveConfig = {
  username?: string,
  password?: string,
  base?: string,
  amount: number,
  maxPages: number,
  delay: [number, number],
  commentLimit: number,
  concurrency: number,
  timeout: number
}

/**
 * Reads settings from the environment (and `.env`, if the caller loaded it),
 * filling in defaults. Throws if a value is present but unusable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ArchiveConfig {
  let values: ss.Infer<typeof ConfigSchema>;
  try {
    values = ss.create(env, ConfigSchema);
  } catch (err: unknown) {
    if (err instanceof ss.StructError) {
      throw new Error(`Invalid configuration value for ${err.path.join('.')}: ${err.message}`, { cause: err });
    }
    throw err;
  }

  return {
    username: values.INSTAGRAM_USERNAME || undefined,
    password: values.INSTAGRAM_PASSWORD || undefined,
    base: values.ARCHIVE_BASE || undefined,
    amount: values.FEED_AMOUNT,
    maxPages: values.FEED_MAX_PAGES,
    delay: [values.FEED_DELAY_MIN_MS, Math.max(values.FEED_DELAY_MIN_MS, values.FEED_DELAY_MAX_MS)],
    commentLimit: values.COMMENT_LIMIT,
    concurrency: values.ARCHIVE_CONCURRENCY,
    timeout: values.REQUEST_TIMEOUT_MS,
  };
}
