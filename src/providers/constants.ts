/** Shared constants for the generation client */

/** Retry attempts after the first request for transient errors */
export const DEFAULT_MAX_RETRIES = 2;

/** HTTP status codes that trigger automatic retry with backoff */
export const RETRY_STATUS_CODES = [429, 500, 502, 503, 504];

/** Base delay in ms between retries (doubled each attempt via exponential backoff) */
export const RETRY_DELAY_MS = 1000;

/** Completion cap; replies are chat-sized */
export const DEFAULT_MAX_TOKENS = 350;
