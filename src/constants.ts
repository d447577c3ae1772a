export const FEED_TIMEOUT_MS = 20_000

export const MAX_BACKOFF_MS = 30_000

export const MAX_RETRIES = 3

export const MAX_SLUG_LENGTH = 60

export const MAX_SUMMARY_LENGTH = 4_000

export const OUTPUT_DIR = 'output'

export const SPINNER_INTERVAL_MS = 80

export const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36'
