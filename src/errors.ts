// Fatal errors. Per-item failures are result variants, not exceptions.

export class ConfigError extends Error {
  override name = 'ConfigError'
}

export class FeedUnavailableError extends Error {
  override name = 'FeedUnavailableError'

  constructor(readonly failures: { url: string; reason: string }[]) {
    super(
      `No feed could be fetched: ${failures.map(failure => `${failure.url} (${failure.reason})`).join(', ')}`
    )
  }
}

export class ModelUnavailableError extends Error {
  override name = 'ModelUnavailableError'

  constructor(
    readonly failedCount: number,
    readonly firstReason: string
  ) {
    super(`No item could be classified (${failedCount} failed). First error: ${firstReason}`)
  }
}

export class CostInputInvalidError extends Error {
  override name = 'CostInputInvalidError'
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.length > 200 ? `${error.message.slice(0, 200)}…` : error.message
  }

  return String(error)
}
