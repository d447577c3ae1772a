import { MAX_BACKOFF_MS, MAX_RETRIES } from '../constants.js'

// Constants

export const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503])

const BASE_BACKOFF_MS = 1000

// Types

export interface WithRetryOptions<T> {
  shouldRetry?: (result: T) => boolean
  isRetryableError?: (error: unknown) => boolean
  retries?: number
  baseDelayMs?: number
}

export interface FetchWithRetryOptions {
  retries?: number
  baseDelayMs?: number
  signal?: AbortSignal
  headers?: Record<string, string>
}

// Helpers

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export function backoffMs(attempt: number, baseDelayMs = BASE_BACKOFF_MS): number {
  return Math.min(baseDelayMs * 2 ** attempt, MAX_BACKOFF_MS)
}

function isRetryableResponse(response: Response): boolean {
  return RETRYABLE_STATUS_CODES.has(response.status)
}

function isRetryableFetchError(error: unknown): boolean {
  if (error instanceof TypeError && (error.message === 'fetch failed' || error.message.includes('network'))) {
    return true
  }

  return false
}

// Main Functions

export async function withRetry<T>(fn: () => Promise<T>, options: WithRetryOptions<T> = {}): Promise<T> {
  const { shouldRetry, isRetryableError, retries = MAX_RETRIES, baseDelayMs } = options

  let lastError: unknown

  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      const result = await fn()

      if (shouldRetry?.(result) && attempt < retries) {
        await delay(backoffMs(attempt, baseDelayMs))

        continue
      }

      return result
    } catch (error) {
      lastError = error

      if (attempt < retries && isRetryableError?.(error)) {
        await delay(backoffMs(attempt, baseDelayMs))

        continue
      }

      throw error
    }
  }

  throw lastError ?? new Error('Retries exhausted')
}

export async function fetchWithRetry(url: string, options: FetchWithRetryOptions = {}): Promise<Response> {
  const { retries, baseDelayMs, signal, headers } = options

  return withRetry(() => fetch(url, { headers, signal }), {
    shouldRetry: response => !response.ok && isRetryableResponse(response),
    isRetryableError: isRetryableFetchError,
    retries,
    baseDelayMs
  })
}
