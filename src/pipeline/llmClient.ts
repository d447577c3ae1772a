import OpenAI, { APIConnectionError, APIError } from 'openai'
import type { CompletionUsage } from 'openai/resources/completions'
import type { TokenUsage } from '../types.js'
import { RETRYABLE_STATUS_CODES, withRetry } from '../utils/retry.js'

// Types

export interface CompletionRequest {
  model: string
  systemInstruction: string
  userContent: string
  temperature: number
  maxTokens?: number
}

export interface Completion {
  text: string
  tokens?: TokenUsage
}

// The only surface the classifier and generator see. Tests substitute an in-process fake.
export interface LanguageModel {
  complete(request: CompletionRequest): Promise<Completion>
}

export interface LanguageModelOptions {
  apiKey: string
  baseURL?: string
  retries?: number
  baseDelayMs?: number
}

// Helpers

export function isRetryableApiError(error: unknown): boolean {
  // Covers APIConnectionTimeoutError, which extends APIConnectionError.
  if (error instanceof APIConnectionError) return true

  if (error instanceof APIError) {
    return typeof error.status === 'number' && RETRYABLE_STATUS_CODES.has(error.status)
  }

  if (error && typeof error === 'object' && 'code' in error) {
    return error.code === 'ETIMEDOUT' || error.code === 'ECONNRESET'
  }

  return false
}

function toTokenUsage(usage: CompletionUsage | undefined): TokenUsage | undefined {
  if (!usage) return undefined

  return { input: usage.prompt_tokens, output: usage.completion_tokens }
}

// Main Function

export function createLanguageModel(options: LanguageModelOptions): LanguageModel {
  // The SDK has its own retry loop; disable it so withRetry owns the backoff policy.
  const client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 })

  return {
    async complete(request: CompletionRequest): Promise<Completion> {
      const response = await withRetry(
        () =>
          client.chat.completions.create({
            model: request.model,
            messages: [
              { role: 'system', content: request.systemInstruction },
              { role: 'user', content: request.userContent }
            ],
            temperature: request.temperature,
            ...(request.maxTokens !== undefined && { max_tokens: request.maxTokens })
          }),
        { isRetryableError: isRetryableApiError, retries: options.retries, baseDelayMs: options.baseDelayMs }
      )

      const text = (response.choices[0]?.message?.content ?? '').trim()
      const tokens = toTokenUsage(response.usage)

      return { text, ...(tokens && { tokens }) }
    }
  }
}
