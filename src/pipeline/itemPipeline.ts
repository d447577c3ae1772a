import { errorMessage, ModelUnavailableError } from '../errors.js'
import type { FeedItem, ItemTokens, ProcessedItem, PublishedItem } from '../types.js'
import { ITEM_STATUS, MIN_PUBLISH_SCORE } from '../types.js'
import { classifyItem } from './classifier.js'
import type { GenerateResult } from './generator.js'
import { generateContent } from './generator.js'
import type { LanguageModel } from './llmClient.js'

// Types

export interface ItemPipelineOptions {
  llm: LanguageModel
  model: string
  language: string
  voices: readonly [string, string, string]
}

// Helpers

function withTokens(tokens: ItemTokens): { tokens?: ItemTokens } {
  return Object.keys(tokens).length > 0 ? { tokens } : {}
}

export function isPublished(item: ProcessedItem): item is PublishedItem {
  return item.status === ITEM_STATUS.published && item.content !== undefined
}

// Published date descending. Undated items go last; ties keep fetch order (Array.prototype.sort is stable).
export function orderForPublication<T extends FeedItem>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => {
    if (a.publishedAt === null || b.publishedAt === null) {
      return (a.publishedAt === null ? 1 : 0) - (b.publishedAt === null ? 1 : 0)
    }

    return b.publishedAt.getTime() - a.publishedAt.getTime()
  })
}

// For errors that escape processItem. The item has no score, so it counts as unclassified.
export function failedItem(item: FeedItem, error: unknown): ProcessedItem {
  return {
    ...item,
    status: ITEM_STATUS.classification_failed,
    appealScore: 0,
    reason: `Unexpected error: ${errorMessage(error)}`
  }
}

// A run where the model rejected every item (bad key, unknown model) must not replace the published site.
export function assertAnyClassified(results: readonly ProcessedItem[]): void {
  if (results.length === 0) return

  const failed = results.filter(result => result.status === ITEM_STATUS.classification_failed)

  if (failed.length < results.length) return

  throw new ModelUnavailableError(failed.length, failed[0]?.reason ?? 'unknown error')
}

// Main Function

export async function processItem(item: FeedItem, options: ItemPipelineOptions): Promise<ProcessedItem> {
  const tokens: ItemTokens = {}

  // Stage 1: Appeal score on title and summary.
  const classified = await classifyItem(item, { llm: options.llm, model: options.model })

  if (classified.tokens) tokens.classification = classified.tokens

  if (!classified.ok) {
    return {
      ...item,
      status: ITEM_STATUS.classification_failed,
      appealScore: 0,
      reason: classified.reason,
      ...withTokens(tokens)
    }
  }

  if (classified.score < MIN_PUBLISH_SCORE) {
    return { ...item, status: ITEM_STATUS.below_threshold, appealScore: classified.score, ...withTokens(tokens) }
  }

  // Stage 2: Blog article and social posts for items worth publishing.
  const generationFailed = (reason: string): ProcessedItem => ({
    ...item,
    status: ITEM_STATUS.generation_failed,
    appealScore: classified.score,
    reason,
    ...withTokens(tokens)
  })

  let generated: GenerateResult

  try {
    generated = await generateContent({ ...item, appealScore: classified.score }, options)
  } catch (error) {
    return generationFailed(`Unexpected error: ${errorMessage(error)}`)
  }

  Object.assign(tokens, generated.tokens)

  if (!generated.ok) return generationFailed(generated.reason)

  return {
    ...item,
    status: ITEM_STATUS.published,
    appealScore: classified.score,
    content: generated.content,
    ...withTokens(tokens)
  }
}
