import type { Completion, CompletionRequest, LanguageModel } from '../pipeline/llmClient.js'
import { CLASSIFY_SYSTEM_INSTRUCTION } from '../pipeline/prompts.js'
import type { FeedItem, ProcessedItem } from '../types.js'
import { ITEM_STATUS } from '../types.js'

export type FakeResponder = (request: CompletionRequest) => Completion | Promise<Completion>

export function fakeLanguageModel(respond: FakeResponder): LanguageModel & { requests: CompletionRequest[] } {
  const requests: CompletionRequest[] = []

  return {
    requests,
    async complete(request) {
      requests.push(request)

      return respond(request)
    }
  }
}

export function callKindOf(request: CompletionRequest): 'classification' | 'blog' | 'social' {
  if (request.systemInstruction === CLASSIFY_SYSTEM_INSTRUCTION) return 'classification'

  return request.systemInstruction.includes('copywriter') ? 'blog' : 'social'
}

export const SOCIAL_TEXT = `---
Law firm:
A ruling worth reading.
---
Managing partner (formal):
The court clarified tenancy rules.
---
Managing partner (playful):
Landlords, take note!
---`

export const BLOG_TEXT = `## What happened

The court ruled on [source](https://news.example.com/a).

## What it means

Tenants gain clarity.`

export function feedItem(overrides: Partial<FeedItem> = {}): FeedItem {
  return {
    title: 'Supreme court rules on tenancy',
    summary: 'The court decided a long-running dispute.',
    publishedAt: new Date('2026-10-12T08:00:00Z'),
    sourceUrl: 'https://news.example.com/a',
    source: 'Legal Daily',
    ...overrides
  }
}

export function processedItem(overrides: Partial<ProcessedItem> = {}): ProcessedItem {
  return {
    ...feedItem(),
    status: ITEM_STATUS.below_threshold,
    appealScore: 2,
    ...overrides
  }
}
