import { describe, expect, it } from 'vitest'
import { createBatchProcessor } from '../pipeline/batchProcessor.js'
import { ModelUnavailableError } from '../errors.js'
import {
  assertAnyClassified,
  failedItem,
  isPublished,
  orderForPublication,
  processItem
} from '../pipeline/itemPipeline.js'
import type { FakeResponder } from './helpers.js'
import { BLOG_TEXT, callKindOf, fakeLanguageModel, feedItem, processedItem, SOCIAL_TEXT } from './helpers.js'
import { ITEM_STATUS } from '../types.js'

const VOICES = ['Law firm', 'Managing partner (formal)', 'Managing partner (playful)'] as const

// Scores by title; blog and social always succeed unless the title says otherwise.
function responder(scores: Record<string, string>): FakeResponder {
  return request => {
    const kind = callKindOf(request)
    const title = Object.keys(scores).find(key => request.userContent.includes(`Title: ${key}\n`)) ?? ''

    if (kind === 'classification') return { text: scores[title] ?? '', tokens: { input: 300, output: 1 } }

    if (kind === 'blog') return { text: BLOG_TEXT, tokens: { input: 350, output: 700 } }

    if (title.includes('broken')) return { text: 'no separators here', tokens: { input: 300, output: 10 } }

    return { text: SOCIAL_TEXT, tokens: { input: 300, output: 220 } }
  }
}

describe('processItem', () => {
  it('publishes an item scoring 3 or more', async () => {
    const llm = fakeLanguageModel(responder({ 'Landmark ruling': '5' }))

    const result = await processItem(feedItem({ title: 'Landmark ruling' }), {
      llm,
      model: 'test-model',
      language: 'Czech',
      voices: VOICES
    })

    expect(result.status).toBe(ITEM_STATUS.published)
    expect(result.appealScore).toBe(5)
    expect(result.content?.socialPosts).toHaveLength(3)
    expect(result.tokens).toEqual({
      classification: { input: 300, output: 1 },
      blog: { input: 350, output: 700 },
      social: { input: 300, output: 220 }
    })
    expect(isPublished(result)).toBe(true)
  })

  it('stops after classification for items scoring below 3', async () => {
    const llm = fakeLanguageModel(responder({ 'Minor update': '2' }))

    const result = await processItem(feedItem({ title: 'Minor update' }), {
      llm,
      model: 'test-model',
      language: 'Czech',
      voices: VOICES
    })

    expect(result.status).toBe(ITEM_STATUS.below_threshold)
    expect(result.appealScore).toBe(2)
    expect(result.content).toBeUndefined()
    expect(llm.requests).toHaveLength(1)
    expect(isPublished(result)).toBe(false)
  })

  it('records score 0 for a malformed classification', async () => {
    const llm = fakeLanguageModel(responder({ 'Odd answer': 'seven' }))

    const result = await processItem(feedItem({ title: 'Odd answer' }), {
      llm,
      model: 'test-model',
      language: 'Czech',
      voices: VOICES
    })

    expect(result).toMatchObject({
      status: ITEM_STATUS.classification_failed,
      appealScore: 0,
      reason: 'No score in response: seven'
    })
    expect(result.content).toBeUndefined()
  })

  it('publishes nothing for an item whose generation fails', async () => {
    const llm = fakeLanguageModel(responder({ 'A broken one': '4' }))

    const result = await processItem(feedItem({ title: 'A broken one' }), {
      llm,
      model: 'test-model',
      language: 'Czech',
      voices: VOICES
    })

    expect(result).toMatchObject({
      status: ITEM_STATUS.generation_failed,
      appealScore: 4,
      reason: 'Expected 3 social posts, got 1'
    })
    expect(result.content).toBeUndefined()
  })

  it('records an error thrown while generating against generation, keeping the score', async () => {
    const llm = fakeLanguageModel(request => {
      if (callKindOf(request) === 'classification') return { text: '4', tokens: { input: 300, output: 1 } }

      throw new Error('connection reset')
    })

    const result = await processItem(feedItem(), { llm, model: 'test-model', language: 'Czech', voices: VOICES })

    expect(result).toMatchObject({
      status: ITEM_STATUS.generation_failed,
      appealScore: 4,
      reason: 'Generation request failed: connection reset',
      tokens: { classification: { input: 300, output: 1 } }
    })
  })
})

describe('pipeline over a batch', () => {
  it('keeps failures independent and never generates for low scores', async () => {
    const scores = { First: '1', Second: '3', Third: 'n/a', Fourth: '4', 'Fifth broken': '5', Sixth: '2' }
    const llm = fakeLanguageModel(responder(scores))
    const items = Object.keys(scores).map((title, index) =>
      feedItem({ title, sourceUrl: `https://news.example.com/${index}` })
    )

    const results = await createBatchProcessor(3).run(items, {
      worker: item => processItem(item, { llm, model: 'test-model', language: 'Czech', voices: VOICES }),
      onError: (error, item) => failedItem(item, error)
    })

    expect(results.map(result => [result.title, result.status, result.appealScore])).toEqual([
      ['First', ITEM_STATUS.below_threshold, 1],
      ['Second', ITEM_STATUS.published, 3],
      ['Third', ITEM_STATUS.classification_failed, 0],
      ['Fourth', ITEM_STATUS.published, 4],
      ['Fifth broken', ITEM_STATUS.generation_failed, 5],
      ['Sixth', ITEM_STATUS.below_threshold, 2]
    ])

    for (const result of results) {
      expect([0, 1, 2, 3, 4, 5]).toContain(result.appealScore)

      if (result.appealScore < 3) expect(result.content).toBeUndefined()
    }

    expect(results.filter(isPublished).map(result => result.title)).toEqual(['Second', 'Fourth'])
  })
})

describe('orderForPublication', () => {
  it('orders by published date descending with undated items last', () => {
    const items = [
      feedItem({ title: 'undated A', publishedAt: null }),
      feedItem({ title: 'old', publishedAt: new Date('2026-10-01T00:00:00Z') }),
      feedItem({ title: 'new', publishedAt: new Date('2026-10-15T00:00:00Z') }),
      feedItem({ title: 'undated B', publishedAt: null }),
      feedItem({ title: 'old twin', publishedAt: new Date('2026-10-01T00:00:00Z') })
    ]

    expect(orderForPublication(items).map(item => item.title)).toEqual([
      'new',
      'old',
      'old twin',
      'undated A',
      'undated B'
    ])
  })
})

describe('failedItem', () => {
  it('marks an error that escaped the pipeline as unscored and unexpected', () => {
    expect(failedItem(feedItem(), new Error('socket hang up'))).toMatchObject({
      status: ITEM_STATUS.classification_failed,
      appealScore: 0,
      reason: 'Unexpected error: socket hang up'
    })
  })
})

describe('assertAnyClassified', () => {
  it('aborts when the model rejected every item', async () => {
    const llm = fakeLanguageModel(() => {
      throw new Error('401 Incorrect API key provided')
    })
    const items = [feedItem(), feedItem({ sourceUrl: 'https://news.example.com/b' })]
    const results = await Promise.all(
      items.map(item => processItem(item, { llm, model: 'test-model', language: 'Czech', voices: VOICES }))
    )

    expect(() => assertAnyClassified(results)).toThrow(ModelUnavailableError)
    expect(() => assertAnyClassified(results)).toThrow(
      'No item could be classified (2 failed). First error: Classification request failed: 401 Incorrect API key provided'
    )
  })

  it('lets the run continue when at least one item was scored', () => {
    const results = [
      processedItem({ status: ITEM_STATUS.classification_failed, appealScore: 0, reason: 'Empty response' }),
      processedItem({ status: ITEM_STATUS.below_threshold, appealScore: 1 })
    ]

    expect(() => assertAnyClassified(results)).not.toThrow()
  })

  it('accepts an empty run', () => {
    expect(() => assertAnyClassified([])).not.toThrow()
  })
})
