import { describe, expect, it } from 'vitest'
import { generateContent, parseSocialPosts } from '../pipeline/generator.js'
import type { ScoredItem } from '../types.js'
import { BLOG_TEXT, callKindOf, fakeLanguageModel, feedItem, SOCIAL_TEXT } from './helpers.js'

const VOICES = ['Law firm', 'Managing partner (formal)', 'Managing partner (playful)'] as const

function scoredItem(appealScore: number): ScoredItem {
  return { ...feedItem(), appealScore }
}

describe('parseSocialPosts', () => {
  it('splits three blocks on separator lines', () => {
    expect(parseSocialPosts(SOCIAL_TEXT)).toEqual({
      ok: true,
      posts: [
        'Law firm:\nA ruling worth reading.',
        'Managing partner (formal):\nThe court clarified tenancy rules.',
        'Managing partner (playful):\nLandlords, take note!'
      ]
    })
  })

  it('keeps only the first three of more blocks', () => {
    const result = parseSocialPosts(`${SOCIAL_TEXT}\nBonus:\nOne more.`)

    expect(result.ok && result.posts).toHaveLength(3)
    expect(result.ok && result.posts[2]).toBe('Managing partner (playful):\nLandlords, take note!')
  })

  it('drops heading-only blocks before counting', () => {
    expect(parseSocialPosts('A:\nOne.\n---\nB:\n---\nC:\nThree.')).toEqual({
      ok: false,
      reason: 'Expected 3 social posts, got 2'
    })
  })

  it('fails on duplicate posts', () => {
    expect(parseSocialPosts('Same:\nText.\n---\nsame:\ntext.\n---\nOther:\nText.')).toEqual({
      ok: false,
      reason: 'Social posts are not distinct'
    })
  })

  it('fails on an empty response', () => {
    expect(parseSocialPosts('')).toEqual({ ok: false, reason: 'Expected 3 social posts, got 0' })
  })
})

describe('generateContent', () => {
  it('returns the article and exactly three posts', async () => {
    const llm = fakeLanguageModel(request =>
      callKindOf(request) === 'blog'
        ? { text: BLOG_TEXT, tokens: { input: 350, output: 700 } }
        : { text: SOCIAL_TEXT, tokens: { input: 300, output: 220 } }
    )

    const result = await generateContent(scoredItem(4), { llm, model: 'test-model', language: 'Czech', voices: VOICES })

    expect(result.ok).toBe(true)

    if (!result.ok) return

    expect(result.content.blogArticle).toBe(BLOG_TEXT)
    expect(result.content.socialPosts).toHaveLength(3)
    expect(result.tokens).toEqual({ blog: { input: 350, output: 700 }, social: { input: 300, output: 220 } })

    const [blog, social] = llm.requests

    expect(blog.temperature).toBe(0.5)
    expect(blog.maxTokens).toBe(900)
    expect(blog.userContent).toContain('[source](https://news.example.com/a)')
    expect(blog.systemInstruction).toContain('Czech')
    expect(social.temperature).toBe(0.7)
    expect(social.maxTokens).toBe(600)
    expect(social.userContent).toContain('"Law firm:" / "Managing partner (formal):" / "Managing partner (playful):"')
  })

  it('fails without calling the social prompt when the article is empty', async () => {
    const llm = fakeLanguageModel(() => ({ text: '' }))

    const result = await generateContent(scoredItem(3), { llm, model: 'test-model', language: 'Czech', voices: VOICES })

    expect(result).toEqual({ ok: false, reason: 'Empty blog article', tokens: {} })
    expect(llm.requests).toHaveLength(1)
  })

  it('fails the whole item when the social posts are malformed', async () => {
    const llm = fakeLanguageModel(request =>
      callKindOf(request) === 'blog'
        ? { text: BLOG_TEXT, tokens: { input: 350, output: 700 } }
        : { text: 'Only one post.', tokens: { input: 300, output: 5 } }
    )

    const result = await generateContent(scoredItem(5), { llm, model: 'test-model', language: 'Czech', voices: VOICES })

    expect(result).toEqual({
      ok: false,
      reason: 'Expected 3 social posts, got 1',
      tokens: { blog: { input: 350, output: 700 }, social: { input: 300, output: 5 } }
    })
  })

  it('fails the whole item when a request errors', async () => {
    const llm = fakeLanguageModel(request => {
      if (callKindOf(request) === 'social') throw new Error('rate limited')

      return { text: BLOG_TEXT }
    })

    const result = await generateContent(scoredItem(4), { llm, model: 'test-model', language: 'Czech', voices: VOICES })

    expect(result).toEqual({ ok: false, reason: 'Generation request failed: rate limited', tokens: {} })
  })

  it('refuses items scoring below 3', async () => {
    const llm = fakeLanguageModel(() => ({ text: BLOG_TEXT }))

    await expect(
      generateContent(scoredItem(2), { llm, model: 'test-model', language: 'Czech', voices: VOICES })
    ).rejects.toThrow('generateContent called for an item scoring 2')
    expect(llm.requests).toHaveLength(0)
  })
})
