import { errorMessage } from '../errors.js'
import type { GeneratedContent, ItemTokens, ScoredItem, SocialPosts } from '../types.js'
import { MIN_PUBLISH_SCORE } from '../types.js'
import type { LanguageModel } from './llmClient.js'
import {
  buildBlogSystemInstruction,
  buildBlogUserContent,
  buildSocialSystemInstruction,
  buildSocialUserContent
} from './prompts.js'

// Constants

const BLOG_TEMPERATURE = 0.5

const BLOG_MAX_TOKENS = 900

const SOCIAL_TEMPERATURE = 0.7

const SOCIAL_MAX_TOKENS = 600

const SOCIAL_POST_COUNT = 3

const SEPARATOR_LINE = /^\s*-{3,}\s*$/m

// Types

export type SocialParseResult = { ok: true; posts: SocialPosts } | { ok: false; reason: string }

export type GenerateResult =
  | { ok: true; content: GeneratedContent; tokens: ItemTokens }
  | { ok: false; reason: string; tokens: ItemTokens }

export interface GenerateOptions {
  llm: LanguageModel
  model: string
  language: string
  voices: readonly [string, string, string]
}

// Parsing

function isHeadingOnly(lines: string[]): boolean {
  return lines.length === 1 && lines[0].endsWith(':')
}

function comparable(post: string): string {
  return post.toLowerCase().replace(/\s+/g, ' ')
}

// Splits on "---" lines. Extra blocks beyond three are dropped; fewer than three, or duplicates, fail.
export function parseSocialPosts(text: string): SocialParseResult {
  const blocks: string[] = []

  for (const block of text.split(SEPARATOR_LINE)) {
    const lines = block
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0)

    if (lines.length === 0 || isHeadingOnly(lines)) continue

    blocks.push(lines.join('\n'))
  }

  if (blocks.length < SOCIAL_POST_COUNT) {
    return { ok: false, reason: `Expected ${SOCIAL_POST_COUNT} social posts, got ${blocks.length}` }
  }

  const posts: SocialPosts = [blocks[0], blocks[1], blocks[2]]

  if (new Set(posts.map(comparable)).size !== SOCIAL_POST_COUNT) {
    return { ok: false, reason: 'Social posts are not distinct' }
  }

  return { ok: true, posts }
}

// Main Function

// Both calls must succeed; nothing is published for an item with partial content.
export async function generateContent(item: ScoredItem, options: GenerateOptions): Promise<GenerateResult> {
  if (item.appealScore < MIN_PUBLISH_SCORE) {
    throw new Error(`generateContent called for an item scoring ${item.appealScore}: ${item.sourceUrl}`)
  }

  const tokens: ItemTokens = {}

  try {
    const blog = await options.llm.complete({
      model: options.model,
      systemInstruction: buildBlogSystemInstruction(options.language),
      userContent: buildBlogUserContent(item, options.language),
      temperature: BLOG_TEMPERATURE,
      maxTokens: BLOG_MAX_TOKENS
    })

    if (blog.tokens) tokens.blog = blog.tokens

    if (!blog.text) return { ok: false, reason: 'Empty blog article', tokens }

    const social = await options.llm.complete({
      model: options.model,
      systemInstruction: buildSocialSystemInstruction(options.language),
      userContent: buildSocialUserContent(item, options.language, options.voices),
      temperature: SOCIAL_TEMPERATURE,
      maxTokens: SOCIAL_MAX_TOKENS
    })

    if (social.tokens) tokens.social = social.tokens

    const parsed = parseSocialPosts(social.text)

    if (!parsed.ok) return { ok: false, reason: parsed.reason, tokens }

    return { ok: true, content: { blogArticle: blog.text, socialPosts: parsed.posts }, tokens }
  } catch (error) {
    return { ok: false, reason: `Generation request failed: ${errorMessage(error)}`, tokens }
  }
}
