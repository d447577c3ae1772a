// Constants

export const ITEM_STATUS = {
  published: 'published',
  below_threshold: 'below_threshold',
  classification_failed: 'classification_failed',
  generation_failed: 'generation_failed'
} as const

export const MIN_PUBLISH_SCORE = 3

// Types

export interface FeedItem {
  title: string
  summary: string
  publishedAt: Date | null
  sourceUrl: string
  source: string
}

export interface ScoredItem extends FeedItem {
  appealScore: number
}

export type SocialPosts = [string, string, string]

export interface GeneratedContent {
  blogArticle: string
  socialPosts: SocialPosts
}

export interface CostEstimate {
  inputTokens: number
  outputTokens: number
  costUsd: number
}

export type ItemStatus = (typeof ITEM_STATUS)[keyof typeof ITEM_STATUS]

export interface TokenUsage {
  input: number
  output: number
}

export type CallKind = 'classification' | 'blog' | 'social'

export type ItemTokens = Partial<Record<CallKind, TokenUsage>>

export interface ProcessedItem extends FeedItem {
  status: ItemStatus
  // 0 when classification failed.
  appealScore: number
  reason?: string
  content?: GeneratedContent
  tokens?: ItemTokens
}

export interface PublishedItem extends ProcessedItem {
  status: typeof ITEM_STATUS.published
  content: GeneratedContent
}
