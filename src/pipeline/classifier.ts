import { errorMessage } from '../errors.js'
import type { FeedItem, TokenUsage } from '../types.js'
import type { Completion, LanguageModel } from './llmClient.js'
import { buildClassifyUserContent, CLASSIFY_SYSTEM_INSTRUCTION } from './prompts.js'

// Constants

export const MIN_APPEAL_SCORE = 1

export const MAX_APPEAL_SCORE = 5

const CLASSIFY_TEMPERATURE = 0

const CLASSIFY_MAX_TOKENS = 5

// Types

export type ScoreParseResult = { ok: true; score: number } | { ok: false; reason: string }

export type ClassifyResult =
  | { ok: true; score: number; tokens?: TokenUsage }
  | { ok: false; reason: string; tokens?: TokenUsage }

export interface ClassifyOptions {
  llm: LanguageModel
  model: string
}

// Parsing

// Takes the first numeric token. Anything but an integer in 1-5 is malformed; nothing is clamped.
export function parseAppealScore(text: string): ScoreParseResult {
  const trimmed = text.trim()

  if (!trimmed) return { ok: false, reason: 'Empty response' }

  const match = trimmed.match(/-?\d+(?:[.,]\d+)?/)
  const preview = trimmed.slice(0, 80).replace(/\n/g, '\\n')

  if (!match) return { ok: false, reason: `No score in response: ${preview}` }

  const score = Number(match[0].replace(',', '.'))

  if (!Number.isInteger(score) || score < MIN_APPEAL_SCORE || score > MAX_APPEAL_SCORE) {
    return { ok: false, reason: `Score out of range: ${preview}` }
  }

  return { ok: true, score }
}

// Main Function

export async function classifyItem(
  item: Pick<FeedItem, 'title' | 'summary'>,
  options: ClassifyOptions
): Promise<ClassifyResult> {
  let completion: Completion

  try {
    completion = await options.llm.complete({
      model: options.model,
      systemInstruction: CLASSIFY_SYSTEM_INSTRUCTION,
      userContent: buildClassifyUserContent(item),
      temperature: CLASSIFY_TEMPERATURE,
      maxTokens: CLASSIFY_MAX_TOKENS
    })
  } catch (error) {
    return { ok: false, reason: `Classification request failed: ${errorMessage(error)}` }
  }

  const parsed = parseAppealScore(completion.text)
  const tokens = completion.tokens

  return { ...parsed, ...(tokens && { tokens }) }
}
