import { CostInputInvalidError } from '../errors.js'
import type { CallKind, CostEstimate, ProcessedItem, TokenUsage } from '../types.js'
import { MIN_PUBLISH_SCORE } from '../types.js'

// Types

export type TokenAverages = Record<CallKind, TokenUsage>

export interface TokenPrices {
  input: number
  output: number
}

export interface CostInput {
  itemCount: number
  selectedFraction: number
  averages: TokenAverages
  prices: TokenPrices
}

export interface ObservedConstants {
  itemCount: number
  selectedFraction: number
  averages: TokenAverages
}

// Constants

const CALL_KINDS: readonly CallKind[] = ['classification', 'blog', 'social']

// Validation

function assertNonNegative(value: number, label: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new CostInputInvalidError(`${label} must be a finite non-negative number, got ${value}`)
  }
}

function validateCostInput(input: CostInput): void {
  if (!Number.isInteger(input.itemCount) || input.itemCount < 0) {
    throw new CostInputInvalidError(`Item count must be a non-negative integer, got ${input.itemCount}`)
  }

  if (!Number.isFinite(input.selectedFraction) || input.selectedFraction < 0 || input.selectedFraction > 1) {
    throw new CostInputInvalidError(`Selected fraction must be between 0 and 1, got ${input.selectedFraction}`)
  }

  for (const kind of CALL_KINDS) {
    assertNonNegative(input.averages[kind].input, `Average ${kind} input tokens`)
    assertNonNegative(input.averages[kind].output, `Average ${kind} output tokens`)
  }

  assertNonNegative(input.prices.input, 'Input price')
  assertNonNegative(input.prices.output, 'Output price')
}

// Main Functions

export function estimateCost(input: CostInput): CostEstimate {
  validateCostInput(input)

  const { itemCount, selectedFraction, averages, prices } = input
  const selected = itemCount * selectedFraction

  const inputTokens = itemCount * averages.classification.input + selected * (averages.blog.input + averages.social.input)
  const outputTokens =
    itemCount * averages.classification.output + selected * (averages.blog.output + averages.social.output)

  return {
    inputTokens,
    outputTokens,
    costUsd: inputTokens * prices.input + outputTokens * prices.output
  }
}

// Per-call averages and the selected fraction as they actually occurred in a run. Calls without samples average 0.
export function observedConstants(items: ProcessedItem[]): ObservedConstants {
  const totals: Record<CallKind, TokenUsage & { calls: number }> = {
    classification: { input: 0, output: 0, calls: 0 },
    blog: { input: 0, output: 0, calls: 0 },
    social: { input: 0, output: 0, calls: 0 }
  }

  let selected = 0

  for (const item of items) {
    if (item.appealScore >= MIN_PUBLISH_SCORE) selected += 1

    for (const kind of CALL_KINDS) {
      const usage = item.tokens?.[kind]

      if (!usage) continue

      totals[kind].input += usage.input
      totals[kind].output += usage.output
      totals[kind].calls += 1
    }
  }

  const average = (kind: CallKind): TokenUsage => {
    const { input, output, calls } = totals[kind]

    return calls === 0 ? { input: 0, output: 0 } : { input: input / calls, output: output / calls }
  }

  return {
    itemCount: items.length,
    selectedFraction: items.length === 0 ? 0 : selected / items.length,
    averages: { classification: average('classification'), blog: average('blog'), social: average('social') }
  }
}

export function actualCost(items: ProcessedItem[], prices: TokenPrices): CostEstimate {
  let inputTokens = 0
  let outputTokens = 0

  for (const item of items) {
    for (const kind of CALL_KINDS) {
      const usage = item.tokens?.[kind]

      if (!usage) continue

      inputTokens += usage.input
      outputTokens += usage.output
    }
  }

  return { inputTokens, outputTokens, costUsd: inputTokens * prices.input + outputTokens * prices.output }
}
