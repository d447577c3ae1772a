import { relative } from 'node:path'
import type { Config } from '../config.js'
import type { CostEstimate, ProcessedItem } from '../types.js'
import { ITEM_STATUS } from '../types.js'
import { formatDurationMs, formatThousands, formatUsd } from '../utils/format.js'
import { summarizeItems } from './progressLog.js'
import type { SitePaths } from './site.js'

// Constants

const DEFAULT_COLUMNS = 80

const SUMMARY_LABEL_WIDTH = 13

// Helpers

function modelShortName(modelId: string): string {
  const segments = modelId.split('/')

  return segments.length > 1 ? (segments[segments.length - 1] ?? modelId) : modelId
}

function truncate(text: string, maxLength: number): string {
  const trimmed = text.trim()

  const ellipsis = '...'

  if (maxLength <= 0 || trimmed.length <= maxLength) return trimmed

  if (maxLength <= ellipsis.length) return ellipsis

  return `${trimmed.slice(0, maxLength - ellipsis.length)}${ellipsis}`
}

function formatPercent(fraction: number): string {
  return `${Math.round(fraction * 100)}%`
}

function padLabel(label: string): string {
  return label.padEnd(SUMMARY_LABEL_WIDTH)
}

// Main Functions

export function formatEstimateLines(estimate: CostEstimate): string[] {
  return [
    `Input tokens:  ${formatThousands(estimate.inputTokens)}`,
    `Output tokens: ${formatThousands(estimate.outputTokens)}`,
    `Cost:          ${formatUsd(estimate.costUsd)} / run`
  ]
}

export function formatItemLine(item: ProcessedItem): string {
  return `  [${item.appealScore}/5] ${item.title}`
}

export function formatFailureLine(item: ProcessedItem): string {
  const stage = item.status === ITEM_STATUS.classification_failed ? 'classification' : 'generation'

  return `  ✗ ${stage} failed: ${item.sourceUrl} (${item.reason ?? 'unknown error'})`
}

export function printConfigBanner(config: Config, feedItemCount: number, estimate: CostEstimate): void {
  const columns = process.stdout.columns ?? DEFAULT_COLUMNS

  console.log('')
  console.log('Feeds:')

  for (const feed of config.feeds) {
    console.log(`  ${truncate(feed, Math.max(0, columns - 2))}`)
  }

  console.log(`Lookback:    ${config.lookbackDays} ${config.lookbackDays === 1 ? 'day' : 'days'}`)
  console.log(`Model:       ${modelShortName(config.model)}`)
  console.log(`Concurrency: ${config.concurrentLimit}`)
  console.log(
    `Estimate:    ${formatUsd(estimate.costUsd)} for ${formatThousands(feedItemCount)} items at ${formatPercent(config.costs.assumedSelectedFraction)} selected`
  )
  console.log('')
}

export function printResultsSummary(
  items: ProcessedItem[],
  durationMs: number,
  sitePaths: SitePaths,
  costs: { estimate: CostEstimate; actual: CostEstimate; observedFraction: number; assumedFraction: number }
): void {
  const { statusCounts, totalTokens } = summarizeItems(items)
  const cwd = process.cwd()

  console.log('Results:')
  console.log(`  ${padLabel('Classified:')}${formatThousands(items.length)} items in ${formatDurationMs(durationMs)}`)
  console.log(`  ${padLabel('Published:')}${formatThousands(statusCounts[ITEM_STATUS.published])}`)
  console.log(`  ${padLabel('Below 3:')}${formatThousands(statusCounts[ITEM_STATUS.below_threshold])}`)

  const classificationFailed = statusCounts[ITEM_STATUS.classification_failed]
  const generationFailed = statusCounts[ITEM_STATUS.generation_failed]
  const failedParts: string[] = []

  if (classificationFailed > 0) failedParts.push(`${formatThousands(classificationFailed)} (classification)`)
  if (generationFailed > 0) failedParts.push(`${formatThousands(generationFailed)} (generation)`)

  if (failedParts.length > 0) {
    console.log(`  ${padLabel('Failed:')}${failedParts.join(', ')}`)
  }

  let tokensLabel = padLabel('Tokens:')

  for (const key of ['classification', 'blog', 'social'] as const) {
    const usage = totalTokens[key]

    if (!usage) continue

    console.log(
      `  ${tokensLabel}${formatThousands(usage.input)} input / ${formatThousands(usage.output)} output (${key})`
    )

    tokensLabel = ' '.repeat(SUMMARY_LABEL_WIDTH)
  }

  console.log(
    `  ${padLabel('Selected:')}${formatPercent(costs.observedFraction)} (assumed ${formatPercent(costs.assumedFraction)})`
  )
  console.log(
    `  ${padLabel('Cost:')}${formatUsd(costs.actual.costUsd)} actual / ${formatUsd(costs.estimate.costUsd)} estimated`
  )
  console.log(`  ${padLabel('Site:')}${relative(cwd, sitePaths.index)}`)
}
