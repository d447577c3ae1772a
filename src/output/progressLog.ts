import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { Config } from '../config.js'
import type { CallKind, CostEstimate, ItemStatus, ProcessedItem, TokenUsage } from '../types.js'
import { ITEM_STATUS } from '../types.js'
import { normalizedUrl } from '../utils/url.js'
import { getRunDir } from './runDir.js'

// State

// Module-level state for run context (set at init, finalized at end).
let runConfig: Config | null = null
let startedAt: string | null = null
let completedAt: string | null = null
let durationMs: number | null = null
let estimate: CostEstimate | null = null
let actual: CostEstimate | null = null
let writeChain: Promise<void> = Promise.resolve()

// Types

export interface ProgressLogMetadata {
  feeds: string[]
  lookbackDays: number
  model: string
  startedAt: string
  completedAt?: string
  durationMs?: number
  totalItems: number
  totalTokens: Partial<Record<CallKind, TokenUsage>>
  statusCounts: Record<ItemStatus, number>
  estimate?: CostEstimate
  actual?: CostEstimate
}

export interface ProgressLogOutput {
  metadata: ProgressLogMetadata
  items: Record<string, ProcessedItem>
}

// Helpers

export function defaultStatusCounts(): Record<ItemStatus, number> {
  return {
    [ITEM_STATUS.published]: 0,
    [ITEM_STATUS.below_threshold]: 0,
    [ITEM_STATUS.classification_failed]: 0,
    [ITEM_STATUS.generation_failed]: 0
  }
}

export function summarizeItems(items: Iterable<ProcessedItem>): {
  statusCounts: Record<ItemStatus, number>
  totalTokens: Partial<Record<CallKind, TokenUsage>>
} {
  const statusCounts = defaultStatusCounts()
  const totalTokens: Partial<Record<CallKind, TokenUsage>> = {}

  for (const item of items) {
    statusCounts[item.status] += 1

    for (const key of ['classification', 'blog', 'social'] as const) {
      const usage = item.tokens?.[key]

      if (!usage) continue

      const existing = totalTokens[key] ?? { input: 0, output: 0 }

      totalTokens[key] = { input: existing.input + usage.input, output: existing.output + usage.output }
    }
  }

  return { statusCounts, totalTokens }
}

function computeMetadata(progress: Record<string, ProcessedItem>): ProgressLogMetadata {
  const { statusCounts, totalTokens } = summarizeItems(Object.values(progress))

  return {
    feeds: runConfig?.feeds ?? [],
    lookbackDays: runConfig?.lookbackDays ?? 0,
    model: runConfig?.model ?? '',
    startedAt: startedAt ?? new Date().toISOString(),
    ...(completedAt != null && { completedAt }),
    ...(durationMs != null && { durationMs }),
    totalItems: Object.keys(progress).length,
    totalTokens,
    statusCounts,
    ...(estimate && { estimate }),
    ...(actual && { actual })
  }
}

async function writeProgressLog(progress: Record<string, ProcessedItem>): Promise<void> {
  const payload: ProgressLogOutput = { metadata: computeMetadata(progress), items: progress }

  await writeFile(join(getRunDir(), 'log.json'), JSON.stringify(payload, null, 2), 'utf8')
}

// Main Functions

// Each run starts with an empty log. The log is for post-run inspection only and is never read back.
export async function initProgressLog(
  progress: Record<string, ProcessedItem>,
  config: Config,
  preRunEstimate: CostEstimate
): Promise<void> {
  runConfig = config
  startedAt = new Date().toISOString()
  completedAt = null
  durationMs = null
  estimate = preRunEstimate
  actual = null

  await writeProgressLog(progress)
}

export async function appendProgressLog(progress: Record<string, ProcessedItem>, result: ProcessedItem): Promise<void> {
  const key = normalizedUrl(result.sourceUrl)

  progress[key] = { ...result, sourceUrl: key }

  const previous = writeChain

  writeChain = previous.then(() => writeProgressLog(progress))

  await writeChain // One write at a time so concurrent appends don't overwrite each other.
}

export async function finalizeProgressLog(
  progress: Record<string, ProcessedItem>,
  runDurationMs: number,
  actualCost: CostEstimate
): Promise<void> {
  completedAt = new Date().toISOString()
  durationMs = runDurationMs
  actual = actualCost

  await writeProgressLog(progress)
}
