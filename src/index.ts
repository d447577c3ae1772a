#!/usr/bin/env node
import 'dotenv/config'
import { parseArgs } from 'node:util'
import type { Config } from './config.js'
import { loadConfig, resolveApiKey, resolveOverrides } from './config.js'
import { ConfigError, FeedUnavailableError, ModelUnavailableError } from './errors.js'
import {
  formatFailureLine,
  formatItemLine,
  printConfigBanner,
  printResultsSummary
} from './output/console.js'
import { appendProgressLog, finalizeProgressLog, initProgressLog } from './output/progressLog.js'
import { initRunDir } from './output/runDir.js'
import { writeSite } from './output/site.js'
import type { TerminalDisplay } from './output/terminalDisplay.js'
import { createTerminalDisplay } from './output/terminalDisplay.js'
import { createBatchProcessor } from './pipeline/batchProcessor.js'
import { actualCost, estimateCost, observedConstants } from './pipeline/costEstimator.js'
import { fetchFeeds } from './pipeline/feedFetcher.js'
import { assertAnyClassified, failedItem, isPublished, processItem } from './pipeline/itemPipeline.js'
import { createLanguageModel } from './pipeline/llmClient.js'
import type { ProcessedItem } from './types.js'
import { ITEM_STATUS } from './types.js'
import { pluralize } from './utils/format.js'

// Helpers

function parseFlags(): { model?: string; days?: string } {
  try {
    const { values } = parseArgs({
      options: {
        model: { type: 'string' },
        days: { type: 'string' }
      },
      strict: true
    })

    return values
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error))
  }
}

async function recordResult(
  progress: Record<string, ProcessedItem>,
  counts: { done: number; published: number },
  display: TerminalDisplay,
  result: ProcessedItem
): Promise<void> {
  await appendProgressLog(progress, result)

  counts.done += 1

  if (result.status === ITEM_STATUS.published) {
    counts.published += 1

    display.printPublished(formatItemLine(result))
  } else if (result.status === ITEM_STATUS.classification_failed || result.status === ITEM_STATUS.generation_failed) {
    display.printWarning(formatFailureLine(result))
  }
}

function spinnerText(counts: { done: number; published: number }, total: number): string {
  return `Processing... ${counts.done}/${total} done, ${pluralize(counts.published, 'published item')}`
}

// Main

async function run(config: Config, apiKey: string): Promise<void> {
  await initRunDir()

  const display = createTerminalDisplay()

  const shutdown = () => {
    display.stop()

    console.log('\nInterrupted')

    process.exit(130) // Exit code for SIGINT (Ctrl+C).
  }

  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)

  console.log(`Fetching ${pluralize(config.feeds.length, 'feed')} (last ${config.lookbackDays} days)...`)

  const items = await fetchFeeds({
    feeds: config.feeds,
    lookbackDays: config.lookbackDays,
    onFeed: (url, count) => display.printProgress(`  ${url}: ${pluralize(count, 'item')}`),
    onFeedError: (url, reason) => display.printWarning(`  ${url}: unavailable (${reason})`)
  })

  const estimate = estimateCost({
    itemCount: items.length,
    selectedFraction: config.costs.assumedSelectedFraction,
    averages: config.costs.averages,
    prices: config.costs.prices
  })

  printConfigBanner(config, items.length, estimate)

  // Start fresh each run (no resume); progress is for per-result persistence to the log file.
  const progress: Record<string, ProcessedItem> = {}

  await initProgressLog(progress, config, estimate)

  const startTime = Date.now()
  const counts = { done: 0, published: 0 }
  const llm = createLanguageModel({ apiKey, baseURL: config.baseURL })
  const processor = createBatchProcessor(config.concurrentLimit)

  display.startSpinner(spinnerText(counts, items.length))

  const results = await processor.run(items, {
    worker: item =>
      processItem(item, { llm, model: config.model, language: config.language, voices: config.socialVoices }),
    onError: (error, item) => failedItem(item, error),
    onResult: async result => {
      await recordResult(progress, counts, display, result)

      display.updateSpinner(spinnerText(counts, items.length))
    }
  })

  display.stop()

  const durationMs = Date.now() - startTime
  const actual = actualCost(results, config.costs.prices)

  await finalizeProgressLog(progress, durationMs, actual)

  // Leaves the existing site in place when no item could be classified.
  assertAnyClassified(results)

  const sitePaths = await writeSite(results.filter(isPublished), {
    siteDir: config.siteDir,
    siteTitle: config.siteTitle,
    htmlLang: config.htmlLang,
    timeZone: config.timeZone,
    lookbackDays: config.lookbackDays
  })

  printResultsSummary(results, durationMs, sitePaths, {
    estimate,
    actual,
    observedFraction: observedConstants(results).selectedFraction,
    assumedFraction: config.costs.assumedSelectedFraction
  })
}

async function main(): Promise<void> {
  const config = await loadConfig(resolveOverrides(process.env, parseFlags()))
  const apiKey = resolveApiKey(process.env)

  await run(config, apiKey)
}

main().catch(error => {
  // Known fatal conditions get a one-line message; anything else keeps its stack.
  if (
    error instanceof ConfigError ||
    error instanceof FeedUnavailableError ||
    error instanceof ModelUnavailableError
  ) {
    console.error(`Error: ${error.message}`)
  } else {
    console.error(error)
  }

  process.exit(1)
})
