import * as cheerio from 'cheerio'
import type { Cheerio, CheerioAPI } from 'cheerio'
import type { Element } from 'domhandler'
import { FEED_TIMEOUT_MS, USER_AGENT } from '../constants.js'
import { errorMessage, FeedUnavailableError } from '../errors.js'
import type { FeedItem } from '../types.js'
import { fetchWithRetry } from '../utils/retry.js'
import { normalizedUrl } from '../utils/url.js'

// Constants

const DAY_MS = 24 * 60 * 60 * 1000

const FEED_HEADERS: Record<string, string> = {
  'User-Agent': USER_AGENT,
  Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5'
}

// Types

export interface FetchFeedsOptions {
  feeds: string[]
  lookbackDays: number
  now?: Date
  retries?: number
  baseDelayMs?: number
  onFeed?: (url: string, count: number) => void
  onFeedError?: (url: string, reason: string) => void
}

export interface FeedFailure {
  url: string
  reason: string
}

export type ParsedFeed = { ok: true; source: string; items: FeedItem[] } | { ok: false; reason: string }

// Helpers

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

// Feed descriptions are usually escaped HTML. Parse once more to drop the markup.
function stripHtml(text: string): string {
  if (!text.includes('<')) return collapseWhitespace(text)

  return collapseWhitespace(cheerio.load(text).root().text())
}

function parseDate(value: string): Date | null {
  if (!value.trim()) return null

  const date = new Date(value.trim())

  return Number.isNaN(date.getTime()) ? null : date
}

function firstText($entry: Cheerio<Element>, selectors: string[]): string {
  for (const selector of selectors) {
    const text = $entry.children(selector).first().text().trim()

    if (text) return text
  }

  return ''
}

function atomLink($: CheerioAPI, $entry: Cheerio<Element>): string {
  const links = $entry.children('link').toArray()
  const alternate = links.find(link => {
    const rel = $(link).attr('rel')

    return !rel || rel === 'alternate'
  })

  return ($(alternate ?? links[0]).attr('href') ?? '').trim()
}

function toFeedItem(
  fields: { title: string; link: string; summary: string; date: string },
  source: string
): FeedItem | null {
  const title = collapseWhitespace(fields.title)
  const link = fields.link.trim()

  if (!title || !link) return null

  return {
    title,
    summary: stripHtml(fields.summary),
    publishedAt: parseDate(fields.date),
    sourceUrl: link,
    source
  }
}

// Parsing

export function parseFeed(xml: string, feedUrl: string): ParsedFeed {
  const $ = cheerio.load(xml, { xml: true })
  const $rss = $('rss, rdf\\:RDF').first()
  const $atom = $('feed').first()

  if ($rss.length === 0 && $atom.length === 0) {
    return { ok: false, reason: 'Not an RSS or Atom feed' }
  }

  const items: FeedItem[] = []

  if ($rss.length > 0) {
    const source = $('channel').first().children('title').first().text().trim() || feedUrl

    $('item').each((_, element) => {
      const $item = $(element)
      const item = toFeedItem(
        {
          title: firstText($item, ['title']),
          link: firstText($item, ['link']),
          summary: firstText($item, ['description', 'content\\:encoded']),
          date: firstText($item, ['pubDate', 'dc\\:date', 'published', 'updated'])
        },
        source
      )

      if (item) items.push(item)
    })

    return { ok: true, source, items }
  }

  const source = $atom.children('title').first().text().trim() || feedUrl

  $atom.children('entry').each((_, element) => {
    const $entry = $(element)
    const item = toFeedItem(
      {
        title: firstText($entry, ['title']),
        link: atomLink($, $entry),
        summary: firstText($entry, ['summary', 'content']),
        date: firstText($entry, ['published', 'updated'])
      },
      source
    )

    if (item) items.push(item)
  })

  return { ok: true, source, items }
}

export function isWithinLookback(item: FeedItem, cutoff: Date): boolean {
  // Undated entries cannot be placed outside the window, so they are kept.
  return item.publishedAt === null || item.publishedAt.getTime() >= cutoff.getTime()
}

async function fetchFeed(url: string, options: FetchFeedsOptions): Promise<ParsedFeed> {
  try {
    const response = await fetchWithRetry(url, {
      headers: FEED_HEADERS,
      signal: AbortSignal.timeout(FEED_TIMEOUT_MS),
      retries: options.retries,
      baseDelayMs: options.baseDelayMs
    })

    if (!response.ok) return { ok: false, reason: `HTTP ${response.status}` }

    return parseFeed(await response.text(), url)
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') return { ok: false, reason: 'Timeout' }

    return { ok: false, reason: errorMessage(error) }
  }
}

// Main Function

// Items keep feed order, then entry order. The first occurrence of a link wins.
export async function fetchFeeds(options: FetchFeedsOptions): Promise<FeedItem[]> {
  const now = options.now ?? new Date()
  const cutoff = new Date(now.getTime() - options.lookbackDays * DAY_MS)
  const seen = new Set<string>()
  const failures: FeedFailure[] = []
  const items: FeedItem[] = []

  for (const url of options.feeds) {
    const result = await fetchFeed(url, options)

    if (!result.ok) {
      failures.push({ url, reason: result.reason })

      options.onFeedError?.(url, result.reason)

      continue
    }

    let count = 0

    for (const item of result.items) {
      if (!isWithinLookback(item, cutoff)) continue

      const key = normalizedUrl(item.sourceUrl)

      if (seen.has(key)) continue

      seen.add(key)

      items.push({ ...item, sourceUrl: key })

      count += 1
    }

    options.onFeed?.(url, count)
  }

  if (options.feeds.length > 0 && failures.length === options.feeds.length) {
    throw new FeedUnavailableError(failures)
  }

  return items
}
