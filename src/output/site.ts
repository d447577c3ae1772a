import { mkdir, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { MAX_SLUG_LENGTH } from '../constants.js'
import { orderForPublication } from '../pipeline/itemPipeline.js'
import type { PublishedItem } from '../types.js'

// Constants

const POSTS_DIR = 'posts'

const INDEX_FILENAME = 'index.html'

const FALLBACK_SLUG = 'article'

const UNKNOWN_DATE = 'unknown'

const STYLES = `body { font-family: system-ui, -apple-system, Segoe UI, Roboto, Arial, sans-serif; max-width: 860px; margin: 2rem auto; padding: 0 1rem; line-height: 1.6; }
    h1 { line-height: 1.2; }
    h2 { margin-top: 1.5rem; }
    .meta { color: #666; font-size: 0.9rem; }
    ul.posts { list-style: none; padding-left: 0; }
    ul.posts > li { margin: 1rem 0 1.25rem; }
    .pill { display: inline-block; padding: .15rem .5rem; border: 1px solid #ccc; border-radius: 999px; font-size: .8rem; color: #333; }
    hr { border: none; border-top: 1px solid #eee; margin: 1.5rem 0; }
    a { color: #0b57d0; text-decoration: none; }
    a:hover { text-decoration: underline; }`

// Types

export interface SiteOptions {
  siteDir: string
  siteTitle: string
  htmlLang: string
  timeZone: string
  lookbackDays: number
  now?: Date
}

export interface SitePaths {
  index: string
  posts: string[]
}

// Text Helpers

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

export function slugify(text: string): string {
  const slug = text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/, '')

  return slug || FALLBACK_SLUG
}

// Formats as "d. M. yyyy HH:mm" in the given zone.
export function formatPublishedAt(date: Date | null, timeZone: string): string {
  if (!date) return UNKNOWN_DATE

  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23'
  }).formatToParts(date)

  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(entry => entry.type === type)?.value ?? ''

  // en-GB pads day and month; the format does not.
  return `${Number(part('day'))}. ${Number(part('month'))}. ${part('year')} ${part('hour')}:${part('minute')}`
}

// Markdown

// Input must already be escaped. Only links and bold survive as markup.
function renderInline(escaped: string): string {
  return escaped
    .replace(/\[([^\]]+)\]\((https?:\/\/[^\s)]+)\)/g, '<a href="$2" target="_blank" rel="noopener">$1</a>')
    .replace(/\*\*([^*]+)\*\*/g, '<strong>$1</strong>')
}

// Blocks are separated by blank lines. "## " and "### " become headings; everything else a paragraph.
export function markdownToHtml(markdown: string): string {
  const blocks = markdown
    .trim()
    .split(/\n\s*\n/)
    .map(block => block.trim())
    .filter(block => block.length > 0)

  return blocks
    .map(block => {
      if (block.startsWith('### ')) return `<h3>${renderInline(escapeHtml(block.slice(4).trim()))}</h3>`
      if (block.startsWith('## ')) return `<h2>${renderInline(escapeHtml(block.slice(3).trim()))}</h2>`

      return `<p>${renderInline(escapeHtml(block))}</p>`
    })
    .join('\n  ')
}

export function renderSocialPost(post: string): string {
  const [heading, ...rest] = post.split('\n').map(line => line.trim())
  const body = rest.filter(line => line.length > 0).join(' ')

  if (!body) return escapeHtml(heading)

  return `<strong>${escapeHtml(heading)}</strong> ${escapeHtml(body)}`
}

// Pages

function page(options: { lang: string; title: string; body: string }): string {
  return `<!DOCTYPE html>
<html lang="${escapeHtml(options.lang)}">
<head>
  <meta charset="UTF-8" />
  <title>${escapeHtml(options.title)}</title>
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <style>
    ${STYLES}
  </style>
</head>
<body>
${options.body}
</body>
</html>
`
}

export function renderPostHtml(item: PublishedItem, options: Pick<SiteOptions, 'htmlLang' | 'timeZone'>): string {
  const posts = item.content.socialPosts.map(post => `    <li>${renderSocialPost(post)}</li>`).join('\n')

  const body = `  <a class="pill" href="../${INDEX_FILENAME}">← Overview</a>
  <h1>${escapeHtml(item.title)}</h1>
  <div class="meta">
    Appeal: <strong>${item.appealScore}/5</strong> &nbsp;|&nbsp; Source: <a href="${escapeHtml(item.sourceUrl)}" target="_blank" rel="noopener">${escapeHtml(item.source)}</a> &nbsp;|&nbsp; Published: ${escapeHtml(formatPublishedAt(item.publishedAt, options.timeZone))}
  </div>
  ${markdownToHtml(item.content.blogArticle)}

  <hr />
  <h2>Social post ideas</h2>
  <ul>
${posts}
  </ul>

  <p><a href="../${INDEX_FILENAME}">← Back to overview</a></p>`

  return page({ lang: options.htmlLang, title: item.title, body })
}

export function renderIndexHtml(entries: { item: PublishedItem; href: string }[], options: SiteOptions): string {
  const list =
    entries.length > 0
      ? entries
          .map(
            ({ item, href }) => `    <li>
      <a href="${escapeHtml(href)}">${escapeHtml(item.title)}</a>
      <div class="meta">Appeal: <strong>${item.appealScore}/5</strong> &nbsp;|&nbsp; Source: ${escapeHtml(item.source)} &nbsp;|&nbsp; Published: ${escapeHtml(formatPublishedAt(item.publishedAt, options.timeZone))}</div>
    </li>`
          )
          .join('\n')
      : '    <li>Nothing to show yet.</li>'

  const updated = formatPublishedAt(options.now ?? new Date(), options.timeZone)

  const body = `  <h1>${escapeHtml(options.siteTitle)}</h1>
  <p>Legal news from the last ${options.lookbackDays} days, rated for appeal (1-5). Items rated 3-5 get a short article and three social post ideas.</p>
  <p class="meta">Last updated: ${escapeHtml(updated)}</p>

  <h2>Articles</h2>
  <ul class="posts">
${list}
  </ul>`

  return page({ lang: options.htmlLang, title: options.siteTitle, body })
}

// "-2", "-3", ... until the name is free, including names other titles produced on their own.
function uniqueSlug(base: string, used: Set<string>): string {
  let slug = base

  for (let suffix = 2; used.has(slug); suffix++) {
    slug = `${base}-${suffix}`
  }

  used.add(slug)

  return slug
}

// Main Function

// Replaces the posts directory on each run so pages from earlier runs do not linger.
export async function writeSite(items: readonly PublishedItem[], options: SiteOptions): Promise<SitePaths> {
  const postsDir = join(options.siteDir, POSTS_DIR)

  await rm(postsDir, { recursive: true, force: true })
  await mkdir(postsDir, { recursive: true })

  const usedSlugs = new Set<string>()
  const entries: { item: PublishedItem; href: string }[] = []
  const postPaths: string[] = []

  for (const item of orderForPublication(items)) {
    const slug = uniqueSlug(slugify(item.title), usedSlugs)
    const filename = `${slug}.html`
    const path = join(postsDir, filename)

    await writeFile(path, renderPostHtml(item, options), 'utf8')

    postPaths.push(path)
    entries.push({ item, href: `${POSTS_DIR}/${filename}` })
  }

  const indexPath = join(options.siteDir, INDEX_FILENAME)

  await writeFile(indexPath, renderIndexHtml(entries, options), 'utf8')

  return { index: indexPath, posts: postPaths }
}
