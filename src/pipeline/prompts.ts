import { MAX_SUMMARY_LENGTH } from '../constants.js'
import type { FeedItem } from '../types.js'

// Constants

const NO_SUMMARY = '(no summary)'

export const SOCIAL_POST_SEPARATOR = '---'

// Classification: a single digit, nothing else.
export const CLASSIFY_SYSTEM_INSTRUCTION = 'Answer with a single digit from 1 to 5 and nothing else.'

// Helpers

function itemContext(item: Pick<FeedItem, 'title' | 'summary'>): string {
  const summary = item.summary.trim()
  const clipped = summary.length > MAX_SUMMARY_LENGTH ? `${summary.slice(0, MAX_SUMMARY_LENGTH)}…` : summary

  return `Title: ${item.title}
Summary: ${clipped || NO_SUMMARY}`
}

// Builders

export function buildClassifyUserContent(item: Pick<FeedItem, 'title' | 'summary'>): string {
  return `<role>
You are a legal analyst. Rate how APPEALING this news item is for a professional legal blog, on a scale of 1 to 5:
1 = minor update of no significance
2 = marginal
3 = relevant to part of the readership
4 = significant (real-world impact or precedent)
5 = landmark (major legislative change, constitutional or supreme court ruling)
</role>

<output_format>
Return only the number 1-5.
</output_format>

<context>
${itemContext(item)}
</context>`
}

export function buildBlogSystemInstruction(language: string): string {
  return `You are an experienced legal copywriter. You write in ${language}, clearly and without advertising.`
}

export function buildBlogUserContent(item: Pick<FeedItem, 'title' | 'summary' | 'sourceUrl'>, language: string): string {
  return `<task>
Write an article in ${language} for the general public (3-5 paragraphs).
Style: clear, short sentences, no jargon, no advertising, no "contact us" calls to action.
</task>

<constraints>
- Use 1-2 subheadings in Markdown ("## ").
- Link the original source exactly once, naturally within the text, as [source](${item.sourceUrl}).
- Stick to the facts in the material below. Do not invent anything.
- Separate paragraphs with a blank line.
</constraints>

<context>
${itemContext(item)}
</context>`
}

export function buildSocialSystemInstruction(language: string): string {
  return `You are a social-media content specialist. You write in ${language}, factually and in a friendly tone.`
}

export function buildSocialUserContent(
  item: Pick<FeedItem, 'title' | 'summary'>,
  language: string,
  voices: readonly string[]
): string {
  const headings = voices.map(voice => `"${voice}:"`).join(' / ')
  const template = voices.map(voice => `${voice}:\n<2-3 sentences>`).join(`\n${SOCIAL_POST_SEPARATOR}\n`)

  return `<task>
Write ${voices.length} different short social-media posts in ${language}, each 2-3 sentences, about the topic below.
Start each block with the heading ${headings} (in exactly this wording), followed by the text.
No advertising and no "contact us" calls to action. The posts must differ from each other.
</task>

<context>
${itemContext(item)}
</context>

<output_format>
${SOCIAL_POST_SEPARATOR}
${template}
${SOCIAL_POST_SEPARATOR}
</output_format>`
}
