// Normalize URL (strip utm_* parameters and the fragment) so the same article linked from several feeds or campaigns normalizes to one canonical URL.
export function normalizedUrl(url: string): string {
  try {
    const parsedUrl = new URL(url)

    for (const key of [...parsedUrl.searchParams.keys()]) {
      if (key.toLowerCase().startsWith('utm_')) parsedUrl.searchParams.delete(key)
    }

    parsedUrl.hash = ''

    return parsedUrl.toString()
  } catch {
    return url
  }
}
