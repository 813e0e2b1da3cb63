import * as cheerio from 'cheerio'

// Bare http(s) URLs not already inside () or []
const BARE_URL_PATTERN = /(?<![([])(https?:\/\/\S+)(?![)\]])/g

const REPOST_MARKERS = ['RT ', 'RT@']

export function toPlainText(html: string): string {
  if (!html) return ''
  return cheerio.load(html, null, false).root().text().trim()
}

/**
 * Turns status HTML into message text: `<br>` and `<p>` become line breaks,
 * blank-line runs collapse to a single blank line and bare URLs are wrapped
 * in angle brackets so Discord does not unfurl them.
 */
export function cleanHtml(html: string): string {
  if (!html) return ''

  const $ = cheerio.load(html, null, false)
  $('br').replaceWith('\n')
  $('p').prepend('\n')

  return $.root()
    .text()
    .replace(/\n\s*\n/g, '\n\n')
    .replace(/ +/g, ' ')
    .trim()
    .replace(BARE_URL_PATTERN, '<$1>')
}

export function isRepostText(html: string): boolean {
  const text = toPlainText(html).toUpperCase()
  return REPOST_MARKERS.some(marker => text.startsWith(marker))
}
