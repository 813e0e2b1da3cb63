import { describe, expect, it } from 'vitest'
import {
  MAX_MESSAGE_LENGTH,
  formatPostMessage,
  formatTimestamp,
  truncate,
} from '../../../src/format/message.js'
import { makeStatus } from '../../helpers/fakes.js'

const options = { postType: 'post', fallbackUsername: 'fallback' }
const FOOTER = '\n*Posted at: January 01, 2024 at 12:00 AM UTC*'

describe('formatPostMessage', () => {
  it('builds header, cleaned body and footer', () => {
    const message = formatPostMessage(makeStatus({ content: '<p>Hello <b>world</b></p>' }), options)

    expect(message).toBe(`**New Post from Alice (@alice)**\nHello world${FOOTER}`)
  })

  it('capitalizes the post type label', () => {
    const message = formatPostMessage(makeStatus(), { ...options, postType: 'TRUTH' })

    expect(message?.startsWith('**New Truth from Alice (@alice)**\n')).toBe(true)
  })

  it('falls back to the configured username when the account is missing', () => {
    const message = formatPostMessage(makeStatus({ account: undefined }), options)

    expect(message?.split('\n')[0]).toBe('**New Post from fallback (@fallback)**')
  })

  it('uses the plain text field when content is empty', () => {
    const message = formatPostMessage(makeStatus({ content: '', text: 'From text' }), options)

    expect(message).toBe(`**New Post from Alice (@alice)**\nFrom text${FOOTER}`)
  })

  it('truncates long content to fit header and footer under the budget', () => {
    const message = formatPostMessage(makeStatus({ content: 'a'.repeat(5000) }), options)

    expect(message).toHaveLength(1950)
    expect(message?.endsWith(`...${FOOTER}`)).toBe(true)
    expect(message).toBe(`**New Post from Alice (@alice)**\n${'a'.repeat(1868)}...${FOOTER}`)
  })

  it('applies the emergency cap when the header alone is too long', () => {
    const status = makeStatus({ account: { username: 'alice', display_name: 'D'.repeat(2100) } })

    const message = formatPostMessage(status, options)

    expect(message).toHaveLength(MAX_MESSAGE_LENGTH)
    expect(message?.endsWith('...')).toBe(true)
  })

  it('returns null for an unparseable timestamp', () => {
    expect(formatPostMessage(makeStatus({ created_at: 'yesterday' }), options)).toBeNull()
    expect(formatPostMessage(makeStatus({ created_at: undefined }), options)).toBeNull()
  })
})

describe('formatTimestamp', () => {
  it('renders a 12-hour UTC clock', () => {
    expect(formatTimestamp(new Date('2024-03-05T15:07:00Z'))).toBe('March 05, 2024 at 03:07 PM UTC')
    expect(formatTimestamp(new Date('2024-12-31T12:30:00Z'))).toBe('December 31, 2024 at 12:30 PM UTC')
  })
})

describe('truncate', () => {
  it('leaves short text alone', () => {
    expect(truncate('short', 10)).toBe('short')
  })

  it('ends cut text with an ellipsis within the limit', () => {
    expect(truncate('abcdefghij', 8)).toBe('abcde...')
  })

  it('cuts before an emoji instead of through it', () => {
    expect(truncate('a\u{1F600}bcdef', 5)).toBe('a...')
    expect(truncate('ab\u{1F600}cdef', 5)).toBe('ab...')
    expect(truncate('ab\u{1F600}cdef', 6)).toBe('ab...')
    expect(truncate('ab\u{1F600}cdef', 7)).toBe('ab\u{1F600}...')
  })
})
