import { config } from '../config/index.js'
import { logger } from '../utils/logger.js'
import { cleanHtml } from './html.js'
import { statusContent, type TimelineStatus } from '../source/types.js'

export const MAX_MESSAGE_LENGTH = 2000
// Discord counts some characters differently, keep a margin under the hard cap
const CONTENT_BUDGET = 1950
const ELLIPSIS = '...'

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
]

export interface MessageOptions {
  postType?: string
  fallbackUsername?: string
}

function capitalize(value: string): string {
  if (!value) return value
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase()
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

// e.g. "January 05, 2024 at 03:07 PM UTC"
export function formatTimestamp(date: Date): string {
  const hours = date.getUTCHours()
  const hour12 = hours % 12 === 0 ? 12 : hours % 12
  const period = hours < 12 ? 'AM' : 'PM'
  const month = MONTHS[date.getUTCMonth()]
  return `${month} ${pad(date.getUTCDate())}, ${date.getUTCFullYear()} at ${pad(hour12)}:${pad(date.getUTCMinutes())} ${period} UTC`
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text
  let cut = Math.max(0, maxLength - ELLIPSIS.length)
  // never split a surrogate pair
  if (cut > 0 && isHighSurrogate(text.charCodeAt(cut - 1))) {
    cut--
  }
  return text.slice(0, cut) + ELLIPSIS
}

/**
 * Builds the Discord message for a status, or null when the status cannot be
 * formatted (no parseable creation time).
 */
export function formatPostMessage(status: TimelineStatus, options: MessageOptions = {}): string | null {
  const postType = options.postType ?? config.postType
  const fallbackUsername = options.fallbackUsername ?? config.truthUsername

  const createdAt = new Date(status.created_at ?? '')
  if (Number.isNaN(createdAt.getTime())) {
    logger.error({ postId: status.id, createdAt: status.created_at }, 'Error formatting post: invalid created_at')
    return null
  }

  const username = status.account?.username || fallbackUsername
  const displayName = status.account?.display_name || username
  const content = cleanHtml(statusContent(status))

  const header = `**New ${capitalize(postType)} from ${displayName} (@${username})**\n`
  const footer = `\n*Posted at: ${formatTimestamp(createdAt)}*`

  const maxContentLength = Math.max(0, CONTENT_BUDGET - header.length - footer.length)
  const message = header + truncate(content, maxContentLength) + footer

  if (message.length > MAX_MESSAGE_LENGTH) {
    logger.warn({ postId: status.id, length: message.length }, 'Message too long, applying emergency truncation')
    return truncate(message, MAX_MESSAGE_LENGTH)
  }

  return message
}
