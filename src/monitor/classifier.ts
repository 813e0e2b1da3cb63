import { isRepostText } from '../format/html.js'
import { statusContent, type TimelineStatus } from '../source/types.js'

export function postId(status: TimelineStatus): string | null {
  return status.id ? String(status.id) : null
}

// The structured reblog field wins; the leading "RT" marker catches
// cross-posted retweets that arrive as plain statuses.
export function isRepost(status: TimelineStatus): boolean {
  if (status.reblog) return true
  return isRepostText(statusContent(status))
}

// ISO-8601 strings sort chronologically; statuses without a timestamp go last
export function sortNewestFirst(statuses: TimelineStatus[]): TimelineStatus[] {
  return [...statuses].sort((a, b) => {
    const left = a.created_at ?? ''
    const right = b.created_at ?? ''
    if (left === right) return 0
    return left < right ? 1 : -1
  })
}
