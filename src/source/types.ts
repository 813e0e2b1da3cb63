// Mastodon-compatible status payload. Everything is optional because the
// body comes from an untrusted, proxied response.

export type MediaKind = 'image' | 'video' | 'gifv'

export const DELIVERABLE_MEDIA_KINDS: readonly string[] = ['image', 'video', 'gifv']

export interface TimelineAccount {
  id?: string
  username?: string
  acct?: string
  display_name?: string | null
}

export interface TimelineMedia {
  id?: string
  type?: string
  url?: string | null
  preview_url?: string | null
}

export interface TimelineStatus {
  id?: string
  created_at?: string
  content?: string | null
  text?: string | null
  url?: string | null
  account?: TimelineAccount
  media_attachments?: TimelineMedia[]
  reblog?: TimelineStatus | null
}

export interface MediaDescriptor {
  type: MediaKind
  url: string
}

function isMediaKind(value: string | undefined): value is MediaKind {
  return value !== undefined && DELIVERABLE_MEDIA_KINDS.includes(value)
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function parseId(value: unknown): string | undefined {
  if (typeof value === 'string' && value) return value
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  return undefined
}

function parseMediaList(value: unknown): TimelineMedia[] {
  const entries: unknown[] = Array.isArray(value) ? value : []
  const media: TimelineMedia[] = []
  for (const entry of entries) {
    if (!isRecord(entry)) continue
    media.push({
      id: parseId(entry.id),
      type: optionalString(entry.type),
      url: optionalString(entry.url),
      preview_url: optionalString(entry.preview_url),
    })
  }
  return media
}

function parseAccount(value: unknown): TimelineAccount | undefined {
  if (!isRecord(value)) return undefined
  return {
    id: parseId(value.id),
    username: optionalString(value.username),
    acct: optionalString(value.acct),
    display_name: optionalString(value.display_name),
  }
}

/**
 * Narrows one decoded timeline entry to the fields the monitor reads. Fields
 * of the wrong type are dropped, so a malformed entry degrades to a status
 * the poller skips instead of one that throws later.
 */
export function parseTimelineStatus(value: Record<string, unknown>): TimelineStatus {
  return {
    id: parseId(value.id),
    created_at: optionalString(value.created_at),
    content: optionalString(value.content),
    text: optionalString(value.text),
    url: optionalString(value.url),
    account: parseAccount(value.account),
    media_attachments: Array.isArray(value.media_attachments) ? parseMediaList(value.media_attachments) : undefined,
    reblog: isRecord(value.reblog) ? parseTimelineStatus(value.reblog) : undefined,
  }
}

// Only image, video and gifv attachments are kept; url falls back to preview_url.
// Entries that are not attachment objects are skipped.
export function toMediaDescriptors(status: TimelineStatus): MediaDescriptor[] {
  const descriptors: MediaDescriptor[] = []
  for (const media of parseMediaList(status.media_attachments)) {
    const url = media.url || media.preview_url
    if (isMediaKind(media.type) && url) {
      descriptors.push({ type: media.type, url })
    }
  }
  return descriptors
}

export function statusContent(status: TimelineStatus): string {
  return optionalString(status.content) || optionalString(status.text) || ''
}

export interface PostSource {
  fetchLatestPosts(): Promise<TimelineStatus[]>
}
