import pLimit from 'p-limit'
import { config } from '../config/index.js'
import { logger } from '../utils/logger.js'
import { delay } from '../utils/delay.js'

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'

export interface FetchOptions {
  method?: 'GET' | 'POST'
  headers?: Record<string, string>
  body?: string
  retries?: number
  retryDelay?: number
  timeoutMs?: number
  maxConcurrentPerHost?: number
}

const DEFAULT_MAX_CONCURRENT_PER_HOST = 2
const hostLimits = new Map<string, ReturnType<typeof pLimit>>()

function getHostLimit(hostname: string, maxConcurrent: number): ReturnType<typeof pLimit> {
  const key = `${hostname}:${maxConcurrent}`
  const existing = hostLimits.get(key)
  if (existing) {
    return existing
  }
  const limiter = pLimit(maxConcurrent)
  hostLimits.set(key, limiter)
  return limiter
}

export function parseRetryAfter(retryAfter: string | null): number | null {
  if (!retryAfter) return null
  const seconds = Number(retryAfter)
  if (!Number.isNaN(seconds) && seconds >= 0) {
    return seconds * 1000
  }
  const parsedDate = Date.parse(retryAfter)
  if (!Number.isNaN(parsedDate)) {
    return Math.max(0, parsedDate - Date.now())
  }
  return null
}

export function withQuery(url: string, params?: Record<string, string>): string {
  if (!params || Object.keys(params).length === 0) return url
  const target = new URL(url)
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, value)
  }
  return target.toString()
}

export async function fetchWithRetry(
  url: string,
  options: FetchOptions = {}
): Promise<Response> {
  const {
    method = 'GET',
    retries = config.maxRetries,
    retryDelay = 2000,
    timeoutMs = config.requestTimeoutSeconds * 1000,
    maxConcurrentPerHost = DEFAULT_MAX_CONCURRENT_PER_HOST,
  } = options

  const headers: Record<string, string> = {
    'User-Agent': BROWSER_USER_AGENT,
    'Accept-Language': 'en-US,en;q=0.5',
    'Cache-Control': 'no-cache',
    ...options.headers,
  }

  const hostname = new URL(url).hostname
  const limiter = getHostLimit(hostname, maxConcurrentPerHost)

  return limiter(async () => {
    let lastError: Error | null = null

    for (let attempt = 1; attempt <= retries; attempt++) {
      const controller = new AbortController()
      const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

      try {
        const response = await fetch(url, {
          method,
          headers,
          body: options.body,
          signal: controller.signal,
        })
        clearTimeout(timeoutId)

        const retryable = response.status === 429 || response.status >= 500
        if (retryable && attempt < retries) {
          const retryAfterMs = parseRetryAfter(response.headers.get('Retry-After'))
          const backoffMs = response.status === 429 ? retryDelay * attempt * 2 : retryDelay * attempt
          const waitMs = retryAfterMs ? Math.max(retryAfterMs, backoffMs) : backoffMs
          logger.warn({ url, status: response.status, attempt, waitMs }, 'Retryable response, waiting...')
          await delay(waitMs)
          continue
        }

        return response
      } catch (error) {
        clearTimeout(timeoutId)
        lastError = error instanceof Error ? error : new Error(String(error))
        if (attempt < retries) {
          const waitMs = retryDelay * attempt
          logger.warn({ url, error: lastError.message, attempt, waitMs }, 'Fetch failed, retrying...')
          await delay(waitMs)
        }
      }
    }

    throw lastError || new Error(`Failed to fetch ${url} after ${retries} attempts`)
  })
}

export interface DownloadedMedia {
  content: Buffer
  filename: string
  contentType: string
}

const EXTENSION_BY_CONTENT_TYPE: Array<{ match: string; extension: string; accepted: string[] }> = [
  { match: 'image/jpeg', extension: '.jpg', accepted: ['.jpg', '.jpeg'] },
  { match: 'image/png', extension: '.png', accepted: ['.png'] },
  { match: 'image/gif', extension: '.gif', accepted: ['.gif'] },
  { match: 'video/', extension: '.mp4', accepted: ['.mp4', '.mov', '.webm'] },
]

export function mediaFilename(url: string, contentType: string): string {
  const lastSegment = url.split('/').pop() ?? ''
  let filename = lastSegment.split('?')[0] || 'attachment'
  const lowerType = contentType.toLowerCase()
  const lowerName = filename.toLowerCase()

  const rule = EXTENSION_BY_CONTENT_TYPE.find(entry => lowerType.includes(entry.match))
  if (rule && !rule.accepted.some(ext => lowerName.endsWith(ext))) {
    filename += rule.extension
  }

  return filename
}

// Returns null instead of throwing so one broken attachment does not block delivery
export async function downloadMedia(url: string): Promise<DownloadedMedia | null> {
  try {
    const response = await fetchWithRetry(url, {
      headers: {
        'Accept': 'image/*,video/*;q=0.9,*/*;q=0.5',
      },
    })

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`)
    }

    const contentType = response.headers.get('content-type') ?? 'application/octet-stream'
    const arrayBuffer = await response.arrayBuffer()

    return {
      content: Buffer.from(arrayBuffer),
      filename: mediaFilename(url, contentType),
      contentType,
    }
  } catch (error) {
    logger.error({ err: error, url }, 'Error downloading media')
    return null
  }
}
