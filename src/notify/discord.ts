import { config } from '../config/index.js'
import { logger } from '../utils/logger.js'
import { delay, SlidingWindowRateLimiter, type Sleep } from '../utils/delay.js'
import { downloadMedia, parseRetryAfter, type DownloadedMedia } from '../source/http.js'
import type { MediaDescriptor } from '../source/types.js'
import type { DeliveryOutcome, Notifier } from './types.js'

// Discord allows 30 webhook executions per minute per channel
export const DISCORD_CALLS = 30
export const DISCORD_PERIOD_MS = 60_000
const DEFAULT_RETRY_AFTER_SECONDS = 5

export interface DiscordNotifierOptions {
  webhookUrl?: string
  username?: string
  rateLimiter?: SlidingWindowRateLimiter
  download?: (url: string) => Promise<DownloadedMedia | null>
  sleep?: Sleep
  timeoutMs?: number
}

interface WebhookResponse {
  status: number
  body: string
  retryAfterHeader: string | null
}

function readRetryAfterMs(response: WebhookResponse): number {
  try {
    const parsed: unknown = JSON.parse(response.body)
    if (typeof parsed === 'object' && parsed !== null && 'retry_after' in parsed) {
      const seconds = Number(parsed.retry_after)
      if (Number.isFinite(seconds) && seconds >= 0) {
        return seconds * 1000
      }
    }
  } catch {
    // Body is not JSON, fall through to the header
  }
  return parseRetryAfter(response.retryAfterHeader) ?? DEFAULT_RETRY_AFTER_SECONDS * 1000
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300
}

export class DiscordNotifier implements Notifier {
  readonly name = 'discord'
  private readonly webhookUrl: string
  private readonly username: string
  private readonly rateLimiter: SlidingWindowRateLimiter
  private readonly download: (url: string) => Promise<DownloadedMedia | null>
  private readonly sleep: Sleep
  private readonly timeoutMs: number

  constructor(options: DiscordNotifierOptions = {}) {
    this.webhookUrl = options.webhookUrl ?? config.discordWebhookUrl
    this.username = options.username ?? config.discordUsername
    this.sleep = options.sleep ?? delay
    this.rateLimiter = options.rateLimiter ?? new SlidingWindowRateLimiter({
      calls: DISCORD_CALLS,
      periodMs: DISCORD_PERIOD_MS,
      sleep: this.sleep,
    })
    this.download = options.download ?? downloadMedia
    this.timeoutMs = options.timeoutMs ?? config.requestTimeoutSeconds * 1000
  }

  async deliver(message: string, media: MediaDescriptor[]): Promise<DeliveryOutcome> {
    if (!message) {
      logger.warn('Empty message, skipping Discord notification')
      return { ok: false, error: 'empty message' }
    }

    const files = await this.downloadAll(media)

    try {
      logger.info({ files: files.length }, 'Sending Discord webhook...')
      let response = await this.execute(message, files)

      if (response.status === 400) {
        logger.error({
          length: message.length,
          preview: message.slice(0, 500),
          body: response.body,
        }, 'Discord rejected the message')
      } else if (response.status === 429) {
        const waitMs = readRetryAfterMs(response)
        logger.warn({ waitMs }, 'Discord rate limit hit, waiting before a single retry')
        await this.sleep(waitMs)
        response = await this.execute(message, files)
      }

      if (!isSuccess(response.status)) {
        const error = `Discord returned status code ${response.status}: ${response.body}`
        logger.error({ status: response.status }, error)
        return { ok: false, status: response.status, error }
      }

      logger.info({ status: response.status }, 'Successfully sent message to Discord')
      return { ok: true, status: response.status }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      logger.error({ err: error }, 'Error sending message to Discord')
      return { ok: false, error: reason }
    }
  }

  private async downloadAll(media: MediaDescriptor[]): Promise<DownloadedMedia[]> {
    const files: DownloadedMedia[] = []
    for (const item of media) {
      const file = await this.download(item.url)
      if (file) {
        files.push(file)
      }
    }
    return files
  }

  private async execute(message: string, files: DownloadedMedia[]): Promise<WebhookResponse> {
    const waitedMs = await this.rateLimiter.acquire()
    if (waitedMs > 0) {
      logger.info({ waitedMs }, 'Waited for Discord rate limit window')
    }

    const payload = { content: message, username: this.username }
    let init: RequestInit

    if (files.length === 0) {
      init = {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      }
    } else {
      // A fresh form per attempt: request bodies cannot be replayed
      const form = new FormData()
      form.append('payload_json', JSON.stringify(payload))
      files.forEach((file, index) => {
        form.append(`files[${index}]`, new Blob([new Uint8Array(file.content)], { type: file.contentType }), file.filename)
      })
      init = { method: 'POST', body: form }
    }

    const response = await fetch(this.webhookUrl, {
      ...init,
      signal: AbortSignal.timeout(this.timeoutMs),
    })

    return {
      status: response.status,
      body: await response.text(),
      retryAfterHeader: response.headers.get('Retry-After'),
    }
  }
}

// Used when DISCORD_NOTIFY is off: the pipeline still runs end to end
export class LogNotifier implements Notifier {
  readonly name = 'log'

  async deliver(message: string, media: MediaDescriptor[]): Promise<DeliveryOutcome> {
    logger.info({ message, media: media.length }, 'Notifications disabled, logging post instead')
    return { ok: true, status: 200 }
  }
}

export function createNotifier(): Notifier {
  return config.discordNotify ? new DiscordNotifier() : new LogNotifier()
}
