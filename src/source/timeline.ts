import { config } from '../config/index.js'
import { logger } from '../utils/logger.js'
import { BROWSER_USER_AGENT } from './http.js'
import { SourceFetchError } from './errors.js'
import type { SourceFetcher } from './fetcher.js'
import { isRecord, parseTimelineStatus, type PostSource, type TimelineStatus } from './types.js'

// Only the newest unseen post is ever delivered, so a short page is enough
export const FETCH_LIMIT = 5

export interface TimelineGatewayOptions {
  fetcher: SourceFetcher
  instance?: string
  username?: string
  limit?: number
}

/**
 * Reads the public timeline of one account through the Mastodon API.
 * Errors stay inside: a failed fetch returns an empty page and drops the
 * cached account id so the next call looks it up again.
 */
export class TimelineGateway implements PostSource {
  private readonly fetcher: SourceFetcher
  private readonly instance: string
  private readonly username: string
  private readonly limit: number
  private accountId: string | null = null

  constructor(options: TimelineGatewayOptions) {
    this.fetcher = options.fetcher
    this.instance = options.instance ?? config.truthInstance
    this.username = options.username ?? config.truthUsername
    this.limit = options.limit ?? FETCH_LIMIT
  }

  get cachedAccountId(): string | null {
    return this.accountId
  }

  invalidateAccountId(): void {
    this.accountId = null
  }

  async fetchLatestPosts(): Promise<TimelineStatus[]> {
    try {
      const accountId = await this.resolveAccountId()

      const response = await this.fetcher.get(
        `https://${this.instance}/api/v1/accounts/${accountId}/statuses`,
        {
          headers: this.headers(),
          params: {
            exclude_replies: 'true',
            exclude_reblogs: 'true',
            limit: String(this.limit),
          },
        }
      )

      const body = response.parseJson()
      if (!Array.isArray(body)) {
        throw new SourceFetchError(
          `Invalid posts response: ${response.rawText().slice(0, 200)}`,
          'INVALID_TIMELINE'
        )
      }

      const posts = body.filter(isRecord).map(parseTimelineStatus)
      logger.info({ count: posts.length, fetcher: this.fetcher.name }, 'Retrieved posts')
      return posts
    } catch (error) {
      logger.error({ err: error, username: this.username }, 'Error getting timeline posts')
      this.invalidateAccountId()
      return []
    }
  }

  private async resolveAccountId(): Promise<string> {
    if (this.accountId) {
      return this.accountId
    }

    const response = await this.fetcher.get(
      `https://${this.instance}/api/v1/accounts/lookup`,
      { headers: this.headers(), params: { acct: this.username } }
    )
    const account = response.parseJson()

    if (!isRecord(account) || account.id === undefined || account.id === null || account.id === '') {
      throw new SourceFetchError(`Could not find user ID for ${this.username}`, 'ACCOUNT_NOT_FOUND')
    }

    this.accountId = String(account.id)
    logger.debug({ accountId: this.accountId }, 'Found and cached user ID')
    return this.accountId
  }

  private headers(): Record<string, string> {
    return {
      'User-Agent': BROWSER_USER_AGENT,
      'Accept': 'application/json',
      'Accept-Language': 'en-US,en;q=0.5',
      'Referer': `https://${this.instance}/@${this.username}`,
      'Origin': `https://${this.instance}`,
    }
  }
}
