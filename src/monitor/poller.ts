import { config } from '../config/index.js'
import { logger } from '../utils/logger.js'
import { delay, type Sleep } from '../utils/delay.js'
import { formatPostMessage, type MessageOptions } from '../format/message.js'
import { toMediaDescriptors, type PostSource, type TimelineStatus } from '../source/types.js'
import type { Ledger } from '../database/ledger.js'
import { DeliveryError, type Notifier } from '../notify/types.js'
import { DedupCache } from './dedup-cache.js'
import { isRepost, postId, sortNewestFirst } from './classifier.js'

export type MonitorState = 'fetching' | 'classifying' | 'delivering' | 'waiting'

const MIN_RECOMMENDED_DELAY_SECONDS = 5

export interface CycleResult {
  fetched: number
  delivered: string | null
  reposts: string[]
  skipped: number
}

export interface PostMonitorOptions {
  source: PostSource
  ledger: Ledger
  notifier: Notifier
  cache?: DedupCache
  intervalSeconds?: number
  message?: MessageOptions
  sleep?: Sleep
}

/**
 * Single sequential poller. Each cycle fetches the latest statuses, records
 * reposts without delivering them and relays at most one new post, the
 * newest, so a backlog after downtime never floods the channel.
 */
export class PostMonitor {
  readonly cache: DedupCache
  private readonly source: PostSource
  private readonly ledger: Ledger
  private readonly notifier: Notifier
  private readonly intervalSeconds: number
  private readonly messageOptions: MessageOptions
  private readonly sleep: Sleep
  private currentState: MonitorState = 'waiting'
  private cycles = 0

  constructor(options: PostMonitorOptions) {
    this.source = options.source
    this.ledger = options.ledger
    this.notifier = options.notifier
    this.cache = options.cache ?? new DedupCache()
    this.intervalSeconds = options.intervalSeconds ?? config.repeatDelaySeconds
    this.messageOptions = options.message ?? {}
    this.sleep = options.sleep ?? delay
  }

  get state(): MonitorState {
    return this.currentState
  }

  async runCycle(): Promise<CycleResult> {
    this.currentState = 'fetching'
    const statuses = await this.source.fetchLatestPosts()

    this.currentState = 'classifying'
    const result: CycleResult = { fetched: statuses.length, delivered: null, reposts: [], skipped: 0 }

    for (const status of sortNewestFirst(statuses)) {
      const id = postId(status)
      if (!id) {
        logger.warn({ status }, 'Invalid post structure, skipping')
        result.skipped++
        continue
      }

      if (await this.alreadyProcessed(id)) {
        logger.debug({ postId: id }, 'Post already processed, skipping')
        result.skipped++
        continue
      }

      if (isRepost(status)) {
        await this.recordRepost(id, status)
        result.reposts.push(id)
        continue
      }

      const message = formatPostMessage(status, this.messageOptions)
      if (!message) {
        logger.warn({ postId: id }, 'Could not format message for post, skipping')
        result.skipped++
        continue
      }

      this.currentState = 'delivering'
      await this.deliver(id, status, message)
      result.delivered = id

      logger.info({ postId: id }, 'Processed latest new post, leaving older posts for later cycles')
      break
    }

    return result
  }

  async run(): Promise<never> {
    while (true) {
      this.cycles++
      try {
        const result = await this.runCycle()
        logger.info({ cycle: this.cycles, ...result, cacheSize: this.cache.size }, 'Cycle completed')
      } catch (error) {
        logger.error({ err: error, cycle: this.cycles }, 'Error in main loop')
      }

      this.currentState = 'waiting'
      if (this.intervalSeconds < MIN_RECOMMENDED_DELAY_SECONDS) {
        logger.warn({ delay: this.intervalSeconds }, 'REPEAT_DELAY is very low, consider at least 5 seconds to avoid rate limiting')
      }
      logger.info({ delay: this.intervalSeconds }, 'Waiting before next check...')
      await this.sleep(this.intervalSeconds * 1000)
    }
  }

  private async alreadyProcessed(id: string): Promise<boolean> {
    if (this.cache.contains(id)) {
      return true
    }

    // 'unknown' falls back to the cache, which already said no
    const lookup = await this.ledger.isRecorded(id)
    if (lookup === 'recorded') {
      this.cache.add(id)
      return true
    }
    return false
  }

  private async recordRepost(id: string, status: TimelineStatus): Promise<void> {
    logger.info({ postId: id }, 'Post is a repost, recording without notifying')
    this.cache.add(id)

    const write = await this.ledger.record(status)
    if (write.kind !== 'ok') {
      logger.debug({ postId: id, kind: write.kind }, 'Could not save repost to ledger (non-critical)')
    }
  }

  private async deliver(id: string, status: TimelineStatus, message: string): Promise<void> {
    logger.info({ postId: id }, 'Processing new post')

    const write = await this.ledger.record(status)
    if (write.kind === 'ok') {
      logger.info({ postId: id }, 'Saved post to ledger')
    } else {
      logger.warn({ postId: id, kind: write.kind }, 'Failed to save post to ledger, relying on cache to prevent duplicates')
    }

    this.cache.add(id)

    const outcome = await this.notifier.deliver(message, toMediaDescriptors(status))
    if (!outcome.ok) {
      // The ledger row stays: re-recording is an idempotent upsert
      this.cache.remove(id)
      throw new DeliveryError(`Failed to send post ${id}: ${outcome.error}`, id, outcome.status)
    }

    logger.info({ postId: id, notifier: this.notifier.name }, 'Successfully delivered post')
  }
}
