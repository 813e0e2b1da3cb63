import type { SupabaseClient } from '@supabase/supabase-js'
import { getSupabaseClient } from './client.js'
import { config } from '../config/index.js'
import { logger } from '../utils/logger.js'
import {
  statusContent,
  toMediaDescriptors,
  type MediaDescriptor,
  type TimelineStatus,
} from '../source/types.js'

export type LedgerLookup = 'recorded' | 'absent' | 'unknown'

export type LedgerErrorKind =
  | 'already_exists'
  | 'permission_denied'
  | 'not_found'
  | 'unreachable'
  | 'transient_failure'

export type LedgerWriteResult =
  | { kind: 'ok' }
  | { kind: LedgerErrorKind; message: string }

export interface LedgerRecord {
  id: string
  content: string
  created_at: string
  sent_at: string
  username: string
  display_name?: string
  media_attachments?: MediaDescriptor[]
}

export interface Ledger {
  verifyConnection(): Promise<void>
  isRecorded(id: string): Promise<LedgerLookup>
  record(status: TimelineStatus): Promise<LedgerWriteResult>
}

export class LedgerUnavailableError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message)
    this.name = 'LedgerUnavailableError'
  }
}

interface LedgerErrorLike {
  code?: string
  message?: string
}

const PERMISSION_CODES = new Set(['42501'])
const MISSING_TABLE_CODES = new Set(['42P01', 'PGRST205'])
const DUPLICATE_KEY_CODES = new Set(['23505'])

export function classifyLedgerError(error: LedgerErrorLike, status?: number): LedgerErrorKind {
  const code = error.code ?? ''
  if (DUPLICATE_KEY_CODES.has(code)) return 'already_exists'
  if (PERMISSION_CODES.has(code) || status === 401 || status === 403) return 'permission_denied'
  if (MISSING_TABLE_CODES.has(code) || status === 404) return 'not_found'
  // postgrest-js reports a transport failure with status 0
  if (status === 0) return 'unreachable'
  return 'transient_failure'
}

export function ledgerHint(kind: LedgerErrorKind, table: string): string {
  switch (kind) {
    case 'permission_denied':
      return `Row Level Security may be blocking access to '${table}'; add policies allowing SELECT and INSERT/UPDATE for this key`
    case 'not_found':
      return `Table '${table}' does not exist; create it in the Supabase project`
    case 'unreachable':
      return 'Supabase could not be reached; check SUPABASE_URL and network access'
    case 'already_exists':
      return 'Row already exists; upsert should have merged it'
    case 'transient_failure':
      return 'Unexpected Supabase error; the post may not be saved'
  }
}

function describeThrown(error: unknown): LedgerErrorLike {
  return { message: error instanceof Error ? error.message : String(error) }
}

export function toLedgerRecord(status: TimelineStatus, sentAt: Date = new Date()): LedgerRecord {
  const record: LedgerRecord = {
    id: String(status.id),
    content: statusContent(status),
    created_at: status.created_at ?? '',
    sent_at: sentAt.toISOString(),
    username: status.account?.username ?? '',
  }

  const displayName = status.account?.display_name
  if (displayName) {
    record.display_name = displayName
  }

  const media = toMediaDescriptors(status)
  if (media.length > 0) {
    record.media_attachments = media
  }

  return record
}

export interface SupabaseLedgerOptions {
  client?: SupabaseClient
  table?: string
  now?: () => Date
}

/**
 * Processed-post ledger backed by a Supabase table keyed by post id.
 * Writes are upserts so recording the same id twice keeps one row.
 */
export class SupabaseLedger implements Ledger {
  private readonly client: SupabaseClient
  private readonly table: string
  private readonly now: () => Date

  constructor(options: SupabaseLedgerOptions = {}) {
    this.client = options.client ?? getSupabaseClient()
    this.table = options.table ?? config.supabaseTable
    this.now = options.now ?? (() => new Date())
  }

  async verifyConnection(): Promise<void> {
    const { error, status } = await this.client
      .from(this.table)
      .select('id')
      .limit(1)
      .then(result => result, (thrown: unknown) => {
        logger.error({ err: thrown, table: this.table }, 'Failed to connect to Supabase')
        throw new LedgerUnavailableError('Supabase is unreachable', thrown)
      })

    if (!error) {
      logger.info({ table: this.table }, 'Successfully tested Supabase connection')
      return
    }

    const kind = classifyLedgerError(error, status)
    const hint = ledgerHint(kind, this.table)

    if (kind === 'unreachable') {
      logger.error({ err: error, table: this.table, hint }, 'Failed to connect to Supabase')
      throw new LedgerUnavailableError(`Supabase is unreachable: ${error.message}`, error)
    }

    if (kind === 'permission_denied' || kind === 'not_found') {
      logger.error({ err: error, table: this.table, kind, hint }, 'Supabase table check failed')
    } else {
      logger.warn({ err: error, table: this.table, kind, hint }, 'Could not test Supabase table access, continuing')
    }
  }

  async isRecorded(id: string): Promise<LedgerLookup> {
    try {
      const { data, error, status } = await this.client
        .from(this.table)
        .select('id')
        .eq('id', id)
        .limit(1)

      if (error) {
        const kind = classifyLedgerError(error, status)
        logger.error({ err: error, postId: id, kind, hint: ledgerHint(kind, this.table) }, 'Error checking if post is processed')
        return 'unknown'
      }

      return data && data.length > 0 ? 'recorded' : 'absent'
    } catch (error) {
      logger.error({ err: error, postId: id }, 'Error checking if post is processed')
      return 'unknown'
    }
  }

  async record(status: TimelineStatus): Promise<LedgerWriteResult> {
    const id = String(status.id)

    try {
      const doc = toLedgerRecord(status, this.now())
      logger.debug({ postId: id, table: this.table, doc }, 'Upserting post')

      const { data, error, status: httpStatus } = await this.client
        .from(this.table)
        .upsert(doc, { onConflict: 'id' })
        .select('id')

      if (error) {
        return this.failure(doc.id, error, httpStatus)
      }

      if (data && data.length > 0) {
        logger.info({ postId: doc.id }, 'Marked post as processed')
        return { kind: 'ok' }
      }

      // Some RLS setups accept the write but hide the returned row
      logger.warn({ postId: doc.id }, 'Upsert returned no data, verifying')
      const lookup = await this.isRecorded(doc.id)
      if (lookup === 'recorded') {
        logger.info({ postId: doc.id }, 'Post verified to exist despite empty upsert response')
        return { kind: 'ok' }
      }

      const message = `Post ${doc.id} was not saved after upsert`
      logger.error({ postId: doc.id, lookup }, message)
      return { kind: 'transient_failure', message }
    } catch (error) {
      return this.failure(id, describeThrown(error))
    }
  }

  private failure(id: string, error: LedgerErrorLike, status?: number): LedgerWriteResult {
    const kind = classifyLedgerError(error, status)
    const message = error.message ?? 'unknown error'
    const hint = ledgerHint(kind, this.table)

    if (kind === 'already_exists') {
      logger.warn({ postId: id, hint }, 'Post already exists, treating as processed')
      return { kind: 'ok' }
    }

    logger.error({ err: error, postId: id, kind, hint }, 'Error marking post as processed')
    return { kind, message }
  }
}
