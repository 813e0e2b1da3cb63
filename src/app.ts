import { config } from './config/index.js'
import { logger } from './utils/logger.js'
import { SupabaseLedger } from './database/ledger.js'
import { createSourceFetcher } from './source/fetcher.js'
import { TimelineGateway } from './source/timeline.js'
import { createNotifier } from './notify/discord.js'
import { PostMonitor } from './monitor/poller.js'

// Wires the production collaborators; throws when the ledger is unreachable
export async function createMonitor(): Promise<PostMonitor> {
  const ledger = new SupabaseLedger()
  await ledger.verifyConnection()

  const fetcher = createSourceFetcher()
  const notifier = createNotifier()

  logger.info({
    username: config.truthUsername,
    instance: config.truthInstance,
    fetcher: fetcher.name,
    notifier: notifier.name,
    table: config.supabaseTable,
    delay: config.repeatDelaySeconds,
  }, 'Monitor configured')

  return new PostMonitor({
    source: new TimelineGateway({ fetcher }),
    ledger,
    notifier,
  })
}
