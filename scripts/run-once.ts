/**
 * Run a single poll cycle and exit.
 *
 * Usage:
 *   npm run once
 */

import { config, validateConfig } from '../src/config/index.js'
import { logger } from '../src/utils/logger.js'
import { createMonitor } from '../src/app.js'

async function main(): Promise<void> {
  validateConfig()

  const monitor = await createMonitor()
  const result = await monitor.runCycle()

  logger.info({ username: config.truthUsername, ...result }, 'Single cycle completed')
}

main().catch(error => {
  logger.error({ err: error }, 'Run failed')
  process.exit(1)
})
