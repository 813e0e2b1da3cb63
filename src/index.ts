import { config, validateConfig } from './config/index.js'
import { logger } from './utils/logger.js'
import { createMonitor } from './app.js'

async function main(): Promise<void> {
  try {
    validateConfig()
  } catch (error) {
    logger.error({ err: error }, 'Configuration validation failed')
    process.exit(1)
  }

  logger.info({ appName: config.appName }, 'Starting monitor...')

  const monitor = await createMonitor()
  await monitor.run()
}

main().catch(error => {
  logger.fatal({ err: error }, 'Fatal error')
  process.exit(1)
})
