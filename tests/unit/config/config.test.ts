import { describe, expect, it } from 'vitest'
import {
  ConfigValidationError,
  getConfigProblems,
  loadConfigFromEnv,
  validateConfig,
} from '../../../src/config/index.js'

const validEnv = {
  TRUTH_USERNAME: 'someone',
  DISCORD_WEBHOOK_URL: 'https://discord.test/api/webhooks/1/test-token',
  SUPABASE_URL: 'https://ledger.test',
  SUPABASE_KEY: 'test-secret',
}

describe('loadConfigFromEnv', () => {
  it('applies defaults for optional settings', () => {
    const config = loadConfigFromEnv({})

    expect(config).toMatchObject({
      appName: 'Truth Social Monitor',
      logLevel: 'info',
      truthInstance: 'truthsocial.com',
      postType: 'post',
      discordNotify: true,
      discordUsername: 'Truth Social Bot',
      supabaseTable: 'posts',
      repeatDelaySeconds: 300,
      requestTimeoutSeconds: 30,
      maxRetries: 3,
      flareSolverrEnabled: true,
      flareSolverrAddress: 'localhost',
      flareSolverrPort: 8191,
    })
  })

  it('parses booleans and integers', () => {
    const config = loadConfigFromEnv({
      DISCORD_NOTIFY: 'False',
      FLARESOLVERR_ENABLED: '0',
      REPEAT_DELAY: '60',
      LOG_LEVEL: 'DEBUG',
    })

    expect(config.discordNotify).toBe(false)
    expect(config.flareSolverrEnabled).toBe(false)
    expect(config.repeatDelaySeconds).toBe(60)
    expect(config.logLevel).toBe('debug')
  })
})

describe('validateConfig', () => {
  it('accepts a complete environment', () => {
    expect(() => validateConfig(loadConfigFromEnv(validEnv))).not.toThrow()
  })

  it('reports every missing setting at once', () => {
    const config = loadConfigFromEnv({})

    expect(getConfigProblems(config)).toEqual([
      'TRUTH_USERNAME is required',
      'DISCORD_WEBHOOK_URL is required when DISCORD_NOTIFY is enabled',
      'SUPABASE_URL is required',
      'SUPABASE_KEY is required',
    ])

    try {
      validateConfig(config)
      expect.unreachable('validateConfig should throw')
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError)
      expect(error instanceof ConfigValidationError && error.problems).toHaveLength(4)
    }
  })

  it('does not require a webhook when notifications are off', () => {
    const config = loadConfigFromEnv({ ...validEnv, DISCORD_WEBHOOK_URL: '', DISCORD_NOTIFY: 'false' })

    expect(getConfigProblems(config)).toEqual([])
  })

  it('rejects non-numeric and non-positive numbers', () => {
    const config = loadConfigFromEnv({ ...validEnv, REPEAT_DELAY: 'soon', MAX_RETRIES: '0' })

    expect(getConfigProblems(config)).toEqual([
      'REPEAT_DELAY must be a positive integer',
      'MAX_RETRIES must be a positive integer',
    ])
  })
})
