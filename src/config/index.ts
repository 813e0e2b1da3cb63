import dotenv from 'dotenv'
import path from 'path'
import { fileURLToPath } from 'url'

const __dirname = path.dirname(fileURLToPath(import.meta.url))
export const ENV_PATH = path.resolve(__dirname, '..', '..', '.env')

dotenv.config({ path: ENV_PATH })

export interface MonitorConfig {
  appName: string
  logLevel: string

  // Source account
  truthUsername: string
  truthInstance: string
  postType: string

  // Discord
  discordNotify: boolean
  discordWebhookUrl: string
  discordUsername: string

  // Supabase ledger
  supabaseUrl: string
  supabaseKey: string
  supabaseTable: string

  // Polling and HTTP
  repeatDelaySeconds: number
  requestTimeoutSeconds: number
  maxRetries: number

  // FlareSolverr
  flareSolverrEnabled: boolean
  flareSolverrAddress: string
  flareSolverrPort: number
}

export class ConfigValidationError extends Error {
  constructor(public readonly problems: string[]) {
    super(problems.join('\n'))
    this.name = 'ConfigValidationError'
  }
}

type Env = Record<string, string | undefined>

function getEnvVar(env: Env, name: string, defaultValue = ''): string {
  const value = env[name]?.trim()
  return value || defaultValue
}

function getEnvBool(env: Env, name: string, defaultValue: boolean): boolean {
  const value = env[name]
  if (value === undefined || value.trim() === '') return defaultValue
  const normalized = value.trim().toLowerCase()
  return normalized === 'true' || normalized === '1'
}

// NaN is kept so validateConfig can report the offending variable
function getEnvInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name]?.trim()
  if (!value) return defaultValue
  return /^-?\d+$/.test(value) ? parseInt(value, 10) : Number.NaN
}

export function loadConfigFromEnv(env: Env = process.env): MonitorConfig {
  return {
    appName: getEnvVar(env, 'APPNAME', 'Truth Social Monitor'),
    logLevel: getEnvVar(env, 'LOG_LEVEL', 'info').toLowerCase(),

    truthUsername: getEnvVar(env, 'TRUTH_USERNAME'),
    truthInstance: getEnvVar(env, 'TRUTH_INSTANCE', 'truthsocial.com'),
    postType: getEnvVar(env, 'POST_TYPE', 'post'),

    discordNotify: getEnvBool(env, 'DISCORD_NOTIFY', true),
    discordWebhookUrl: getEnvVar(env, 'DISCORD_WEBHOOK_URL'),
    discordUsername: getEnvVar(env, 'DISCORD_USERNAME', 'Truth Social Bot'),

    supabaseUrl: getEnvVar(env, 'SUPABASE_URL'),
    supabaseKey: getEnvVar(env, 'SUPABASE_KEY'),
    supabaseTable: getEnvVar(env, 'SUPABASE_TABLE', 'posts'),

    repeatDelaySeconds: getEnvInt(env, 'REPEAT_DELAY', 300),
    requestTimeoutSeconds: getEnvInt(env, 'REQUEST_TIMEOUT', 30),
    maxRetries: getEnvInt(env, 'MAX_RETRIES', 3),

    flareSolverrEnabled: getEnvBool(env, 'FLARESOLVERR_ENABLED', true),
    flareSolverrAddress: getEnvVar(env, 'FLARESOLVERR_ADDRESS', 'localhost'),
    flareSolverrPort: getEnvInt(env, 'FLARESOLVERR_PORT', 8191),
  }
}

export let config: MonitorConfig = loadConfigFromEnv()

export function reloadConfig(env: Env = process.env): void {
  config = loadConfigFromEnv(env)
}

export function getConfigProblems(target: MonitorConfig = config): string[] {
  const problems: string[] = []

  if (!target.truthUsername) {
    problems.push('TRUTH_USERNAME is required')
  }

  if (target.discordNotify && !target.discordWebhookUrl) {
    problems.push('DISCORD_WEBHOOK_URL is required when DISCORD_NOTIFY is enabled')
  }

  if (!target.supabaseUrl) {
    problems.push('SUPABASE_URL is required')
  }
  if (!target.supabaseKey) {
    problems.push('SUPABASE_KEY is required')
  }

  const positiveInts: Array<[string, number]> = [
    ['REPEAT_DELAY', target.repeatDelaySeconds],
    ['REQUEST_TIMEOUT', target.requestTimeoutSeconds],
    ['MAX_RETRIES', target.maxRetries],
    ['FLARESOLVERR_PORT', target.flareSolverrPort],
  ]
  for (const [name, value] of positiveInts) {
    if (!Number.isInteger(value) || value < 1) {
      problems.push(`${name} must be a positive integer`)
    }
  }

  return problems
}

export function validateConfig(target: MonitorConfig = config): void {
  const problems = getConfigProblems(target)
  if (problems.length > 0) {
    throw new ConfigValidationError(problems)
  }
}
