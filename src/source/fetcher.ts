import * as cheerio from 'cheerio'
import { config } from '../config/index.js'
import { logger } from '../utils/logger.js'
import { fetchWithRetry, withQuery } from './http.js'
import { SourceFetchError } from './errors.js'

export interface SourceResponse {
  parseJson(): unknown
  rawText(): string
}

export interface SourceRequest {
  headers?: Record<string, string>
  params?: Record<string, string>
}

export interface SourceFetcher {
  readonly name: string
  get(url: string, request?: SourceRequest): Promise<SourceResponse>
}

const PREVIEW_LENGTH = 500

export class DirectResponse implements SourceResponse {
  constructor(private readonly body: string) {}

  parseJson(): unknown {
    return JSON.parse(this.body)
  }

  rawText(): string {
    return this.body
  }
}

/**
 * Body relayed by FlareSolverr. The proxy renders the target in a browser, so
 * a JSON endpoint usually comes back wrapped as `<html><body><pre>{...}</pre>`.
 */
export class ProxiedResponse implements SourceResponse {
  constructor(private readonly body: string) {}

  parseJson(): unknown {
    try {
      return JSON.parse(this.body)
    } catch {
      return this.parseEmbeddedJson()
    }
  }

  rawText(): string {
    return this.body
  }

  private parseEmbeddedJson(): unknown {
    const $ = cheerio.load(this.body)
    const pre = $('pre').first()

    if (pre.length === 0) {
      logger.error({ preview: this.body.slice(0, PREVIEW_LENGTH) }, 'No <pre> tag found in proxied HTML response')
      throw new SourceFetchError('Proxied response contains no JSON payload', 'NO_JSON_PAYLOAD')
    }

    const text = pre.text()
    try {
      return JSON.parse(text)
    } catch (error) {
      logger.error({ err: error, preview: text.slice(0, PREVIEW_LENGTH) }, 'Failed to parse JSON from <pre>')
      throw new SourceFetchError('Proxied <pre> block is not valid JSON', 'NO_JSON_PAYLOAD', error)
    }
  }
}

export class DirectFetcher implements SourceFetcher {
  readonly name = 'direct'

  async get(url: string, request: SourceRequest = {}): Promise<SourceResponse> {
    const target = withQuery(url, request.params)
    const response = await fetchWithRetry(target, { headers: request.headers })
    const body = await response.text()

    if (!response.ok) {
      logger.error({
        url: target,
        status: response.status,
        body: body.slice(0, PREVIEW_LENGTH),
      }, 'Source returned an error status')
      throw new SourceFetchError(`HTTP ${response.status} for ${target}`, 'HTTP_ERROR')
    }

    return new DirectResponse(body)
  }
}

interface FlareSolverrReply {
  status?: string
  message?: string
  solution?: {
    status?: number
    response?: string
  }
}

function isFlareSolverrReply(value: unknown): value is FlareSolverrReply {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export interface FlareSolverrOptions {
  address: string
  port: number
  maxTimeoutMs?: number
}

export class FlareSolverrFetcher implements SourceFetcher {
  readonly name = 'flaresolverr'
  private readonly endpoint: string
  private readonly maxTimeoutMs: number

  constructor(options: FlareSolverrOptions = {
    address: config.flareSolverrAddress,
    port: config.flareSolverrPort,
  }) {
    this.endpoint = `http://${options.address}:${options.port}/v1`
    this.maxTimeoutMs = options.maxTimeoutMs ?? 15000
  }

  async get(url: string, request: SourceRequest = {}): Promise<SourceResponse> {
    const target = withQuery(url, request.params)
    logger.info({ url: target }, 'Making FlareSolverr request')

    const payload: Record<string, unknown> = {
      cmd: 'request.get',
      url: target,
      maxTimeout: this.maxTimeoutMs,
    }
    if (request.headers) {
      payload.headers = request.headers
    }

    const response = await fetchWithRetry(this.endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'Accept': 'application/json' },
      body: JSON.stringify(payload),
    })

    if (!response.ok) {
      throw new SourceFetchError(`FlareSolverr returned HTTP ${response.status}`, 'PROXY_ERROR')
    }

    const reply: unknown = await response.json()
    const solved = isFlareSolverrReply(reply) ? reply : {}
    const content = solved.status === 'ok' ? solved.solution?.response : undefined
    if (typeof content !== 'string') {
      logger.error({ url: target, reply }, 'FlareSolverr error')
      throw new SourceFetchError(`FlareSolverr error: ${solved.message ?? 'unexpected reply'}`, 'PROXY_ERROR')
    }

    logger.debug({ preview: content.slice(0, PREVIEW_LENGTH) }, 'FlareSolverr raw response')
    return new ProxiedResponse(content)
  }
}

export function createSourceFetcher(): SourceFetcher {
  return config.flareSolverrEnabled ? new FlareSolverrFetcher() : new DirectFetcher()
}
