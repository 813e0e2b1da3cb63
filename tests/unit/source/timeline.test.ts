import { describe, expect, it } from 'vitest'
import { DirectResponse, type SourceFetcher, type SourceRequest, type SourceResponse } from '../../../src/source/fetcher.js'
import { FETCH_LIMIT, TimelineGateway } from '../../../src/source/timeline.js'

interface Call {
  url: string
  request?: SourceRequest
}

class ScriptedFetcher implements SourceFetcher {
  readonly name = 'scripted'
  readonly calls: Call[] = []
  lookupBody: unknown = { id: '42', username: 'someone' }
  statusesBody: unknown = [{ id: '1', created_at: '2024-01-01T00:00:00Z', content: '<p>Hello</p>' }]
  failStatuses = false

  async get(url: string, request?: SourceRequest): Promise<SourceResponse> {
    this.calls.push({ url, request })
    if (url.endsWith('/accounts/lookup')) {
      return new DirectResponse(JSON.stringify(this.lookupBody))
    }
    if (this.failStatuses) {
      throw new Error('socket hang up')
    }
    return new DirectResponse(JSON.stringify(this.statusesBody))
  }

  lookups(): number {
    return this.calls.filter(call => call.url.endsWith('/accounts/lookup')).length
  }
}

function createGateway(fetcher: ScriptedFetcher) {
  return new TimelineGateway({ fetcher, instance: 'social.test', username: 'someone' })
}

describe('TimelineGateway', () => {
  it('resolves the account once and requests the latest statuses', async () => {
    const fetcher = new ScriptedFetcher()
    const gateway = createGateway(fetcher)

    const first = await gateway.fetchLatestPosts()
    await gateway.fetchLatestPosts()

    expect(first).toEqual([{ id: '1', created_at: '2024-01-01T00:00:00Z', content: '<p>Hello</p>' }])
    expect(fetcher.lookups()).toBe(1)
    expect(gateway.cachedAccountId).toBe('42')

    const statusesCall = fetcher.calls[1]
    expect(statusesCall.url).toBe('https://social.test/api/v1/accounts/42/statuses')
    expect(statusesCall.request?.params).toEqual({
      exclude_replies: 'true',
      exclude_reblogs: 'true',
      limit: String(FETCH_LIMIT),
    })
    expect(statusesCall.request?.headers?.Referer).toBe('https://social.test/@someone')
  })

  it('passes the handle to the lookup endpoint', async () => {
    const fetcher = new ScriptedFetcher()

    await createGateway(fetcher).fetchLatestPosts()

    expect(fetcher.calls[0].url).toBe('https://social.test/api/v1/accounts/lookup')
    expect(fetcher.calls[0].request?.params).toEqual({ acct: 'someone' })
  })

  it('returns an empty page and forgets the account id on errors', async () => {
    const fetcher = new ScriptedFetcher()
    const gateway = createGateway(fetcher)
    await gateway.fetchLatestPosts()

    fetcher.failStatuses = true
    expect(await gateway.fetchLatestPosts()).toEqual([])
    expect(gateway.cachedAccountId).toBeNull()

    fetcher.failStatuses = false
    await gateway.fetchLatestPosts()
    expect(fetcher.lookups()).toBe(2)
  })

  it('returns an empty page when the account cannot be found', async () => {
    const fetcher = new ScriptedFetcher()
    fetcher.lookupBody = { error: 'Record not found' }

    expect(await createGateway(fetcher).fetchLatestPosts()).toEqual([])
    expect(fetcher.calls).toHaveLength(1)
  })

  it('rejects a timeline that is not a list', async () => {
    const fetcher = new ScriptedFetcher()
    fetcher.statusesBody = { error: 'rate limited' }
    const gateway = createGateway(fetcher)

    expect(await gateway.fetchLatestPosts()).toEqual([])
    expect(gateway.cachedAccountId).toBeNull()
  })

  it('drops entries that are not objects', async () => {
    const fetcher = new ScriptedFetcher()
    fetcher.statusesBody = [{ id: '1' }, 'junk', null, { id: '2' }]

    expect(await createGateway(fetcher).fetchLatestPosts()).toEqual([{ id: '1' }, { id: '2' }])
  })

  it('keeps only well-typed fields of each status', async () => {
    const fetcher = new ScriptedFetcher()
    fetcher.statusesBody = [{
      id: 9,
      created_at: '2024-01-01T00:00:00Z',
      content: { html: 'nope' },
      account: 'someone',
      media_attachments: [null, { type: 'image', url: 'https://cdn.test/a.jpg', preview_url: 5 }],
      reblog: 'yes',
    }]

    const [status] = await createGateway(fetcher).fetchLatestPosts()

    expect(status).toEqual({
      id: '9',
      created_at: '2024-01-01T00:00:00Z',
      media_attachments: [{ type: 'image', url: 'https://cdn.test/a.jpg' }],
    })
    expect(status.content).toBeUndefined()
    expect(status.account).toBeUndefined()
    expect(status.reblog).toBeUndefined()
  })

  it('stringifies numeric account ids', async () => {
    const fetcher = new ScriptedFetcher()
    fetcher.lookupBody = { id: 1234 }
    const gateway = createGateway(fetcher)

    await gateway.fetchLatestPosts()

    expect(gateway.cachedAccountId).toBe('1234')
  })
})
