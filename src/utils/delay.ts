// Utility for rate limiting and delays

export type Sleep = (ms: number) => Promise<void>

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export interface RateLimiterOptions {
  calls: number
  periodMs: number
  now?: () => number
  sleep?: Sleep
}

// Allows at most `calls` acquisitions in any rolling window of `periodMs`.
// acquire() suspends the caller until a slot frees instead of failing.
export class SlidingWindowRateLimiter {
  private readonly calls: number
  private readonly periodMs: number
  private readonly now: () => number
  private readonly sleep: Sleep
  private timestamps: number[] = []

  constructor(options: RateLimiterOptions) {
    if (options.calls < 1 || options.periodMs <= 0) {
      throw new Error('Rate limiter needs at least one call per positive period')
    }
    this.calls = options.calls
    this.periodMs = options.periodMs
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? delay
  }

  async acquire(): Promise<number> {
    let waitedMs = 0

    while (true) {
      const now = this.now()
      this.timestamps = this.timestamps.filter(ts => now - ts < this.periodMs)

      if (this.timestamps.length < this.calls) {
        this.timestamps.push(now)
        return waitedMs
      }

      const waitMs = this.timestamps[0] + this.periodMs - now
      waitedMs += waitMs
      await this.sleep(waitMs)
    }
  }

  get inFlight(): number {
    const now = this.now()
    return this.timestamps.filter(ts => now - ts < this.periodMs).length
  }
}
