import ms from "ms"
import { arrivalsOf } from "./interfaces/arrival.interface"
import type {
  Arrival,
  ArrivalFetcher,
  FetchResult,
  MonitoredTarget,
} from "./interfaces/arrival.interface"

export const STOP_CACHE_INTERVAL = ms("60s")

export interface StopCacheSnapshot {
  readonly refreshedAt: Date | null
  readonly results: ReadonlyMap<string, FetchResult>
}

const EMPTY_SNAPSHOT: StopCacheSnapshot = Object.freeze({
  refreshedAt: null,
  results: new Map<string, FetchResult>(),
})

/**
 * Latest results for a group of targets that share one refresh throttle:
 * a single refresh fetches every target, and no target is fetched again
 * until the interval has passed for the whole group.
 */
export class StopCache {
  private current: StopCacheSnapshot = EMPTY_SNAPSHOT
  private pending: Promise<StopCacheSnapshot> | null = null

  constructor(
    private readonly fetcher: ArrivalFetcher,
    readonly targets: readonly MonitoredTarget[],
    private readonly intervalMs: number = STOP_CACHE_INTERVAL,
  ) {}

  get snapshot(): StopCacheSnapshot {
    return this.current
  }

  isFresh(now: Date): boolean {
    const { refreshedAt } = this.current
    return (
      refreshedAt !== null &&
      now.getTime() - refreshedAt.getTime() < this.intervalMs
    )
  }

  async refresh(now: Date = new Date()): Promise<StopCacheSnapshot> {
    // Entities of one group update in the same tick; they share the refresh
    if (this.pending) {
      return this.pending
    }

    if (this.isFresh(now)) {
      return this.current
    }

    const promise = this.fetchAll(now)
    this.pending = promise

    try {
      return await promise
    } finally {
      this.pending = null
    }
  }

  resultFor(targetName: string): FetchResult {
    return this.current.results.get(targetName) ?? { kind: "no-data" }
  }

  arrivalsFor(targetName: string): Arrival[] {
    return arrivalsOf(this.resultFor(targetName))
  }

  private async fetchAll(now: Date): Promise<StopCacheSnapshot> {
    const results = new Map<string, FetchResult>()
    for (const target of this.targets) {
      results.set(target.name, await this.fetcher.fetch(target))
    }

    this.current = Object.freeze({ refreshedAt: now, results })
    return this.current
  }
}
