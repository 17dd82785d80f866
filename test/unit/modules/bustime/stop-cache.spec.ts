import { normalizeVisit } from "src/modules/bustime/arrival-normalizer"
import type {
  ArrivalFetcher,
  FetchResult,
  LogSink,
  MonitoredTarget,
} from "src/modules/bustime/interfaces/arrival.interface"
import { StopCache } from "src/modules/bustime/stop-cache"
import { mock, MockProxy } from "vitest-mock-extended"
import { makeVisit } from "../../../helpers/siri-fixtures"

const targets: MonitoredTarget[] = [
  { name: "Home", monitoringRef: "400001", routeOverride: "MTA NYCT_B63" },
  { name: "Work", monitoringRef: "400002", routeOverride: "MTA NYCT_B63" },
]

const arrivalsAt = (expected: string): FetchResult => ({
  kind: "arrivals",
  arrivals: [normalizeVisit(makeVisit({ expected }), { logger: mock<LogSink>() })],
})

describe("StopCache", () => {
  const start = new Date("2024-06-01T18:00:00Z")
  const later = (seconds: number) => new Date(start.getTime() + seconds * 1000)

  let fetcher: MockProxy<ArrivalFetcher>
  let cache: StopCache

  beforeEach(() => {
    fetcher = mock<ArrivalFetcher>()
    fetcher.fetch.mockImplementation(async (target) =>
      target.name === "Home"
        ? arrivalsAt("2024-06-01T14:05:00-04:00")
        : { kind: "no-arrivals" },
    )

    cache = new StopCache(fetcher, targets)
  })

  it("starts empty", () => {
    expect(cache.snapshot.refreshedAt).toBeNull()
    expect(cache.snapshot.results.size).toBe(0)
    expect(cache.resultFor("Home")).toEqual({ kind: "no-data" })
    expect(cache.arrivalsFor("Home")).toEqual([])
  })

  it("fetches every target on the first refresh", async () => {
    await cache.refresh(start)

    expect(fetcher.fetch).toHaveBeenCalledTimes(2)
    expect(fetcher.fetch).toHaveBeenNthCalledWith(1, targets[0])
    expect(fetcher.fetch).toHaveBeenNthCalledWith(2, targets[1])
    expect(cache.snapshot.refreshedAt).toEqual(start)
    expect(
      cache.arrivalsFor("Home").map((a) => a.record.estimatedArrivalTime),
    ).toEqual(["June 01, 2024 at 02:05 PM"])
    expect(cache.resultFor("Work")).toEqual({ kind: "no-arrivals" })
  })

  it("does not refetch within the interval", async () => {
    await cache.refresh(start)
    await cache.refresh(later(59.999))

    expect(fetcher.fetch).toHaveBeenCalledTimes(2)
    expect(cache.snapshot.refreshedAt).toEqual(start)
  })

  it("refetches every target once the interval has passed", async () => {
    await cache.refresh(start)
    await cache.refresh(later(30))
    await cache.refresh(later(60))

    expect(fetcher.fetch).toHaveBeenCalledTimes(4)
    expect(cache.snapshot.refreshedAt).toEqual(later(60))
  })

  it("retries failed targets on the next interval", async () => {
    fetcher.fetch.mockResolvedValue({ kind: "failed", reason: "HTTP 500" })
    await cache.refresh(start)

    expect(cache.arrivalsFor("Home")).toEqual([])
    expect(cache.arrivalsFor("Work")).toEqual([])

    fetcher.fetch.mockResolvedValue(arrivalsAt("2024-06-01T14:05:00-04:00"))
    await cache.refresh(later(10))
    expect(cache.arrivalsFor("Home")).toEqual([])

    await cache.refresh(later(61))
    expect(cache.arrivalsFor("Home")).toHaveLength(1)
    expect(cache.arrivalsFor("Work")).toHaveLength(1)
    expect(fetcher.fetch).toHaveBeenCalledTimes(4)
  })

  it("shares a refresh between concurrent callers", async () => {
    const [first, second] = await Promise.all([
      cache.refresh(start),
      cache.refresh(start),
    ])

    expect(fetcher.fetch).toHaveBeenCalledTimes(2)
    expect(second).toBe(first)
  })

  it("replaces the snapshot instead of mutating it", async () => {
    await cache.refresh(start)
    const before = cache.snapshot

    fetcher.fetch.mockResolvedValue({ kind: "no-data" })
    await cache.refresh(later(60))

    expect(cache.snapshot).not.toBe(before)
    expect(before.results.get("Work")).toEqual({ kind: "no-arrivals" })
    expect(cache.resultFor("Work")).toEqual({ kind: "no-data" })
  })

  it("returns nothing for a target it does not track", async () => {
    await cache.refresh(start)

    expect(cache.arrivalsFor("Gym")).toEqual([])
  })
})
