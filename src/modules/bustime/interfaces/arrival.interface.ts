import type { LoggerService } from "@nestjs/common"

/** Placeholder for a display value the feed did not provide or that could not be parsed. */
export const UNAVAILABLE = "Unavailable"

export type LogSink = Pick<LoggerService, "warn" | "error">

export interface MonitoredTarget {
  readonly name: string
  readonly monitoringRef: string
  readonly routeOverride?: string
}

export interface ParsedTimestamp {
  instant: Date
  /** Offset of the source timestamp from UTC, in minutes east of Greenwich. */
  offsetMinutes: number
}

export interface VehicleLocation {
  latitude: number
  longitude: number
}

export interface ArrivalRecord {
  route: string | null
  destination: string | null
  vehicleLocation: VehicleLocation | null
  progressRate: string | null
  aimedArrivalTime: string
  estimatedArrivalTime: string
  presentableDistance: string
  distanceMeters: number | null
  passengerCount: number | null
  passengerCapacity: number | null
  stopName: string | null
}

export interface Arrival {
  record: ArrivalRecord
  expectedArrival: ParsedTimestamp | null
}

export type FetchResult =
  | { kind: "arrivals"; arrivals: Arrival[] }
  | { kind: "no-arrivals" }
  | { kind: "no-data" }
  | { kind: "failed"; reason: string }

export function arrivalsOf(result: FetchResult): Arrival[] {
  return result.kind === "arrivals" ? result.arrivals : []
}

export interface ArrivalFetcher {
  /** Resolves with a failed result instead of rejecting. */
  fetch(target: MonitoredTarget): Promise<FetchResult>
}
