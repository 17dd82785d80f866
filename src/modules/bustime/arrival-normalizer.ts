import { UNAVAILABLE } from "./interfaces/arrival.interface"
import type {
  Arrival,
  ArrivalRecord,
  LogSink,
  VehicleLocation,
} from "./interfaces/arrival.interface"
import type {
  SiriCallExtensions,
  SiriCapacities,
  SiriDistances,
  SiriMonitoredCall,
  SiriMonitoredStopVisit,
  SiriMonitoredVehicleJourney,
  SiriVehicleLocation,
} from "./interfaces/siri.interface"
import { formatDisplayTime, parseTimestamp } from "./time/time-parser"

export interface NormalizeOptions {
  logger: LogSink
  /** Name of the monitored target, used to give log lines context. */
  targetName?: string
}

const toText = (value: unknown): string | null => {
  if (typeof value === "string" && value.trim().length > 0) return value.trim()
  if (Array.isArray(value)) {
    for (const item of value) {
      if (typeof item === "string" && item.trim().length > 0) return item.trim()
    }
  }
  return null
}

const toNumber = (value: unknown): number | null =>
  typeof value === "number" && Number.isFinite(value) ? value : null

const toLocation = (
  location: SiriVehicleLocation | null | undefined,
): VehicleLocation | null => {
  const latitude = toNumber(location?.Latitude)
  const longitude = toNumber(location?.Longitude)
  if (latitude === null || longitude === null) {
    return null
  }

  return { latitude, longitude }
}

export function normalizeVisit(
  visit: SiriMonitoredStopVisit | null | undefined,
  { logger, targetName }: NormalizeOptions,
): Arrival {
  const journey: SiriMonitoredVehicleJourney =
    visit?.MonitoredVehicleJourney ?? {}
  const call: SiriMonitoredCall = journey.MonitoredCall ?? {}
  const extensions: SiriCallExtensions = call.Extensions ?? {}
  const distances: SiriDistances = extensions.Distances ?? {}
  const capacities: SiriCapacities = extensions.Capacities ?? {}

  const aimed = parseTimestamp(
    toText(call.AimedArrivalTime),
    "AimedArrivalTime",
    logger,
    targetName,
  )
  const expected = parseTimestamp(
    toText(call.ExpectedArrivalTime),
    "ExpectedArrivalTime",
    logger,
    targetName,
  )

  const record: ArrivalRecord = {
    route: toText(journey.PublishedLineName),
    destination: toText(journey.DestinationName),
    vehicleLocation: toLocation(journey.VehicleLocation),
    progressRate: toText(journey.ProgressRate),
    aimedArrivalTime: aimed ? formatDisplayTime(aimed) : UNAVAILABLE,
    estimatedArrivalTime: expected ? formatDisplayTime(expected) : UNAVAILABLE,
    presentableDistance: toText(distances.PresentableDistance) ?? UNAVAILABLE,
    distanceMeters: toNumber(distances.DistanceFromCall),
    passengerCount: toNumber(capacities.EstimatedPassengerCount),
    passengerCapacity: toNumber(capacities.EstimatedPassengerCapacity),
    stopName: toText(call.StopPointName),
  }

  return { record, expectedArrival: expected }
}
