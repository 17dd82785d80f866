import type { ArrivalRecord } from "../../bustime/interfaces/arrival.interface"
import type { ArrivalAttributes } from "../interfaces/sensor-entity.interface"

export const STATE_NO_ARRIVALS = "No arrivals"
export const STATE_NO_DATA = "No data"
export const STATE_ERROR = "Error"

export function toArrivalAttributes(record: ArrivalRecord): ArrivalAttributes {
  return {
    Route: record.route,
    Destination: record.destination,
    "Current Vehicle Location": record.vehicleLocation && {
      Latitude: record.vehicleLocation.latitude,
      Longitude: record.vehicleLocation.longitude,
    },
    "Progress Rate": record.progressRate,
    "Aimed Arrival Time": record.aimedArrivalTime,
    "Estimated Arrival Time": record.estimatedArrivalTime,
    Distance: record.presentableDistance,
    "Distance (m)": record.distanceMeters,
    "Passenger Count": record.passengerCount,
    "Passenger Capacity": record.passengerCapacity,
    "Stop Name": record.stopName,
  }
}

export function toEntityId(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")

  return `sensor.${slug || "unnamed"}`
}
