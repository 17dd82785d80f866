export interface ArrivalAttributes {
  Route: string | null
  Destination: string | null
  "Current Vehicle Location": { Latitude: number; Longitude: number } | null
  "Progress Rate": string | null
  "Aimed Arrival Time": string
  "Estimated Arrival Time": string
  Distance: string
  "Distance (m)": number | null
  "Passenger Count": number | null
  "Passenger Capacity": number | null
  "Stop Name": string | null
}

export interface SingleStopAttributes {
  Arrivals: ArrivalAttributes[]
  /** Only present while there is at least one arrival. */
  "ETA in minutes"?: string
}

export interface MultiStopAttributes {
  Arrivals: ArrivalAttributes[]
  "Monitoring Ref": string
  "ETA in minutes": string
  Arrives: string
}

export type SensorAttributes = SingleStopAttributes | MultiStopAttributes

/**
 * What the host reads from and drives on each sensor. The host calls
 * `update()` on its own schedule and reads `state` and the attributes
 * whenever it presents the sensor.
 */
export interface SensorEntity {
  readonly entityId: string
  readonly name: string
  readonly icon: string | null
  readonly state: string | null
  readonly lastUpdated: Date | null

  /** Derived on every call; countdowns depend on `now`. */
  getExtraStateAttributes(now?: Date): SensorAttributes

  update(now?: Date): Promise<void>
}

export interface SensorStateChangedEvent {
  entityId: string
  oldState: string | null
  newState: string | null
}

export interface SensorSnapshot {
  entityId: string
  name: string
  icon: string | null
  state: string | null
  attributes: SensorAttributes
  lastUpdated: string | null
}
