// Only the parts of the SIRI stop-monitoring response that are read.
// BusTime emits some text fields as a single string and others as an array
// of strings depending on the API version, so both are allowed.

export type SiriText = string | string[]

export interface SiriVehicleLocation {
  Latitude?: number
  Longitude?: number
}

export interface SiriDistances {
  PresentableDistance?: string
  DistanceFromCall?: number
}

export interface SiriCapacities {
  EstimatedPassengerCount?: number
  EstimatedPassengerCapacity?: number
}

export interface SiriCallExtensions {
  Distances?: SiriDistances
  Capacities?: SiriCapacities
}

export interface SiriMonitoredCall {
  AimedArrivalTime?: string
  ExpectedArrivalTime?: string
  StopPointName?: SiriText
  Extensions?: SiriCallExtensions
}

export interface SiriMonitoredVehicleJourney {
  PublishedLineName?: SiriText
  DestinationName?: SiriText
  VehicleLocation?: SiriVehicleLocation
  ProgressRate?: string
  MonitoredCall?: SiriMonitoredCall
}

export interface SiriMonitoredStopVisit {
  MonitoredVehicleJourney?: SiriMonitoredVehicleJourney
}

export interface SiriStopMonitoringDelivery {
  MonitoredStopVisit?: SiriMonitoredStopVisit[]
}

export interface SiriStopMonitoringResponse {
  Siri?: {
    ServiceDelivery?: {
      StopMonitoringDelivery?: SiriStopMonitoringDelivery[]
    }
  }
}
