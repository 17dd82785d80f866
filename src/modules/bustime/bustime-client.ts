import type { Counter } from "@opentelemetry/api"
import type { AxiosInstance } from "axios"
import { normalizeVisit } from "./arrival-normalizer"
import type {
  ArrivalFetcher,
  FetchResult,
  LogSink,
  MonitoredTarget,
} from "./interfaces/arrival.interface"
import type { SiriStopMonitoringResponse } from "./interfaces/siri.interface"

export const STOP_MONITORING_PATH = "/api/siri/stop-monitoring.json"

export interface BusTimeClientOptions {
  apiKey: string
  operatorRef: string
  baseUrl: string
  timeoutMs: number
}

export class BusTimeClient implements ArrivalFetcher {
  constructor(
    private readonly options: BusTimeClientOptions,
    private readonly http: AxiosInstance,
    private readonly logger: LogSink,
    private readonly requestsMetric?: Counter,
  ) {}

  async fetch(target: MonitoredTarget): Promise<FetchResult> {
    const result = await this.fetchStopMonitoring(target)

    this.requestsMetric?.add(1, {
      operator_ref: this.options.operatorRef,
      outcome: result.kind,
    })

    return result
  }

  private buildParams(target: MonitoredTarget): Record<string, string> {
    const params: Record<string, string> = {
      key: this.options.apiKey,
      OperatorRef: this.options.operatorRef,
      MonitoringRef: target.monitoringRef,
    }

    if (target.routeOverride) {
      params.LineRef = target.routeOverride
    }

    return params
  }

  private async fetchStopMonitoring(
    target: MonitoredTarget,
  ): Promise<FetchResult> {
    let body: SiriStopMonitoringResponse
    try {
      const response = await this.http.get<SiriStopMonitoringResponse>(
        STOP_MONITORING_PATH,
        {
          baseURL: this.options.baseUrl,
          params: this.buildParams(target),
          timeout: this.options.timeoutMs,
          responseType: "json",
          validateStatus: () => true,
        },
      )

      if (response.status !== 200) {
        this.logger.error(
          `HTTP error ${response.status} fetching data for ${target.name}`,
        )
        return { kind: "failed", reason: `HTTP ${response.status}` }
      }

      body = response.data
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e)
      this.logger.error(`Error fetching data for ${target.name}: ${message}`)
      return { kind: "failed", reason: message }
    }

    // axios hands back the raw text when the body is not valid JSON
    if (typeof body !== "object" || body === null || Array.isArray(body)) {
      this.logger.error(`Malformed response body for ${target.name}`)
      return { kind: "failed", reason: "Malformed response body" }
    }

    const deliveries = body.Siri?.ServiceDelivery?.StopMonitoringDelivery
    if (!Array.isArray(deliveries) || deliveries.length === 0) {
      return { kind: "no-data" }
    }

    // Later deliveries, if the provider ever sends more than one, are ignored
    const visits = deliveries[0]?.MonitoredStopVisit
    if (!Array.isArray(visits) || visits.length === 0) {
      return { kind: "no-arrivals" }
    }

    return {
      kind: "arrivals",
      arrivals: visits.map((visit) =>
        normalizeVisit(visit, { logger: this.logger, targetName: target.name }),
      ),
    }
  }
}
