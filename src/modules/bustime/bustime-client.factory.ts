import { Injectable, Logger, Optional } from "@nestjs/common"
import type { Counter } from "@opentelemetry/api"
import axios from "axios"
import { MetricService } from "nestjs-otel"
import { BusTimeClient, type BusTimeClientOptions } from "./bustime-client"

@Injectable()
export class BusTimeClientFactory {
  private readonly requestsMetric?: Counter

  constructor(@Optional() metricService?: MetricService) {
    this.requestsMetric = metricService?.getCounter("bustime_requests", {
      description: "Number of BusTime stop-monitoring requests by outcome",
      unit: "requests",
    })
  }

  create(options: BusTimeClientOptions): BusTimeClient {
    return new BusTimeClient(
      options,
      axios.create(),
      new Logger(`${BusTimeClient.name}[${options.operatorRef}]`),
      this.requestsMetric,
    )
  }
}
