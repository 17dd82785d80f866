import { Logger } from "@nestjs/common"
import type {
  Arrival,
  ArrivalFetcher,
  FetchResult,
  LogSink,
  MonitoredTarget,
} from "../../bustime/interfaces/arrival.interface"
import { computeEta } from "../../bustime/time/eta"
import type {
  SensorEntity,
  SingleStopAttributes,
} from "../interfaces/sensor-entity.interface"
import {
  STATE_ERROR,
  STATE_NO_ARRIVALS,
  STATE_NO_DATA,
  toArrivalAttributes,
  toEntityId,
} from "./arrival-attributes"

/**
 * A sensor for one stop that queries the feed itself on every update.
 */
export class SingleStopSensor implements SensorEntity {
  readonly entityId: string
  readonly icon = null

  private currentState: string | null = null
  private arrivals: Arrival[] = []
  private updatedAt: Date | null = null

  constructor(
    private readonly fetcher: ArrivalFetcher,
    private readonly target: MonitoredTarget,
    private readonly logger: LogSink = new Logger(SingleStopSensor.name),
  ) {
    this.entityId = toEntityId(target.name)
  }

  get name(): string {
    return this.target.name
  }

  get state(): string | null {
    return this.currentState
  }

  get lastUpdated(): Date | null {
    return this.updatedAt
  }

  async update(now: Date = new Date()): Promise<void> {
    let result: FetchResult
    try {
      result = await this.fetcher.fetch(this.target)
    } catch (e: unknown) {
      this.logger.error(
        `Error fetching MTA bus data for ${this.target.name}: ${e instanceof Error ? e.message : String(e)}`,
      )
      result = { kind: "failed", reason: String(e) }
    }

    this.applyResult(result)
    this.updatedAt = now
  }

  getExtraStateAttributes(now: Date = new Date()): SingleStopAttributes {
    const attributes: SingleStopAttributes = {
      Arrivals: this.arrivals.map((arrival) => toArrivalAttributes(arrival.record)),
    }

    const [next] = this.arrivals
    if (next) {
      attributes["ETA in minutes"] = computeEta(
        next.expectedArrival?.instant ?? null,
        now,
      )
    }

    return attributes
  }

  private applyResult(result: FetchResult) {
    switch (result.kind) {
      case "failed":
        // The last known arrivals stay visible next to the error state
        this.currentState = STATE_ERROR
        return
      case "no-data":
        this.currentState = STATE_NO_DATA
        this.arrivals = []
        return
      case "no-arrivals":
        this.currentState = STATE_NO_ARRIVALS
        this.arrivals = []
        return
      case "arrivals":
        this.arrivals = result.arrivals
        this.currentState =
          result.arrivals[0]?.record.estimatedArrivalTime ?? STATE_NO_ARRIVALS
        return
    }
  }
}
