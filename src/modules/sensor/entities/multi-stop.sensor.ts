import { Logger } from "@nestjs/common"
import {
  UNAVAILABLE,
  type LogSink,
  type MonitoredTarget,
} from "../../bustime/interfaces/arrival.interface"
import type { StopCache } from "../../bustime/stop-cache"
import { computeEta, ETA_NOT_AVAILABLE } from "../../bustime/time/eta"
import { parseDisplayTime } from "../../bustime/time/time-parser"
import type {
  MultiStopAttributes,
  SensorEntity,
} from "../interfaces/sensor-entity.interface"
import {
  STATE_NO_ARRIVALS,
  toArrivalAttributes,
  toEntityId,
} from "./arrival-attributes"

/**
 * A sensor for one departure of a group that shares a {@link StopCache}.
 * Every sensor of the group refreshes the cache; only the first refresh in
 * each interval reaches the feed.
 */
export class MultiStopSensor implements SensorEntity {
  readonly entityId: string
  readonly name: string
  readonly icon = "mdi:bus"

  private currentState: string | null = null
  private updatedAt: Date | null = null

  constructor(
    private readonly cache: StopCache,
    private readonly target: MonitoredTarget,
    private readonly logger: LogSink = new Logger(MultiStopSensor.name),
  ) {
    this.name = `MTA Arrival - ${target.name}`
    this.entityId = toEntityId(this.name)
  }

  get state(): string | null {
    return this.currentState
  }

  get lastUpdated(): Date | null {
    return this.updatedAt
  }

  async update(now: Date = new Date()): Promise<void> {
    await this.cache.refresh(now)

    const [next] = this.cache.arrivalsFor(this.target.name)
    this.currentState =
      next && next.record.estimatedArrivalTime !== UNAVAILABLE
        ? next.record.estimatedArrivalTime
        : STATE_NO_ARRIVALS
    this.updatedAt = now
  }

  getExtraStateAttributes(now: Date = new Date()): MultiStopAttributes {
    const arrivals = this.cache.arrivalsFor(this.target.name)
    const eta = this.computeNextEta(now)

    return {
      Arrivals: arrivals.map((arrival) => toArrivalAttributes(arrival.record)),
      "Monitoring Ref": this.target.monitoringRef,
      "ETA in minutes": eta,
      Arrives: eta,
    }
  }

  private computeNextEta(now: Date): string {
    const [next] = this.cache.arrivalsFor(this.target.name)
    if (
      !next?.expectedArrival ||
      next.record.estimatedArrivalTime === UNAVAILABLE
    ) {
      return ETA_NOT_AVAILABLE
    }

    // Counted from the displayed minute, so the countdown agrees with the state
    const displayed = parseDisplayTime(
      next.record.estimatedArrivalTime,
      next.expectedArrival.offsetMinutes,
    )
    if (!displayed) {
      this.logger.error(
        `Error computing ETA for ${this.target.name}: cannot read "${next.record.estimatedArrivalTime}"`,
      )
      return ETA_NOT_AVAILABLE
    }

    return computeEta(displayed.instant, now)
  }
}
