import { Injectable, Logger } from "@nestjs/common"
import { OnEvent } from "@nestjs/event-emitter"
import type { SensorStateChangedEvent } from "./interfaces/sensor-entity.interface"
import { SENSOR_STATE_CHANGED } from "./sensor.service"

@Injectable()
export class SensorStateListener {
  private readonly logger = new Logger(SensorStateListener.name)

  @OnEvent(SENSOR_STATE_CHANGED)
  handleStateChanged({ entityId, oldState, newState }: SensorStateChangedEvent) {
    this.logger.log(
      `${entityId}: ${oldState ?? "unknown"} -> ${newState ?? "unknown"}`,
    )
  }
}
