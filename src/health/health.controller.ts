import { Controller, Get } from "@nestjs/common"
import { SensorService } from "../modules/sensor/sensor.service"

@Controller("healthz")
export class HealthController {
  constructor(private readonly sensorService: SensorService) {}

  @Get()
  async healthCheck() {
    return {
      ok: true,
      sensors: this.sensorService.getEntities().length,
      timestamp: new Date().toISOString(),
    }
  }
}
