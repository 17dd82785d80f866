import { Module } from "@nestjs/common"
import { BusTimeModule } from "../bustime/bustime.module"
import { SensorStateListener } from "./sensor-state.listener"
import { SensorService } from "./sensor.service"
import { SensorsController } from "./sensors.controller"

@Module({
  imports: [BusTimeModule],
  controllers: [SensorsController],
  providers: [SensorService, SensorStateListener],
  exports: [SensorService],
})
export class SensorModule {}
