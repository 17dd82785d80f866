import { Module } from "@nestjs/common"
import { EventEmitterModule } from "@nestjs/event-emitter"
import { ScheduleModule } from "@nestjs/schedule"
import { OpenTelemetryModule } from "nestjs-otel"
import { PollCommand } from "./commands/poll.command"
import { HealthController } from "./health/health.controller"
import { SensorModule } from "./modules/sensor/sensor.module"

@Module({
  imports: [
    EventEmitterModule.forRoot({
      global: true,
    }),
    ScheduleModule.forRoot(),
    OpenTelemetryModule.forRoot({
      metrics: {
        hostMetrics: false,
        apiMetrics: {
          enable: true,
        },
      },
    }),
    SensorModule,
  ],
  controllers: [HealthController],
  providers: [PollCommand],
})
export class AppModule {}
