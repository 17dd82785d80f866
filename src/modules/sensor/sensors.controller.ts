import { Controller, Get, HttpCode, Param, Post } from "@nestjs/common"
import {
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiParam,
  ApiProperty,
} from "@nestjs/swagger"
import type { SensorAttributes } from "./interfaces/sensor-entity.interface"
import { SensorService } from "./sensor.service"

export class SensorDto {
  @ApiProperty({
    required: true,
    description: "The host-facing ID of the sensor",
    example: "sensor.mta_arrival_home",
  })
  entityId!: string

  @ApiProperty({
    required: true,
    description: "The display name of the sensor",
    example: "MTA Arrival - Home",
  })
  name!: string

  @ApiProperty({
    required: true,
    nullable: true,
    type: String,
    description: "Icon hint for the sensor",
    example: "mdi:bus",
  })
  icon!: string | null

  @ApiProperty({
    required: true,
    nullable: true,
    type: String,
    description:
      "Estimated arrival time of the next bus, or a status such as \"No arrivals\"",
    example: "June 01, 2024 at 02:05 PM",
  })
  state!: string | null

  @ApiProperty({
    selfRequired: true,
    type: "object",
    additionalProperties: true,
    description:
      "All upcoming arrivals and the countdown to the next one, keyed by display label",
    example: {
      Arrivals: [],
      "Monitoring Ref": "308209",
      "ETA in minutes": "in 5 minutes",
      Arrives: "in 5 minutes",
    },
  })
  attributes!: SensorAttributes

  @ApiProperty({
    required: true,
    nullable: true,
    type: String,
    description: "When the sensor last updated, as an ISO-8601 timestamp",
    example: "2024-06-01T18:00:00.000Z",
  })
  lastUpdated!: string | null
}

@Controller("sensors")
export class SensorsController {
  constructor(private readonly sensorService: SensorService) {}

  @Get()
  @ApiOkResponse({
    description: "All configured sensors",
    type: [SensorDto],
  })
  getSensors(): SensorDto[] {
    const now = new Date()
    return this.sensorService
      .getEntities()
      .map((entity) => this.sensorService.describe(entity, now))
  }

  @Get(":entityId")
  @ApiOkResponse({ description: "A single sensor", type: SensorDto })
  @ApiNotFoundResponse()
  @ApiParam({
    name: "entityId",
    description: "The ID of the sensor",
    example: "sensor.mta_bus_arrival",
  })
  getSensor(@Param("entityId") entityId: string): SensorDto {
    const entity = this.sensorService.getEntityOrThrow(entityId)
    return this.sensorService.describe(entity)
  }

  @Post(":entityId/update")
  @HttpCode(200)
  @ApiOkResponse({
    description: "The sensor after a forced update",
    type: SensorDto,
  })
  @ApiNotFoundResponse()
  async updateSensor(@Param("entityId") entityId: string): Promise<SensorDto> {
    const entity = this.sensorService.getEntityOrThrow(entityId)
    const now = new Date()

    await this.sensorService.updateEntity(entity, now)
    return this.sensorService.describe(entity, now)
  }
}
