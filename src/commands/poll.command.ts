import { Logger } from "@nestjs/common"
import { Command, CommandRunner, Option } from "nest-commander"
import type { SensorEntity } from "../modules/sensor/interfaces/sensor-entity.interface"
import { SensorService } from "../modules/sensor/sensor.service"

interface PollCommandOptions {
  sensors?: string[]
}

@Command({
  name: "poll",
  description: "Update the configured sensors once and print their state",
})
export class PollCommand extends CommandRunner {
  private readonly logger = new Logger(PollCommand.name)

  constructor(private readonly sensorService: SensorService) {
    super()
  }

  async run(_: string[], opts?: PollCommandOptions): Promise<void> {
    const entities: SensorEntity[] = []
    for (const entityId of opts?.sensors ?? []) {
      const entity = this.sensorService.getEntity(entityId)
      if (!entity) {
        this.logger.error(`No sensor found with ID: ${entityId}`)
        process.exitCode = 1
        return
      }
      entities.push(entity)
    }

    const targets = entities.length > 0 ? entities : this.sensorService.getEntities()
    const now = new Date()

    for (const entity of targets) {
      await this.sensorService.updateEntity(entity, now)
      console.log(
        JSON.stringify(this.sensorService.describe(entity, now), null, 2),
      )
    }
  }

  @Option({
    name: "sensors",
    flags: "-s, --sensor [entityIds...]",
    description: "Only poll the specified sensors",
  })
  parseSensors(entityId: string, acc: string[] = []): string[] {
    acc.push(entityId)
    return acc
  }
}
