import {
  Injectable,
  Logger,
  NotFoundException,
  OnModuleDestroy,
  OnModuleInit,
} from "@nestjs/common"
import { EventEmitter2 } from "@nestjs/event-emitter"
import { SchedulerRegistry } from "@nestjs/schedule"
import * as Sentry from "@sentry/node"
import fs from "fs/promises"
import * as yaml from "js-yaml"
import ms from "ms"
import { BusTimeClientFactory } from "../bustime/bustime-client.factory"
import type { MonitoredTarget } from "../bustime/interfaces/arrival.interface"
import { StopCache } from "../bustime/stop-cache"
import {
  parseSensorsConfig,
  type DepartureConfig,
  type MultiSensorConfig,
  type SensorConfig,
  type SensorsConfig,
  type SingleSensorConfig,
} from "./config"
import { MultiStopSensor } from "./entities/multi-stop.sensor"
import { SingleStopSensor } from "./entities/single-stop.sensor"
import type {
  SensorEntity,
  SensorSnapshot,
  SensorStateChangedEvent,
} from "./interfaces/sensor-entity.interface"

export const SCAN_INTERVAL_NAME = "sensor-scan"
export const SENSOR_STATE_CHANGED = "sensor.state_changed"

@Injectable()
export class SensorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SensorService.name)

  private readonly entities = new Map<string, SensorEntity>()
  private scanIntervalMs = ms("30s")
  private pendingUpdate: Promise<void> | null = null

  constructor(
    private readonly clientFactory: BusTimeClientFactory,
    private readonly eventEmitter: EventEmitter2,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  private async loadConfig(): Promise<SensorsConfig> {
    if (process.env.SENSORS_CONFIG) {
      this.logger.verbose(
        "Loading sensors from SENSORS_CONFIG environment variable",
      )

      return parseSensorsConfig(yaml.load(process.env.SENSORS_CONFIG))
    }

    const configPath = process.env.SENSORS_CONFIG_PATH ?? "sensors.yaml"
    this.logger.verbose(`Loading sensors from ${configPath}`)

    const configFile = await fs.readFile(configPath, "utf-8")
    return parseSensorsConfig(yaml.load(configFile))
  }

  async onModuleInit() {
    const config = await this.loadConfig()
    this.scanIntervalMs = config.scan_interval

    for (const sensorConfig of config.sensors) {
      for (const entity of this.createEntities(sensorConfig)) {
        if (this.entities.has(entity.entityId)) {
          throw new Error(
            `Duplicate entity id "${entity.entityId}" for sensor "${entity.name}"`,
          )
        }

        this.entities.set(entity.entityId, entity)
      }
    }

    this.logger.log(`Loaded ${this.entities.size} sensors`)
  }

  onModuleDestroy() {
    if (this.schedulerRegistry.doesExist("interval", SCAN_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(SCAN_INTERVAL_NAME)
    }
  }

  private createEntities(config: SensorConfig): SensorEntity[] {
    switch (config.mode) {
      case "single":
        return [this.createSingleStopSensor(config)]
      case "multi":
        return this.createMultiStopSensors(config)
    }
  }

  private createClient(config: SensorConfig) {
    return this.clientFactory.create({
      apiKey: config.api_key,
      operatorRef: config.operator_ref,
      baseUrl: config.base_url,
      timeoutMs: config.timeout,
    })
  }

  private createSingleStopSensor(config: SingleSensorConfig): SensorEntity {
    return new SingleStopSensor(this.createClient(config), {
      name: config.name,
      monitoringRef: config.monitoring_ref,
      routeOverride: config.line_ref,
    })
  }

  private createMultiStopSensors(config: MultiSensorConfig): SensorEntity[] {
    // Only a departure's own route filters the query; line_ref does not
    const targets = config.departures.map(
      (departure: DepartureConfig): MonitoredTarget => ({
        name: departure.name,
        monitoringRef: departure.monitoring_ref,
        routeOverride: departure.route,
      }),
    )

    const cache = new StopCache(this.createClient(config), targets)
    return targets.map((target) => new MultiStopSensor(cache, target))
  }

  /**
   * Updates every sensor once, then keeps updating them on the configured
   * scan interval until the module is destroyed.
   */
  async startPolling(): Promise<void> {
    await this.updateAll()

    const interval = setInterval(
      () => this.runScheduledUpdate(),
      this.scanIntervalMs,
    )
    this.schedulerRegistry.addInterval(SCAN_INTERVAL_NAME, interval)

    this.logger.log(
      `Updating ${this.entities.size} sensors every ${ms(this.scanIntervalMs, { long: true })}`,
    )
  }

  private runScheduledUpdate() {
    if (this.pendingUpdate) {
      this.logger.warn("Previous sensor update still running; skipping tick")
      return
    }

    this.updateAll().catch((e: unknown) => {
      this.logger.error(`Scheduled sensor update failed: ${String(e)}`)
    })
  }

  async updateAll(now: Date = new Date()): Promise<void> {
    if (this.pendingUpdate) {
      return this.pendingUpdate
    }

    const run = async () => {
      for (const entity of this.entities.values()) {
        await this.updateEntity(entity, now)
      }
    }

    this.pendingUpdate = run()
    try {
      await this.pendingUpdate
    } finally {
      this.pendingUpdate = null
    }
  }

  async updateEntity(
    entity: SensorEntity,
    now: Date = new Date(),
  ): Promise<void> {
    const oldState = entity.state

    try {
      await entity.update(now)
    } catch (e: unknown) {
      this.logger.error(
        `Error updating ${entity.entityId}: ${e instanceof Error ? e.message : String(e)}`,
        e instanceof Error ? e.stack : undefined,
      )

      Sentry.captureException(e, {
        tags: {
          module: "sensor",
          entity_id: entity.entityId,
        },
      })
      return
    }

    if (entity.state !== oldState) {
      const event: SensorStateChangedEvent = {
        entityId: entity.entityId,
        oldState,
        newState: entity.state,
      }
      this.eventEmitter.emit(SENSOR_STATE_CHANGED, event)
    }
  }

  getEntities(): SensorEntity[] {
    return Array.from(this.entities.values())
  }

  getEntity(entityId: string): SensorEntity | undefined {
    return this.entities.get(entityId)
  }

  getEntityOrThrow(entityId: string): SensorEntity {
    const entity = this.getEntity(entityId)
    if (!entity) {
      throw new NotFoundException(`Unknown sensor "${entityId}"`)
    }

    return entity
  }

  describe(entity: SensorEntity, now: Date = new Date()): SensorSnapshot {
    return {
      entityId: entity.entityId,
      name: entity.name,
      icon: entity.icon,
      state: entity.state,
      attributes: entity.getExtraStateAttributes(now),
      lastUpdated: entity.lastUpdated?.toISOString() ?? null,
    }
  }
}
