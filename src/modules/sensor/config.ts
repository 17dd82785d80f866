import ms from "ms"
import { z } from "zod"

export const DEFAULT_BASE_URL = "https://bustime.mta.info"
export const DEFAULT_SENSOR_NAME = "MTA Bus Arrival"

const DurationSchema = z.string().transform((value, ctx) => {
  const parsed = ms(value)
  if (typeof parsed !== "number" || !Number.isFinite(parsed) || parsed <= 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid duration "${value}"`,
    })
    return z.NEVER
  }

  return parsed
})

// Stop codes look numeric, and YAML reads an unquoted 308209 as a number
const RefSchema = z
  .union([z.string().min(1), z.number()])
  .transform((value) => String(value))

const ConnectionFields = {
  api_key: z.string().min(1),
  operator_ref: z.string().min(1),
  base_url: z.string().url().default(DEFAULT_BASE_URL),
  timeout: DurationSchema.default("10s"),
}

export const SingleSensorConfigSchema = z.strictObject({
  mode: z.literal("single"),
  name: z.string().min(1).default(DEFAULT_SENSOR_NAME),
  ...ConnectionFields,
  monitoring_ref: RefSchema,
  line_ref: z.string().min(1),
})

export const DepartureConfigSchema = z.strictObject({
  name: z.string().min(1),
  monitoring_ref: RefSchema,
  route: z.string().min(1).optional(),
})

export const MultiSensorConfigSchema = z.strictObject({
  mode: z.literal("multi"),
  ...ConnectionFields,
  line_ref: z.string().min(1),
  departures: z.array(DepartureConfigSchema).default([]),
})

export const SensorConfigSchema = z.discriminatedUnion("mode", [
  SingleSensorConfigSchema,
  MultiSensorConfigSchema,
])

export const SensorsConfigSchema = z
  .strictObject({
    scan_interval: DurationSchema.default("30s"),
    sensors: z.array(SensorConfigSchema).min(1),
  })
  .superRefine((config, ctx) => {
    config.sensors.forEach((sensor, sensorIndex) => {
      if (sensor.mode !== "multi") {
        return
      }

      const seen = new Set<string>()
      sensor.departures.forEach((departure, departureIndex) => {
        if (seen.has(departure.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate departure name "${departure.name}"`,
            path: ["sensors", sensorIndex, "departures", departureIndex, "name"],
          })
        }
        seen.add(departure.name)
      })
    })
  })

export type SingleSensorConfig = z.infer<typeof SingleSensorConfigSchema>
export type DepartureConfig = z.infer<typeof DepartureConfigSchema>
export type MultiSensorConfig = z.infer<typeof MultiSensorConfigSchema>
export type SensorConfig = z.infer<typeof SensorConfigSchema>
export type SensorsConfig = z.infer<typeof SensorsConfigSchema>

export function parseSensorsConfig(raw: unknown): SensorsConfig {
  const result = SensorsConfigSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ")
    throw new Error(`Invalid sensors configuration: ${issues}`)
  }

  return result.data
}
