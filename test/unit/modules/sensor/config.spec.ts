import {
  DEFAULT_BASE_URL,
  parseSensorsConfig,
} from "src/modules/sensor/config"

describe("parseSensorsConfig", () => {
  it("applies defaults to a single-stop sensor", () => {
    const config = parseSensorsConfig({
      sensors: [
        {
          mode: "single",
          api_key: "test-key",
          operator_ref: "MTA",
          monitoring_ref: 308209,
          line_ref: "MTA NYCT_B63",
        },
      ],
    })

    expect(config).toEqual({
      scan_interval: 30_000,
      sensors: [
        {
          mode: "single",
          name: "MTA Bus Arrival",
          api_key: "test-key",
          operator_ref: "MTA",
          base_url: DEFAULT_BASE_URL,
          timeout: 10_000,
          monitoring_ref: "308209",
          line_ref: "MTA NYCT_B63",
        },
      ],
    })
  })

  it("reads a multi-stop sensor with its departures", () => {
    const config = parseSensorsConfig({
      scan_interval: "1m",
      sensors: [
        {
          mode: "multi",
          api_key: "test-key",
          operator_ref: "MTA",
          line_ref: "MTA NYCT_B63",
          timeout: "5s",
          departures: [
            { name: "Home", monitoring_ref: "400001" },
            { name: "Work", monitoring_ref: 400002, route: "MTA NYCT_B67" },
          ],
        },
      ],
    })

    expect(config.scan_interval).toBe(60_000)
    expect(config.sensors[0]).toEqual({
      mode: "multi",
      api_key: "test-key",
      operator_ref: "MTA",
      base_url: DEFAULT_BASE_URL,
      timeout: 5_000,
      line_ref: "MTA NYCT_B63",
      departures: [
        { name: "Home", monitoring_ref: "400001" },
        { name: "Work", monitoring_ref: "400002", route: "MTA NYCT_B67" },
      ],
    })
  })

  it("defaults to no departures", () => {
    const config = parseSensorsConfig({
      sensors: [
        {
          mode: "multi",
          api_key: "test-key",
          operator_ref: "MTA",
          line_ref: "MTA NYCT_B63",
        },
      ],
    })

    expect(config.sensors[0]).toMatchObject({ departures: [] })
  })

  it("requires the connection fields", () => {
    expect(() =>
      parseSensorsConfig({
        sensors: [
          {
            mode: "single",
            operator_ref: "MTA",
            monitoring_ref: "308209",
            line_ref: "MTA NYCT_B63",
          },
        ],
      }),
    ).toThrow("Invalid sensors configuration: sensors.0.api_key: Required")
  })

  it("rejects duplicate departure names", () => {
    expect(() =>
      parseSensorsConfig({
        sensors: [
          {
            mode: "multi",
            api_key: "test-key",
            operator_ref: "MTA",
            line_ref: "MTA NYCT_B63",
            departures: [
              { name: "Home", monitoring_ref: "400001" },
              { name: "Home", monitoring_ref: "400002" },
            ],
          },
        ],
      }),
    ).toThrow(
      'Invalid sensors configuration: sensors.0.departures.1.name: Duplicate departure name "Home"',
    )
  })

  it("rejects an invalid duration", () => {
    expect(() =>
      parseSensorsConfig({
        scan_interval: "soon",
        sensors: [
          {
            mode: "single",
            api_key: "test-key",
            operator_ref: "MTA",
            monitoring_ref: "308209",
            line_ref: "MTA NYCT_B63",
          },
        ],
      }),
    ).toThrow('scan_interval: Invalid duration "soon"')
  })

  it("rejects unknown keys and modes", () => {
    expect(() =>
      parseSensorsConfig({
        sensors: [
          {
            mode: "single",
            api_key: "test-key",
            operator_ref: "MTA",
            monitoring_ref: "308209",
            line_ref: "MTA NYCT_B63",
            stop: "308209",
          },
        ],
      }),
    ).toThrow(/sensors\.0: Unrecognized key/)

    expect(() =>
      parseSensorsConfig({
        sensors: [{ mode: "both", api_key: "test-key", operator_ref: "MTA" }],
      }),
    ).toThrow(/sensors\.0\.mode: Invalid discriminator value/)
  })

  it("requires at least one sensor", () => {
    expect(() => parseSensorsConfig({ sensors: [] })).toThrow(/^Invalid sensors configuration: sensors: /)
    expect(() => parseSensorsConfig(undefined)).toThrow(
      /^Invalid sensors configuration: <root>: /,
    )
  })
})
