import { computeEta } from "src/modules/bustime/time/eta"

describe("computeEta", () => {
  const now = new Date("2024-06-01T14:00:00-04:00")

  it("counts whole minutes until the expected arrival", () => {
    expect(computeEta(new Date("2024-06-01T14:05:00-04:00"), now)).toBe(
      "in 5 minutes",
    )
  })

  it("rounds down", () => {
    expect(computeEta(new Date(now.getTime() + 89_000), now)).toBe(
      "in 1 minutes",
    )
    expect(computeEta(new Date(now.getTime() + 59_000), now)).toBe(
      "in 0 minutes",
    )
  })

  it("reports an arrival at the current instant as due", () => {
    expect(computeEta(now, now)).toBe("in 0 minutes")
  })

  it("reports a past arrival as departed", () => {
    expect(computeEta(new Date(now.getTime() - 1_000), now)).toBe("Departed")
    expect(computeEta(new Date(now.getTime() - 30_000), now)).toBe("Departed")
  })

  it("reports N/A without an expected arrival", () => {
    expect(computeEta(null, now)).toBe("N/A")
  })
})
