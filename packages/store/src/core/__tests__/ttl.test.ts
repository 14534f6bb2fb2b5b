import { assertValidTtl, ttlToExpiresAtMs } from "../ttl"

describe("ttlToExpiresAtMs", () => {
  const now = Date.UTC(2026, 0, 1)

  it("adds seconds", () => {
    expect(ttlToExpiresAtMs({ kind: "seconds", seconds: 300 }, now)).toBe(now + 300_000)
  })

  it("adds milliseconds", () => {
    expect(ttlToExpiresAtMs({ kind: "milliseconds", milliseconds: 250 }, now)).toBe(now + 250)
  })

  it("uses the absolute instant as is", () => {
    const expiresAt = new Date(now + 42)
    expect(ttlToExpiresAtMs({ kind: "until", expiresAt }, now)).toBe(now + 42)
  })
})

describe("assertValidTtl", () => {
  it("accepts positive durations", () => {
    expect(() => assertValidTtl({ kind: "seconds", seconds: 1 })).not.toThrow()
  })

  it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])("rejects %s seconds", (seconds) => {
    expect(() => assertValidTtl({ kind: "seconds", seconds })).toThrow(RangeError)
  })

  it("rejects an invalid date", () => {
    expect(() => assertValidTtl({ kind: "until", expiresAt: new Date("nope") })).toThrow(
      RangeError,
    )
  })
})
