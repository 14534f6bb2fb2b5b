import { SystemClock } from "../system-clock"

describe("SystemClock", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it("reads the process clock", () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2025-06-01T12:00:00.000Z"))

    const clock = new SystemClock()

    expect(clock.nowMs()).toBe(Date.parse("2025-06-01T12:00:00.000Z"))
    expect(clock.now()).toEqual(new Date("2025-06-01T12:00:00.000Z"))
  })
})
