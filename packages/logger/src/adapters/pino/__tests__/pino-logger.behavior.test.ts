import { describeLoggerContract } from "../../../ports/__tests__/logger.contract"
import { PinoLogger } from "../pino-logger"
import { captureLines, pinoHarness } from "./pino-harness"

describeLoggerContract(pinoHarness())

describe("PinoLogger behavior", () => {
  it("emits JSON with time and numeric level", () => {
    const { lines, destination } = captureLines()

    const logger = new PinoLogger({ destination }, { level: "info" }, { service: "proxy" })

    logger.info("hello", { key: "acme:widgets@main:a.txt" })

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      msg: "hello",
      service: "proxy",
      key: "acme:widgets@main:a.txt",
      level: 30,
    })
    expect(typeof lines[0]?.time).toBe("number")
  })

  it("serializes err with its cause", () => {
    const { lines, destination } = captureLines()

    const logger = new PinoLogger({ destination }, { level: "info" })
    const err = new Error("store write failed", { cause: new Error("READONLY") })

    logger.error("write failed", { err })

    const logged = lines[0]?.err

    expect(logged).toMatchObject({
      type: "Error",
      message: "store write failed",
      cause: { type: "Error", message: "READONLY" },
    })
  })
})
