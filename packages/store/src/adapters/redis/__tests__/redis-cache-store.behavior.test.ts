import { ManualClock } from "@rawcache/clock"
import type { Logger } from "@rawcache/logger"
import { mock } from "vitest-mock-extended"
import { StoreError } from "../../../core/store.errors"
import { bytes, keys, metadata, startOfTest } from "../../../tests/utils/cache-test-helpers"
import { connectionReset, FakeRedisTextClient } from "../../../tests/utils/fake-redis-client"
import { RedisCacheStore } from "../redis-cache-store"

describe("RedisCacheStore (behavior)", () => {
  let clock: ManualClock
  let client: FakeRedisTextClient
  let logger: Logger
  let store: RedisCacheStore

  beforeEach(() => {
    clock = new ManualClock(startOfTest)
    client = new FakeRedisTextClient(clock)
    logger = mock<Logger>()
    logger.child = () => logger
    store = new RedisCacheStore({ client, logger }, { keyspacePrefix: "gh:" })
  })

  describe("key layout", () => {
    it("keeps metadata under the prefix and content under prefix + content:", async () => {
      const ttl = { kind: "seconds", seconds: 300 } as const

      await store.setMetadata(keys.one(), metadata(), ttl)
      await store.setContent(keys.one(), bytes.text(), ttl)

      expect(client.rawKeys().sort()).toStrictEqual([
        "gh:acme:widgets@main:README.md",
        "gh:content:acme:widgets@main:README.md",
      ])
    })

    it("stores content base64 encoded", async () => {
      await store.setContent(keys.one(), bytes.text(), { kind: "seconds", seconds: 300 })

      expect(client.rawGet("gh:content:acme:widgets@main:README.md")).toBe("aGVsbG8gd29ybGQ=")
    })

    it("stores metadata as text that decodes back to a Date", async () => {
      await store.setMetadata(keys.one(), metadata(), { kind: "seconds", seconds: 300 })

      const raw = client.rawGet("gh:acme:widgets@main:README.md")
      expect(raw).toContain('"fingerprint":"abc123"')
      expect(raw).toContain('"cachedAt":"2026-01-01T00:00:00.000Z"')
    })
  })

  describe("reconnect", () => {
    it("reconnects once and retries a command that hit a dropped connection", async () => {
      await store.setContent(keys.one(), bytes.text(), { kind: "seconds", seconds: 300 })
      client.failNextCommands(connectionReset())

      const res = await store.getContent(keys.one())

      expect(res).toStrictEqual({ kind: "hit", value: bytes.text() })
      expect(client.calls.destroy).toBe(1)
      expect(client.calls.connect).toBe(1)
      expect(logger.warn).toHaveBeenCalledWith(
        "Redis connection lost, reconnecting",
        expect.objectContaining({ err: expect.any(Error) }),
      )
    })

    it("gives up after a single retry", async () => {
      client.failNextCommands(connectionReset(), connectionReset())

      const err = await store.getMetadata(keys.one()).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(StoreError)
      expect(err).toMatchObject({ code: "store_read_failed", context: { op: "getMetadata" } })
      expect(client.calls.connect).toBe(1)
      expect(client.calls.commands).toBe(2)
    })

    it("does not retry errors that are not connection failures", async () => {
      client.failNextCommands(new Error("WRONGTYPE Operation against a key"))

      await expect(
        store.setMetadata(keys.one(), metadata(), { kind: "seconds", seconds: 60 }),
      ).rejects.toMatchObject({ code: "store_write_failed" })

      expect(client.calls.commands).toBe(1)
      expect(client.calls.connect).toBe(0)
    })

    it("propagates a failed reconnect", async () => {
      client.failNextCommands(connectionReset())
      client.failNextConnects(new Error("connect ECONNREFUSED"))

      await expect(store.deleteContent(keys.one())).rejects.toMatchObject({
        code: "store_delete_failed",
      })
    })

    it("fails with a StoreError when the server cannot be reached", async () => {
      await client.close()
      client.failNextConnects(
        Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:6379"), { code: "ECONNREFUSED" }),
      )

      const err = await store.getMetadata(keys.one()).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(StoreError)
      expect(err).toMatchObject({ code: "store_read_failed", context: { op: "getMetadata" } })
      expect(client.calls.connect).toBe(1)
      expect(client.calls.commands).toBe(0)
    })

    it("coalesces concurrent reconnects into one attempt", async () => {
      await store.setContent(keys.one(), bytes.text(), { kind: "seconds", seconds: 300 })
      await store.setContent(keys.two(), bytes.other(), { kind: "seconds", seconds: 300 })

      client.failNextCommands(connectionReset(), connectionReset())
      const release = client.holdConnects()

      const first = store.getContent(keys.one())
      const second = store.getContent(keys.two())

      await new Promise((resolve) => setImmediate(resolve))
      release()

      expect(await first).toStrictEqual({ kind: "hit", value: bytes.text() })
      expect(await second).toStrictEqual({ kind: "hit", value: bytes.other() })
      expect(client.calls.connect).toBe(1)
    })

    it("connects lazily when the client is not open", async () => {
      await client.close()

      await store.setContent(keys.one(), bytes.text(), { kind: "seconds", seconds: 60 })

      expect(client.calls.connect).toBe(1)
      expect(client.isOpen).toBe(true)
    })
  })

  it("reports undecodable metadata as a read failure", async () => {
    await client.set("gh:acme:widgets@main:README.md", '{"json":{"size":"x"}}', { EX: 60 })

    await expect(store.getMetadata(keys.one())).rejects.toMatchObject({
      code: "store_read_failed",
    })
  })

  it("shutdown closes the client", async () => {
    await store.shutdown()

    expect(client.calls.close).toBe(1)
    expect(client.isOpen).toBe(false)
  })
})
