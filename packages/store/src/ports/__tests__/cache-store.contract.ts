import type { ManualClock } from "@rawcache/clock"
import { bytes, keys, metadata } from "../../tests/utils/cache-test-helpers"
import type { CacheStore } from "../cache-store"

export type CacheStoreHarness = {
  name: string
  make: () => { store: CacheStore; clock: ManualClock }
}

export function describeCacheStoreContract(h: CacheStoreHarness) {
  describe(`${h.name} (CacheStore contract)`, () => {
    let store: CacheStore
    let clock: ManualClock

    beforeEach(() => {
      ;({ store, clock } = h.make())
    })

    afterEach(async () => {
      await store.shutdown()
    })

    describe("get/set", () => {
      it("misses for absent metadata and content", async () => {
        expect(await store.getMetadata(keys.one())).toStrictEqual({ kind: "miss" })
        expect(await store.getContent(keys.one())).toStrictEqual({ kind: "miss" })
      })

      it("returns metadata as written, cachedAt included", async () => {
        const value = metadata()

        await store.setMetadata(keys.one(), value, { kind: "seconds", seconds: 300 })

        expect(await store.getMetadata(keys.one())).toStrictEqual({ kind: "hit", value })
      })

      it("returns content byte for byte", async () => {
        await store.setContent(keys.one(), bytes.binary(), { kind: "seconds", seconds: 300 })

        expect(await store.getContent(keys.one())).toStrictEqual({
          kind: "hit",
          value: bytes.binary(),
        })
      })

      it("stores empty content as a hit", async () => {
        await store.setContent(keys.one(), bytes.empty(), { kind: "seconds", seconds: 300 })

        expect(await store.getContent(keys.one())).toStrictEqual({
          kind: "hit",
          value: bytes.empty(),
        })
      })

      it("overwrites previous values", async () => {
        const ttl = { kind: "seconds", seconds: 300 } as const

        await store.setMetadata(keys.one(), metadata({ fingerprint: "old" }), ttl)
        await store.setMetadata(keys.one(), metadata({ fingerprint: "new" }), ttl)
        await store.setContent(keys.one(), bytes.text(), ttl)
        await store.setContent(keys.one(), bytes.other(), ttl)

        expect(await store.getMetadata(keys.one())).toStrictEqual({
          kind: "hit",
          value: metadata({ fingerprint: "new" }),
        })
        expect(await store.getContent(keys.one())).toStrictEqual({
          kind: "hit",
          value: bytes.other(),
        })
      })

      it("keeps metadata and content independent", async () => {
        await store.setMetadata(keys.one(), metadata(), { kind: "seconds", seconds: 300 })

        expect(await store.getContent(keys.one())).toStrictEqual({ kind: "miss" })

        await store.setContent(keys.two(), bytes.text(), { kind: "seconds", seconds: 300 })

        expect(await store.getMetadata(keys.two())).toStrictEqual({ kind: "miss" })
      })

      it("does not alias the caller's buffer", async () => {
        const value = bytes.text()

        await store.setContent(keys.one(), value, { kind: "seconds", seconds: 300 })
        value[0] = 0

        const res = await store.getContent(keys.one())
        expect(res).toStrictEqual({ kind: "hit", value: bytes.text() })
      })

      it("rejects a non-positive TTL", async () => {
        await expect(
          store.setContent(keys.one(), bytes.text(), { kind: "seconds", seconds: 0 }),
        ).rejects.toThrow(RangeError)
        await expect(
          store.setMetadata(keys.one(), metadata(), { kind: "milliseconds", milliseconds: -1 }),
        ).rejects.toThrow(RangeError)
      })
    })

    describe("delete", () => {
      it("deleteMetadata leaves content in place", async () => {
        const ttl = { kind: "seconds", seconds: 300 } as const
        await store.setMetadata(keys.one(), metadata(), ttl)
        await store.setContent(keys.one(), bytes.text(), ttl)

        await store.deleteMetadata(keys.one())

        expect(await store.getMetadata(keys.one())).toStrictEqual({ kind: "miss" })
        expect(await store.getContent(keys.one())).toStrictEqual({
          kind: "hit",
          value: bytes.text(),
        })
      })

      it("deleteContent leaves metadata in place", async () => {
        const ttl = { kind: "seconds", seconds: 300 } as const
        await store.setMetadata(keys.one(), metadata(), ttl)
        await store.setContent(keys.one(), bytes.text(), ttl)

        await store.deleteContent(keys.one())

        expect(await store.getContent(keys.one())).toStrictEqual({ kind: "miss" })
        expect(await store.getMetadata(keys.one())).toStrictEqual({
          kind: "hit",
          value: metadata(),
        })
      })

      it("is a no-op for absent keys and safe to repeat", async () => {
        await store.deleteMetadata("missing")
        await store.deleteContent("missing")

        await store.setContent(keys.one(), bytes.text(), { kind: "seconds", seconds: 300 })
        await store.deleteContent(keys.one())
        await store.deleteContent(keys.one())

        expect(await store.getContent(keys.one())).toStrictEqual({ kind: "miss" })
      })
    })

    describe("expiry", () => {
      it("serves entries until the TTL elapses, then misses", async () => {
        const ttl = { kind: "seconds", seconds: 300 } as const
        await store.setMetadata(keys.one(), metadata(), ttl)
        await store.setContent(keys.one(), bytes.text(), ttl)

        clock.advanceMs(299_999)

        expect((await store.getMetadata(keys.one())).kind).toBe("hit")
        expect((await store.getContent(keys.one())).kind).toBe("hit")

        clock.advanceMs(1)

        expect(await store.getMetadata(keys.one())).toStrictEqual({ kind: "miss" })
        expect(await store.getContent(keys.one())).toStrictEqual({ kind: "miss" })
      })

      it("supports millisecond TTLs", async () => {
        await store.setContent(keys.one(), bytes.text(), {
          kind: "milliseconds",
          milliseconds: 1500,
        })

        clock.advanceMs(1499)
        expect((await store.getContent(keys.one())).kind).toBe("hit")

        clock.advanceMs(1)
        expect((await store.getContent(keys.one())).kind).toBe("miss")
      })

      it("supports absolute expiry", async () => {
        const expiresAt = new Date(clock.nowMs() + 60_000)

        await store.setMetadata(keys.one(), metadata(), { kind: "until", expiresAt })

        clock.advanceMs(59_999)
        expect((await store.getMetadata(keys.one())).kind).toBe("hit")

        clock.advanceMs(1)
        expect((await store.getMetadata(keys.one())).kind).toBe("miss")
      })

      it("writing content over expired metadata does not bring the metadata back", async () => {
        await store.setMetadata(keys.one(), metadata(), { kind: "seconds", seconds: 1 })

        clock.advanceMs(2000)
        await store.setContent(keys.one(), bytes.text(), { kind: "seconds", seconds: 300 })

        expect(await store.getMetadata(keys.one())).toStrictEqual({ kind: "miss" })
        expect(await store.getContent(keys.one())).toStrictEqual({
          kind: "hit",
          value: bytes.text(),
        })
      })

      it("writing metadata over expired content does not bring the content back", async () => {
        await store.setContent(keys.one(), bytes.text(), { kind: "seconds", seconds: 1 })

        clock.advanceMs(2000)
        await store.setMetadata(keys.one(), metadata(), { kind: "seconds", seconds: 300 })

        expect(await store.getContent(keys.one())).toStrictEqual({ kind: "miss" })
        expect(await store.getMetadata(keys.one())).toStrictEqual({ kind: "hit", value: metadata() })
      })

      it("a later write with a fresh TTL revives the key", async () => {
        const ttl = { kind: "seconds", seconds: 10 } as const
        await store.setContent(keys.one(), bytes.text(), ttl)

        clock.advanceMs(10_000)
        expect((await store.getContent(keys.one())).kind).toBe("miss")

        await store.setContent(keys.one(), bytes.other(), ttl)

        expect(await store.getContent(keys.one())).toStrictEqual({
          kind: "hit",
          value: bytes.other(),
        })
      })
    })
  })
}
