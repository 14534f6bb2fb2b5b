import { ManualClock } from "@rawcache/clock"
import { bytes, keys, metadata, startOfTest } from "../../../tests/utils/cache-test-helpers"
import { MemoryCacheStore } from "../memory-cache-store"

describe("MemoryCacheStore (behavior)", () => {
  it("drops expired entries when they are read", async () => {
    const clock = new ManualClock(startOfTest)
    const store = new MemoryCacheStore({ clock })
    const ttl = { kind: "seconds", seconds: 1 } as const

    await store.setMetadata(keys.one(), metadata(), ttl)
    await store.setContent(keys.one(), bytes.text(), ttl)
    expect(store.size()).toBe(2)

    clock.advanceMs(1000)
    await store.getMetadata(keys.one())
    await store.getContent(keys.one())

    expect(store.size()).toBe(0)
  })

  it("returned metadata is a copy", async () => {
    const store = new MemoryCacheStore({ clock: new ManualClock(startOfTest) })
    await store.setMetadata(keys.one(), metadata(), { kind: "seconds", seconds: 60 })

    const first = await store.getMetadata(keys.one())
    if (first.kind === "hit") first.value.cachedAt.setTime(0)

    const second = await store.getMetadata(keys.one())
    expect(second).toStrictEqual({ kind: "hit", value: metadata() })
  })

  it("shutdown clears every entry", async () => {
    const store = new MemoryCacheStore({ clock: new ManualClock(startOfTest) })
    await store.setContent(keys.one(), bytes.text(), { kind: "seconds", seconds: 60 })

    await store.shutdown()

    expect(store.size()).toBe(0)
  })
})
