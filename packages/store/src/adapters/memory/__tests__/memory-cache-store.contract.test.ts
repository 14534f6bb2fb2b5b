import { ManualClock } from "@rawcache/clock"
import { describeCacheStoreContract } from "../../../ports/__tests__/cache-store.contract"
import { startOfTest } from "../../../tests/utils/cache-test-helpers"
import { MemoryCacheStore } from "../memory-cache-store"

describeCacheStoreContract({
  name: "MemoryCacheStore",
  make: () => {
    const clock = new ManualClock(startOfTest)
    return { store: new MemoryCacheStore({ clock }), clock }
  },
})
