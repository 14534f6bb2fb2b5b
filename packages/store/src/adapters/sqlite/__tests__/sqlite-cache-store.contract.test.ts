import { ManualClock } from "@rawcache/clock"
import { NullLogger } from "@rawcache/logger"
import Database from "better-sqlite3"
import { describeCacheStoreContract } from "../../../ports/__tests__/cache-store.contract"
import { startOfTest } from "../../../tests/utils/cache-test-helpers"
import { SqliteCacheStore } from "../sqlite-cache-store"

describeCacheStoreContract({
  name: "SqliteCacheStore",
  make: () => {
    const clock = new ManualClock(startOfTest)
    const store = new SqliteCacheStore({
      db: new Database(":memory:"),
      clock,
      logger: new NullLogger(),
    })
    return { store, clock }
  },
})
