import type { Lock } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import { LockError } from "../lock.errors"
import { withLock } from "../with-lock"

function makeLease(): LockLease {
  return {
    key: "test:key",
    release: vi.fn(async () => {}),
  }
}

function makeLock(overrides?: Partial<Lock>): Lock {
  return {
    acquire: vi.fn(async () => null),
    ...overrides,
  }
}

describe("withLock", () => {
  it("acquires, runs fn and releases", async () => {
    const lease = makeLease()
    const lock = makeLock({ acquire: vi.fn(async () => lease) })
    const fn = vi.fn(async () => "ok")

    await expect(withLock(lock, "k", fn)).resolves.toBe("ok")

    expect(lock.acquire).toHaveBeenCalledWith("k", {})
    expect(fn).toHaveBeenCalledTimes(1)
    expect(lease.release).toHaveBeenCalledTimes(1)
  })

  it("releases when fn throws and rethrows the same error", async () => {
    const lease = makeLease()
    const lock = makeLock({ acquire: vi.fn(async () => lease) })
    const err = new Error("origin down")

    await expect(
      withLock(lock, "k", async () => {
        throw err
      }),
    ).rejects.toBe(err)

    expect(lease.release).toHaveBeenCalledTimes(1)
  })

  it("throws LockError on timeout", async () => {
    const lock = makeLock()
    const fn = vi.fn(async () => "never")

    const result = withLock(lock, "k", fn, { timeoutMs: 10 })

    await expect(result).rejects.toBeInstanceOf(LockError)
    await expect(result).rejects.toMatchObject({
      code: "lock_not_acquired",
      context: { key: "k", reason: "timeout" },
    })
    expect(fn).not.toHaveBeenCalled()
  })

  it("does not try to acquire with an aborted signal", async () => {
    const lock = makeLock()

    await expect(
      withLock(lock, "k", async () => "x", { signal: AbortSignal.abort() }),
    ).rejects.toMatchObject({ context: { reason: "aborted" } })

    expect(lock.acquire).not.toHaveBeenCalled()
  })
})
