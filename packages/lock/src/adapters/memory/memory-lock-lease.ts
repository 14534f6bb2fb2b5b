import type { LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"

export type MemoryLeaseDeps = {
  onRelease: () => void
}

export class MemoryLease implements LockLease {
  private released = false

  public constructor(
    public readonly key: LockKey,
    private readonly deps: MemoryLeaseDeps,
  ) {}

  public async release(): Promise<void> {
    if (this.released) return

    this.released = true
    this.deps.onRelease()
  }
}
