import pLimit from 'p-limit'

type Mutex = ReturnType<typeof pLimit>

/**
 * Keyed mutex. Holding a set of keys excludes every other holder of any of
 * them; holders of disjoint sets run in parallel. Keys are always acquired
 * in sorted order, so two overlapping holders cannot deadlock.
 */
export class CommitLock {
  private readonly locks = new Map<string, Mutex>()

  private lockFor(key: string): Mutex {
    let lock = this.locks.get(key)
    if (!lock) {
      lock = pLimit(1)
      this.locks.set(key, lock)
    }
    return lock
  }

  async run<T>(keys: Iterable<string>, task: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort()
    const acquire = (index: number): Promise<T> => {
      const key = ordered[index]
      if (key === undefined) return task()
      return this.lockFor(key)(() => acquire(index + 1))
    }
    return acquire(0)
  }
}
