export interface InvalidatableCache<T> {
  get(): Promise<T>
  invalidate(): void
}

interface CacheEntry<T> {
  value: Promise<T>
  storedAt: number
}

/**
 * Memoizes the result of `load` until `invalidate` is called or, when an
 * expiration is given, until it has been held for that many milliseconds.
 * Callers arriving while a load is in flight share its promise. A failed
 * load is never kept.
 */
export class MemoizedLoader<T> implements InvalidatableCache<T> {
  private entry: CacheEntry<T> | undefined
  private generation = 0

  constructor(
    private readonly load: () => Promise<T>,
    private readonly expirationMs?: number,
    private readonly now: () => number = Date.now
  ) {}

  get(): Promise<T> {
    if (this.entry && !this.isExpired(this.entry)) {
      return this.entry.value
    }
    this.generation += 1
    this.entry = {
      value: this.fetch(this.generation),
      storedAt: this.now(),
    }
    return this.entry.value
  }

  invalidate(): void {
    this.generation += 1
    this.entry = undefined
  }

  private isExpired({ storedAt }: CacheEntry<T>) {
    return (
      this.expirationMs !== undefined &&
      this.now() - storedAt >= this.expirationMs
    )
  }

  private async fetch(generation: number): Promise<T> {
    try {
      return await this.load()
    } catch (error) {
      if (generation === this.generation) {
        this.entry = undefined
      }
      throw error
    }
  }
}
