/**
 * Creates a resource once and hands the same promise to every caller. When
 * creation fails the cache forgets the attempt, so the next caller retries.
 */
export class SessionStateCache<T> {
  private pending: Promise<T> | undefined

  constructor(private readonly create: () => Promise<T>) {}

  get created(): boolean {
    return this.pending !== undefined
  }

  resolve(): Promise<T> {
    if (this.pending === undefined) {
      const attempt = this.create()
      this.pending = attempt
      attempt.catch(() => {
        if (this.pending === attempt) this.pending = undefined
      })
    }
    return this.pending
  }
}
