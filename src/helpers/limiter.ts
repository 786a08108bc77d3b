// Counting limiter shared by everything that starts heavy, process-bound work
// (trajectory concatenation, helper scripts). Waiters are released FIFO.
export class ProcessLimiter {
  private running = 0
  private readonly waiters: Array<() => void> = []

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Limiter capacity must be a positive integer, got ${capacity}`)
    }
  }

  get active(): number {
    return this.running
  }

  get pending(): number {
    return this.waiters.length
  }

  async acquire(): Promise<void> {
    if (this.running < this.capacity) {
      this.running++
      return
    }
    // the slot is handed over by release(), running is not decremented in between
    await new Promise<void>((resolve) => this.waiters.push(resolve))
  }

  release(): void {
    const next = this.waiters.shift()
    if (next) {
      next()
      return
    }
    if (this.running === 0) {
      throw new Error('ProcessLimiter released more often than acquired')
    }
    this.running--
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await task()
    } finally {
      this.release()
    }
  }
}

export const createProcessLimiter = (capacity: number): ProcessLimiter =>
  new ProcessLimiter(Math.max(1, Math.floor(capacity)))
