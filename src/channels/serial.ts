/**
 * Single-writer serialization point.
 * Tasks run one at a time in submission order; a failed task does not
 * block the ones queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending += 1
    const result = this.tail.then(() => task())
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    )
    return result
  }

  get size(): number {
    return this.pending
  }

  private settle(): void {
    this.pending -= 1
  }
}
