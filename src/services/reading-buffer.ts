import type { AnemometerReading } from '../types/anemometer'

/** ~2.2 hours at 25 Hz */
export const DEFAULT_BUFFER_CAPACITY = 200_000

// * Fixed-capacity FIFO ring buffer.
// * append and latest are O(1); the oldest reading is overwritten once full.
// * All methods are synchronous, so a snapshot never interleaves with an append.
/**
 *
 */
export class BoundedReadingBuffer {
  private readonly slots: Array<AnemometerReading | undefined>
  private head = 0 // index of the oldest reading
  private count = 0

  /**
   *
   * @param capacity
   */
  constructor(readonly capacity: number = DEFAULT_BUFFER_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${capacity}`)
    }
    this.slots = new Array<AnemometerReading | undefined>(capacity)
  }

  /**
   *
   * @param reading
   */
  append(reading: AnemometerReading): void {
    const tail = (this.head + this.count) % this.capacity
    this.slots[tail] = reading
    if (this.count < this.capacity) {
      this.count++
    } else {
      this.head = (this.head + 1) % this.capacity
    }
  }

  /**
   * Most recent reading, or null when empty.
   */
  latest(): AnemometerReading | null {
    if (this.count === 0) {
      return null
    }
    return this.slots[(this.head + this.count - 1) % this.capacity] ?? null
  }

  /**
   * Copy of the contents, oldest first.
   */
  snapshot(): AnemometerReading[] {
    const out: AnemometerReading[] = []
    for (let i = 0; i < this.count; i++) {
      const reading = this.slots[(this.head + i) % this.capacity]
      if (reading) {
        out.push(reading)
      }
    }
    return out
  }

  /**
   *
   */
  get size(): number {
    return this.count
  }

  /**
   *
   */
  clear(): void {
    this.slots.fill(undefined)
    this.head = 0
    this.count = 0
  }
}
