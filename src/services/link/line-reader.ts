import { SerialIOError } from '../anemometer-protocol'
import type { SerialLink } from './serial-link'

/**
 * Outcome of one timeout-bounded line read.
 * `complete` is false when the wait ended before a newline arrived; `text` then holds
 * whatever partial bytes were drained.
 */
export interface LineReadResult {
  complete: boolean
  text: string
}

const NEWLINE = 0x0a

// * Accumulates link bytes and hands them out one LF-terminated line at a time.
// * A link error or unexpected close is latched and rethrown by the next read.
/**
 *
 */
export class LineReader {
  private pending: Buffer = Buffer.alloc(0)
  private failure: SerialIOError | null = null
  private interrupted = false
  private wake: (() => void) | null = null

  /**
   *
   * @param link
   */
  constructor(link: SerialLink) {
    link.on('data', (data: Buffer) => {
      this.pending = Buffer.concat([this.pending, data])
      this.notify()
    })
    link.on('error', (error: Error) => this.fail(new SerialIOError(`Serial link error: ${error.message}`)))
    link.on('close', () => this.fail(new SerialIOError('Serial link closed')))
  }

  /**
   * Unread byte count.
   */
  bytesAvailable(): number {
    return this.pending.length
  }

  /**
   * Drop everything not yet read.
   */
  resetInput(): void {
    this.pending = Buffer.alloc(0)
  }

  /**
   * Wake any pending read and make every later read return immediately.
   */
  interrupt(): void {
    this.interrupted = true
    this.notify()
  }

  /**
   *
   */
  get isInterrupted(): boolean {
    return this.interrupted
  }

  /**
   * Read one line (CR/LF and surrounding whitespace stripped).
   * @param timeoutMs
   * @throws {SerialIOError} once the link has failed and no buffered line remains
   */
  async readLine(timeoutMs: number): Promise<LineReadResult> {
    const deadline = Date.now() + timeoutMs

    for (;;) {
      const newline = this.pending.indexOf(NEWLINE)
      if (newline >= 0) {
        const raw = this.pending.subarray(0, newline + 1)
        this.pending = this.pending.subarray(newline + 1)
        return { complete: true, text: raw.toString('utf8').trim() }
      }

      if (this.failure) {
        throw this.failure
      }

      const remaining = deadline - Date.now()
      if (remaining <= 0 || this.interrupted) {
        const partial = this.pending.toString('utf8').trim()
        this.pending = Buffer.alloc(0)
        return { complete: false, text: partial }
      }

      await this.waitForData(remaining)
    }
  }

  private waitForData(timeoutMs: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null
        resolve()
      }, timeoutMs)
      this.wake = () => {
        clearTimeout(timer)
        this.wake = null
        resolve()
      }
    })
  }

  private notify(): void {
    if (this.wake) {
      this.wake()
    }
  }

  private fail(error: SerialIOError): void {
    if (!this.failure) {
      this.failure = error
    }
    this.notify()
  }
}
