import { describeError } from './anemometer-protocol'
import { createLogger } from './log-service'

const logger = createLogger('ReconnectSupervisor')

export const MAX_RECONNECT_ATTEMPTS = 4
export const RECONNECT_BASE_DELAY = 1000

/**
 *
 */
export interface ReconnectOptions {
  maxAttempts?: number
  baseDelayMs?: number
}

/**
 * What happened to a connection-lost notification.
 */
export type ReconnectDecision =
  | { outcome: 'scheduled'; attempt: number; delayMs: number }
  | { outcome: 'pending' }
  | { outcome: 'exhausted'; attempts: number }

/**
 * Backoff delay before the given zero-based attempt: 1 s, 2 s, 4 s, 8 s.
 * @param attempt
 * @param baseDelayMs
 */
export function reconnectDelay(attempt: number, baseDelayMs: number = RECONNECT_BASE_DELAY): number {
  return baseDelayMs * 2 ** attempt
}

// * Bounded exponential backoff for one sensor.
// * At most one attempt is pending; the pending flag clears when the timer fires, so a failure
// * of the attempt itself re-enters the chain. A successful connection resets the counter.
/**
 *
 */
export class ReconnectSupervisor {
  private attempts = 0
  private timer: NodeJS.Timeout | null = null
  private readonly maxAttempts: number
  private readonly baseDelayMs: number

  /**
   *
   * @param sensorId
   * @param attemptReconnect - invoked when a scheduled delay elapses
   * @param options
   */
  constructor(
    private readonly sensorId: string,
    private readonly attemptReconnect: (attempt: number) => Promise<void>,
    options: ReconnectOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? MAX_RECONNECT_ATTEMPTS
    this.baseDelayMs = options.baseDelayMs ?? RECONNECT_BASE_DELAY
  }

  // Allow tests to override scheduling behavior
  /**
   *
   * @param callback
   * @param delayMs
   */
  protected scheduleTimeout(callback: () => void, delayMs: number): NodeJS.Timeout {
    return setTimeout(callback, delayMs)
  }

  /**
   *
   * @param handle
   */
  protected clearScheduledTimeout(handle: NodeJS.Timeout): void {
    clearTimeout(handle)
  }

  /**
   * Schedule the next attempt unless one is pending or the budget is spent.
   */
  onConnectionLost(): ReconnectDecision {
    if (this.timer) {
      logger.debug(`${this.sensorId}: Reconnection already pending`)
      return { outcome: 'pending' }
    }

    if (this.attempts >= this.maxAttempts) {
      logger.error(`${this.sensorId}: Max reconnection attempts (${this.maxAttempts}) reached`)
      return { outcome: 'exhausted', attempts: this.attempts }
    }

    const delayMs = reconnectDelay(this.attempts, this.baseDelayMs)
    this.attempts++
    const attempt = this.attempts
    logger.info(`${this.sensorId}: Scheduling reconnection attempt ${attempt}/${this.maxAttempts} in ${delayMs}ms`)

    this.timer = this.scheduleTimeout(() => {
      this.timer = null
      this.fire(attempt)
    }, delayMs)

    return { outcome: 'scheduled', attempt, delayMs }
  }

  /**
   * Connection established: reset the counter and drop any pending attempt.
   */
  onConnected(): void {
    this.cancel()
  }

  /**
   * Drop any pending attempt and reset the counter.
   */
  cancel(): void {
    if (this.timer) {
      this.clearScheduledTimeout(this.timer)
      this.timer = null
    }
    this.attempts = 0
  }

  /**
   *
   */
  isPending(): boolean {
    return this.timer !== null
  }

  /**
   *
   */
  getAttempts(): number {
    return this.attempts
  }

  private fire(attempt: number): void {
    logger.info(`${this.sensorId}: Reconnection attempt ${attempt}/${this.maxAttempts}`)
    this.attemptReconnect(attempt).catch((error) => {
      logger.error(`${this.sensorId}: Reconnection attempt ${attempt} failed: ${describeError(error)}`)
    })
  }
}
