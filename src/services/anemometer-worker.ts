// * Anemometer Acquisition Worker (TypeScript)
// * Owns one serial link for one sensor: open, negotiate protocol, then read telemetry until stopped
// * or until the link fails.
// * ARCHITECTURE:
// * - State machine idle → opening → negotiating → reading → stopping → closed
// * - reading → closed directly on I/O failure
// * - All writes (handshake and injected commands) share one queue so bytes never interleave
// * EVENT EMISSION: 'reading', 'connection-status', 'error', 'init-progress', 'sensor-info', 'state-change'.
// ! A worker runs once. Reconnection creates a fresh worker.

import EventEmitter from 'events'
import { v4 as uuidv4 } from 'uuid'

import type { NegotiatedProtocol, SensorLinkConfig } from '../types/anemometer'
import { ProtocolNegotiator, type NegotiationChannel, type NegotiationTimings } from './anemometer-negotiator'
import {
  AnemometerLineParser,
  BYTE_PACING_DELAY,
  COMMAND_SETTLE_DELAY,
  describeError,
  InvalidReadingError,
  MAX_INPUT_BACKLOG,
  ParseError,
  READ_LINE_TIMEOUT,
  sleep,
} from './anemometer-protocol'
import { createReading } from './anemometer-reading'
import { LineReader, type LineReadResult } from './link/line-reader'
import { type SerialLink, SerialPortLink } from './link/serial-link'
import { createLogger } from './log-service'

const logger = createLogger('AcquisitionWorker')

// ============================================================================
// Type Definitions
// ============================================================================

/**
 *
 */
export enum WorkerState {
  IDLE = 'idle',
  OPENING = 'opening',
  NEGOTIATING = 'negotiating',
  READING = 'reading',
  STOPPING = 'stopping',
  CLOSED = 'closed',
}

/**
 * Timing overrides; production uses the protocol defaults.
 */
export interface WorkerOptions {
  readTimeoutMs?: number
  byteDelayMs?: number
  commandSettleMs?: number
  maxInputBacklog?: number
  negotiation?: Partial<NegotiationTimings>
}

// ============================================================================
// AcquisitionWorker Class
// ============================================================================

/**
 *
 */
export class AcquisitionWorker extends EventEmitter {
  /** Correlates events and log lines of this run */
  readonly runId: string = uuidv4()

  private state: WorkerState = WorkerState.IDLE
  private link: SerialLink | null = null
  private reader: LineReader | null = null
  private running: Promise<void> | null = null
  private stopRequested = false
  private writeQueue: Promise<void> = Promise.resolve()
  private overflowCount = 0
  private protocol: NegotiatedProtocol = { kind: 'unknown' }
  private readonly parser = new AnemometerLineParser()

  private readonly readTimeoutMs: number
  private readonly byteDelayMs: number
  private readonly commandSettleMs: number
  private readonly maxInputBacklog: number

  /**
   *
   * @param sensorId
   * @param config
   * @param options
   */
  constructor(
    readonly sensorId: string,
    private readonly config: SensorLinkConfig,
    private readonly options: WorkerOptions = {}
  ) {
    super()
    this.readTimeoutMs = options.readTimeoutMs ?? READ_LINE_TIMEOUT
    this.byteDelayMs = options.byteDelayMs ?? BYTE_PACING_DELAY
    this.commandSettleMs = options.commandSettleMs ?? COMMAND_SETTLE_DELAY
    this.maxInputBacklog = options.maxInputBacklog ?? MAX_INPUT_BACKLOG
  }

  // * Create a serial link instance (protected for test mocking).
  /**
   *
   * @param port
   * @param baudRate
   */
  protected createSerialLink(port: string, baudRate: number): SerialLink {
    return new SerialPortLink(port, baudRate)
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Begin the run in the background. A worker can only be started once.
   */
  start(): void {
    if (this.running) {
      throw new Error(`Worker ${this.runId} for ${this.sensorId} already started`)
    }
    logger.info(`${this.sensorId}: Starting worker ${this.runId} on ${this.config.port}`)
    this.running = this.run().catch((error) => {
      logger.error(`${this.sensorId}: Worker ${this.runId} crashed: ${describeError(error)}`)
      this.setState(WorkerState.CLOSED)
    })
  }

  /**
   * Request a cooperative stop; a pending read wait is interrupted.
   */
  stop(): void {
    if (this.stopRequested) {
      return
    }
    logger.info(`${this.sensorId}: Stop requested`)
    this.stopRequested = true
    if (this.state !== WorkerState.IDLE && this.state !== WorkerState.CLOSED) {
      this.setState(WorkerState.STOPPING)
    }
    this.reader?.interrupt()
  }

  /**
   * Wait for the run to finish.
   * @param timeoutMs
   * @returns false when the run was still active after timeoutMs
   */
  async join(timeoutMs: number): Promise<boolean> {
    if (!this.running) {
      return true
    }

    let timer: NodeJS.Timeout | undefined
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs)
    })
    const finished = this.running.then(() => true)

    const result = await Promise.race([finished, timedOut])
    clearTimeout(timer)
    return result
  }

  /**
   * Write a command with firmware pacing. Does not change worker state.
   * @param command
   * @returns true when every byte was written
   */
  async sendCommand(command: string): Promise<boolean> {
    const link = this.link
    if (!link || !link.isOpen) {
      logger.error(`${this.sensorId}: Cannot send command - port not open`)
      return false
    }

    logger.info(`${this.sensorId}: Sending command: ${command}`)
    try {
      await this.enqueueWrite(async () => {
        await this.writePaced(link, command)
        await sleep(this.commandSettleMs)
      })
      logger.info(`${this.sensorId}: Command sent successfully`)
      return true
    } catch (error) {
      logger.error(`${this.sensorId}: Failed to send command: ${describeError(error)}`)
      return false
    }
  }

  // ==========================================================================
  // Diagnostics
  // ==========================================================================

  /**
   *
   */
  getState(): WorkerState {
    return this.state
  }

  /**
   *
   */
  getOverflowCount(): number {
    return this.overflowCount
  }

  /**
   *
   */
  getProtocol(): NegotiatedProtocol {
    return this.protocol
  }

  // ==========================================================================
  // Run
  // ==========================================================================

  private async run(): Promise<void> {
    this.setState(WorkerState.OPENING)
    logger.info(`${this.sensorId}: Opening serial port ${this.config.port} at ${this.config.baudRate} baud`)

    let reader: LineReader
    try {
      const link = this.createSerialLink(this.config.port, this.config.baudRate)
      this.link = link
      reader = new LineReader(link)
      this.reader = reader
      if (this.stopRequested) {
        reader.interrupt()
      }
      await link.open()
      await link.flush()
      reader.resetInput()
    } catch (error) {
      const message = `Serial port error: ${describeError(error)}`
      logger.error(`${this.sensorId}: ${message}`)
      this.emitError(message)
      this.emit('connection-status', false)
      await this.closeLink()
      this.setState(WorkerState.CLOSED)
      return
    }

    logger.info(`${this.sensorId}: Serial port opened successfully`)
    this.emit('connection-status', true)

    if (!this.stopRequested) {
      this.setState(WorkerState.NEGOTIATING)
      await this.negotiate(reader)
    }

    if (!this.stopRequested) {
      this.setState(WorkerState.READING)
      await this.readLoop(reader)
    }

    if (this.stopRequested) {
      this.setState(WorkerState.STOPPING)
    }
    await this.closeLink()
    this.setState(WorkerState.CLOSED)
    logger.info(`${this.sensorId}: Worker ${this.runId} finished`)
  }

  private async negotiate(reader: LineReader): Promise<void> {
    const channel: NegotiationChannel = {
      writePaced: (text) => this.enqueueWrite(() => this.writePacedOnLink(text)),
      writeRaw: (data) => this.enqueueWrite(() => this.writeOnLink(data)),
      readLine: (timeoutMs) => reader.readLine(timeoutMs),
      resetInput: () => reader.resetInput(),
      isStopRequested: () => this.stopRequested,
    }

    const negotiator = new ProtocolNegotiator(
      this.sensorId,
      channel,
      {
        onProgress: (message) => this.emit('init-progress', message),
        onError: (message) => this.emitError(message),
      },
      this.options.negotiation
    )

    try {
      this.protocol = await negotiator.negotiate(this.config.initCommands)
    } catch (error) {
      const message = `Initialization failed: ${describeError(error)}`
      logger.warn(`${this.sensorId}: ${message}`)
      this.emitError(message)
      return
    }

    if (this.protocol.kind === 'structured' && !this.stopRequested) {
      this.emit('sensor-info', this.protocol.info)
    }
  }

  private async readLoop(reader: LineReader): Promise<void> {
    logger.info(`${this.sensorId}: Entering data read loop`)

    while (!this.stopRequested) {
      const backlog = reader.bytesAvailable()
      if (backlog > this.maxInputBacklog) {
        this.overflowCount++
        logger.warn(
          `${this.sensorId}: Input buffer overflow detected (${backlog} bytes). ` +
            `Flushing buffer. Overflow count: ${this.overflowCount}`
        )
        reader.resetInput()
        continue
      }

      let result: LineReadResult
      try {
        result = await reader.readLine(this.readTimeoutMs)
      } catch (error) {
        if (this.stopRequested) {
          break
        }
        const message = `Serial error reading data: ${describeError(error)}`
        logger.error(`${this.sensorId}: ${message}`)
        this.emitError(message)
        this.emit('connection-status', false)
        break
      }

      if (!result.complete) {
        if (result.text) {
          logger.debug(`${this.sensorId}: Incomplete line received, discarding: ${result.text.slice(0, 50)}`)
        }
        continue
      }

      if (result.text) {
        this.handleLine(result.text)
      }
    }
  }

  private handleLine(line: string): void {
    try {
      const fields = this.parser.parseLine(line)
      if (!this.parser.validateFields(fields)) {
        logger.warn(`${this.sensorId}: Incomplete data (missing required tags), skipping`)
        return
      }

      const reading = createReading(this.sensorId, fields, Date.now())
      if (!reading.isValid) {
        logger.debug(`${this.sensorId}: Data contains error codes (-99.9/-99.99)`)
      }
      this.emit('reading', reading)
    } catch (error) {
      if (error instanceof ParseError || error instanceof InvalidReadingError) {
        logger.warn(`${this.sensorId}: Parse error: ${error.message}. Line: ${line}`)
      } else {
        logger.error(`${this.sensorId}: Unexpected error handling line: ${describeError(error)}`)
      }
    }
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    const next = this.writeQueue.then(task)
    // Failures reach the caller through `next`; the queue itself keeps going.
    this.writeQueue = next.catch((error) => {
      logger.debug(`${this.sensorId}: Queued write failed: ${describeError(error)}`)
    })
    return next
  }

  private async writePaced(link: SerialLink, text: string): Promise<void> {
    for (const char of text) {
      await link.write(Buffer.from(char, 'ascii'))
      await sleep(this.byteDelayMs)
    }
  }

  private writePacedOnLink(text: string): Promise<void> {
    if (!this.link) {
      return Promise.reject(new Error('Port not open'))
    }
    return this.writePaced(this.link, text)
  }

  private writeOnLink(data: Buffer): Promise<void> {
    if (!this.link) {
      return Promise.reject(new Error('Port not open'))
    }
    return this.link.write(data)
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async closeLink(): Promise<void> {
    const link = this.link
    if (!link || !link.isOpen) {
      return
    }
    try {
      await link.close()
      logger.info(`${this.sensorId}: Serial port closed`)
    } catch (error) {
      logger.error(`${this.sensorId}: Error closing port: ${describeError(error)}`)
    }
  }

  private emitError(message: string): void {
    // An 'error' event without listeners would throw.
    if (this.listenerCount('error') > 0) {
      this.emit('error', message)
    }
  }

  private setState(state: WorkerState): void {
    if (this.state === state) {
      return
    }
    this.state = state
    this.emit('state-change', state)
  }
}
