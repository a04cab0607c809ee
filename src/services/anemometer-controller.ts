// * Sensor Controller
// * Per-sensor owner of the acquisition worker, reading buffer, connection state and reconnect supervisor.
// * Worker events are accepted only from the current worker; a replaced worker's late events are dropped.
// * EVENT EMISSION: 'reading', 'status', 'error', 'init-progress', 'sensor-info',
// * 'reconnect-scheduled', 'reconnect-exhausted'.

import EventEmitter from 'events'

import type {
  AnemometerReading,
  ConnectionState,
  OperationResult,
  SensorInfo,
  SensorLinkConfig,
} from '../types/anemometer'
import { makeEnableTagCmd, makeOutputRateCmd, CMD_SAVE } from './anemometer-protocol'
import { AcquisitionWorker, type WorkerOptions, WorkerState } from './anemometer-worker'
import { createLogger } from './log-service'
import { BoundedReadingBuffer, DEFAULT_BUFFER_CAPACITY } from './reading-buffer'
import { type ReconnectOptions, ReconnectSupervisor } from './reconnect-supervisor'
import { isValidOutputRate } from './validators'

const logger = createLogger('SensorController')

export const DISCONNECT_JOIN_TIMEOUT = 5000
export const RECONNECT_JOIN_TIMEOUT = 2000

/**
 *
 */
export interface SensorControllerOptions {
  bufferCapacity?: number
  reconnect?: ReconnectOptions
  worker?: WorkerOptions
  disconnectJoinTimeoutMs?: number
  reconnectJoinTimeoutMs?: number
}

/**
 *
 */
export class SensorController extends EventEmitter {
  readonly buffer: BoundedReadingBuffer

  private config: SensorLinkConfig
  private worker: AcquisitionWorker | null = null
  private disconnecting = false
  private sensorInfo: SensorInfo | null = null
  private readonly supervisor: ReconnectSupervisor
  private readonly state: ConnectionState = {
    connected: false,
    reconnectAttempts: 0,
    lastError: null,
    protocol: { kind: 'unknown' },
    runId: null,
  }

  /**
   *
   * @param sensorId
   * @param config
   * @param options
   */
  constructor(
    readonly sensorId: string,
    config: SensorLinkConfig,
    private readonly options: SensorControllerOptions = {}
  ) {
    super()
    this.config = { ...config, initCommands: [...config.initCommands] }
    this.buffer = new BoundedReadingBuffer(options.bufferCapacity ?? DEFAULT_BUFFER_CAPACITY)
    this.supervisor = this.createSupervisor()
  }

  // * Factories (protected for test injection).
  /**
   *
   * @param config
   */
  protected createWorker(config: SensorLinkConfig): AcquisitionWorker {
    return new AcquisitionWorker(this.sensorId, config, this.options.worker)
  }

  /**
   *
   */
  protected createSupervisor(): ReconnectSupervisor {
    return new ReconnectSupervisor(this.sensorId, (attempt) => this.attemptReconnection(attempt), this.options.reconnect)
  }

  // ==========================================================================
  // Connection
  // ==========================================================================

  /**
   * Start a fresh worker. Resets the reconnect budget.
   */
  connect(): OperationResult {
    if (this.isRunning()) {
      logger.warn(`${this.sensorId}: Already connected`)
      return { success: false, error: 'Already connected' }
    }
    if (!this.config.port) {
      return { success: false, error: 'No port configured' }
    }

    logger.info(`${this.sensorId}: Starting sensor connection`)
    this.disconnecting = false
    this.supervisor.cancel()
    this.state.reconnectAttempts = 0
    this.state.lastError = null
    this.startWorker()
    return { success: true }
  }

  /**
   * Cancel reconnection, stop the worker and wait for it.
   */
  async disconnect(): Promise<void> {
    this.supervisor.cancel()
    this.state.reconnectAttempts = 0

    const worker = this.worker
    if (!worker) {
      logger.warn(`${this.sensorId}: No worker to disconnect`)
      return
    }

    logger.info(`${this.sensorId}: Disconnecting sensor`)
    this.disconnecting = true
    worker.stop()

    const timeout = this.options.disconnectJoinTimeoutMs ?? DISCONNECT_JOIN_TIMEOUT
    if (await worker.join(timeout)) {
      logger.info(`${this.sensorId}: Worker stopped`)
    } else {
      logger.error(`${this.sensorId}: Worker did not stop within ${timeout}ms`)
    }

    this.worker = null
    this.state.runId = null
    const wasConnected = this.state.connected
    this.state.connected = false
    if (wasConnected) {
      this.emit('status', { sensorId: this.sensorId, connected: false })
    }
  }

  /**
   * Replace link parameters. A port or baud change invalidates buffered readings.
   * Takes effect on the next connect.
   * @param config
   */
  updateConfig(config: SensorLinkConfig): void {
    if (config.port !== this.config.port || config.baudRate !== this.config.baudRate) {
      logger.info(`${this.sensorId}: Link parameters changed, clearing buffer`)
      this.buffer.clear()
    }
    this.config = { ...config, initCommands: [...config.initCommands] }
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  /**
   * Inject a raw command into the running link.
   * @param command
   */
  async sendCommand(command: string): Promise<boolean> {
    if (!this.worker) {
      logger.error(`${this.sensorId}: Cannot send command - not connected`)
      return false
    }
    return this.worker.sendCommand(command)
  }

  /**
   * `{outputrate N}`; only structured-protocol sensors accept it.
   * @param rateHz
   */
  async setOutputRate(rateHz: number): Promise<OperationResult> {
    if (!isValidOutputRate(rateHz)) {
      return { success: false, error: `Invalid output rate: ${rateHz} (must be 1-10 Hz)` }
    }
    return this.sendStructuredCommand(makeOutputRateCmd(rateHz))
  }

  /**
   * Turn on tagged output for one channel.
   * @param tag
   */
  async enableTaggedOutput(tag: string): Promise<OperationResult> {
    return this.sendStructuredCommand(makeEnableTagCmd(tag))
  }

  /**
   * Persist the device's current settings to its flash.
   */
  async saveDeviceSettings(): Promise<OperationResult> {
    return this.sendStructuredCommand(CMD_SAVE)
  }

  private async sendStructuredCommand(command: string): Promise<OperationResult> {
    if (this.state.protocol.kind !== 'structured') {
      logger.info(`${this.sensorId}: Skipping ${command} (protocol: ${this.state.protocol.kind})`)
      return { success: false, error: 'Sensor does not use the structured protocol' }
    }
    const sent = await this.sendCommand(command)
    return sent ? { success: true } : { success: false, error: `Failed to send ${command}` }
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  /**
   *
   */
  getState(): ConnectionState {
    return { ...this.state }
  }

  /**
   *
   */
  getConfig(): SensorLinkConfig {
    return { ...this.config, initCommands: [...this.config.initCommands] }
  }

  /**
   * True while the current worker has not closed.
   */
  isRunning(): boolean {
    return this.worker !== null && this.worker.getState() !== WorkerState.CLOSED
  }

  /**
   *
   */
  isConnected(): boolean {
    return this.state.connected
  }

  /**
   *
   */
  getSensorInfo(): SensorInfo | null {
    return this.sensorInfo
  }

  /**
   *
   */
  getBufferSnapshot(): AnemometerReading[] {
    return this.buffer.snapshot()
  }

  /**
   *
   */
  getLatestReading(): AnemometerReading | null {
    return this.buffer.latest()
  }

  /**
   *
   */
  clearBuffer(): void {
    this.buffer.clear()
    logger.info(`${this.sensorId}: Buffer cleared`)
  }

  /**
   *
   */
  getOverflowCount(): number {
    return this.worker?.getOverflowCount() ?? 0
  }

  // ==========================================================================
  // Worker wiring
  // ==========================================================================

  private startWorker(): void {
    const worker = this.createWorker(this.getConfig())
    this.worker = worker
    this.state.runId = worker.runId
    this.state.protocol = { kind: 'unknown' }

    worker.on('reading', (reading: AnemometerReading) => {
      if (worker !== this.worker) return
      this.buffer.append(reading)
      this.emit('reading', reading)
    })
    worker.on('connection-status', (connected: boolean) => this.onConnectionStatus(worker, connected))
    worker.on('error', (message: string) => this.onWorkerError(worker, message))
    worker.on('init-progress', (message: string) => {
      if (worker !== this.worker) return
      logger.info(`${this.sensorId}: Init: ${message}`)
      this.emit('init-progress', { sensorId: this.sensorId, message })
    })
    worker.on('sensor-info', (info: SensorInfo) => {
      if (worker !== this.worker) return
      this.sensorInfo = info
      this.state.protocol = { kind: 'structured', info }
      this.emit('sensor-info', { sensorId: this.sensorId, info })
    })
    worker.on('state-change', (state: WorkerState) => {
      if (worker !== this.worker) return
      if (state === WorkerState.READING) {
        this.state.protocol = worker.getProtocol()
      }
    })

    worker.start()
  }

  private onConnectionStatus(worker: AcquisitionWorker, connected: boolean): void {
    if (worker !== this.worker) {
      logger.debug(`${this.sensorId}: Ignoring status from stale worker ${worker.runId}`)
      return
    }

    this.state.connected = connected
    this.emit('status', { sensorId: this.sensorId, connected })

    if (connected) {
      logger.info(`${this.sensorId}: Connection established`)
      this.supervisor.onConnected()
      this.state.reconnectAttempts = 0
      return
    }

    logger.warn(`${this.sensorId}: Connection lost`)
    if (!this.disconnecting) {
      this.scheduleReconnection()
    }
  }

  private onWorkerError(worker: AcquisitionWorker, message: string): void {
    if (worker !== this.worker) return
    logger.error(`${this.sensorId}: Worker error - ${message}`)
    this.state.lastError = message
    if (this.listenerCount('error') > 0) {
      this.emit('error', { sensorId: this.sensorId, message })
    }
  }

  private scheduleReconnection(): void {
    const decision = this.supervisor.onConnectionLost()
    this.state.reconnectAttempts = this.supervisor.getAttempts()

    if (decision.outcome === 'scheduled') {
      this.emit('reconnect-scheduled', {
        sensorId: this.sensorId,
        attempt: decision.attempt,
        delayMs: decision.delayMs,
      })
    } else if (decision.outcome === 'exhausted') {
      this.state.lastError = `Max reconnection attempts (${decision.attempts}) reached`
      this.emit('reconnect-exhausted', { sensorId: this.sensorId, attempts: decision.attempts })
    }
  }

  private async attemptReconnection(attempt: number): Promise<void> {
    if (this.disconnecting) {
      return
    }
    logger.info(`${this.sensorId}: Attempting reconnection (${attempt})`)

    const previous = this.worker
    if (previous) {
      previous.stop()
      const timeout = this.options.reconnectJoinTimeoutMs ?? RECONNECT_JOIN_TIMEOUT
      if (!(await previous.join(timeout))) {
        logger.error(`${this.sensorId}: Previous worker did not stop within ${timeout}ms`)
      }
    }

    if (this.disconnecting || this.worker !== previous) {
      return
    }
    this.startWorker()
  }
}
