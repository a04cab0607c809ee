// * Application controller
// * Owns one SensorController per configured sensor id, persists link settings, exports CSV
// * and samples process memory.
// * EVENT EMISSION: every sensor event is re-emitted unchanged ('reading', 'status', 'error',
// * 'init-progress', 'sensor-info', 'reconnect-scheduled', 'reconnect-exhausted'), plus 'memory-warning'.

import EventEmitter from 'events'

import type { AnemometerReading, OperationResult, SensorInfo, SensorLinkConfig } from '../types/anemometer'
import { type SensorControllerOptions, SensorController } from './anemometer-controller'
import { describeError } from './anemometer-protocol'
import type { ConfigStore } from './config-store'
import { type ExportResult, writeMultiSensorCsv, writeSingleSensorCsv } from './csv-exporter'
import { listSerialPorts, type SerialPortInfo } from './link/serial-link'
import { createLogger } from './log-service'
import { isValidBaudRate, isValidOutputRate, isValidPort, isValidSensorId } from './validators'

const logger = createLogger('AppController')

export const MEMORY_CHECK_INTERVAL = 30_000
export const MEMORY_WARNING_THRESHOLD_MB = 500

const FORWARDED_EVENTS = [
  'reading',
  'status',
  'init-progress',
  'sensor-info',
  'reconnect-scheduled',
  'reconnect-exhausted',
] as const

/**
 *
 */
export interface AppControllerOptions {
  sensor?: SensorControllerOptions
  memoryCheckIntervalMs?: number
  memoryWarningThresholdMb?: number
}

/**
 * Outcome of an output-rate broadcast: which sensors took the command.
 */
export type OutputRateResult =
  | { success: true; applied: string[]; skipped: string[] }
  | { success: false; error: string }

/**
 *
 */
export class AppController extends EventEmitter {
  private readonly controllers = new Map<string, SensorController>()
  private memoryTimer: NodeJS.Timeout | null = null

  /**
   *
   * @param config
   * @param options
   */
  constructor(
    private readonly config: ConfigStore,
    private readonly options: AppControllerOptions = {}
  ) {
    super()
    for (const sensorId of config.getSensorIds()) {
      const controller = this.createSensorController(sensorId, config.getSensorConfig(sensorId))
      this.wireController(controller)
      this.controllers.set(sensorId, controller)
    }
    logger.info(`Initialized ${this.controllers.size} sensor controllers`)
  }

  // * Factories and readers (protected for test injection).
  /**
   *
   * @param sensorId
   * @param linkConfig
   */
  protected createSensorController(sensorId: string, linkConfig: SensorLinkConfig): SensorController {
    return new SensorController(sensorId, linkConfig, this.options.sensor)
  }

  /**
   * Resident set size in bytes.
   */
  protected readMemoryUsage(): number {
    return process.memoryUsage().rss
  }

  // ==========================================================================
  // Ports and connections
  // ==========================================================================

  /**
   *
   */
  async listPorts(): Promise<SerialPortInfo[]> {
    try {
      const ports = await listSerialPorts()
      logger.info(`Found ${ports.length} serial ports`)
      return ports
    } catch (error) {
      logger.error(`Error enumerating serial ports: ${describeError(error)}`)
      return []
    }
  }

  /**
   * Update the sensor's link settings, connect, and persist the settings once the
   * connection has been started. A running sensor is left untouched.
   * @param sensorId
   * @param linkConfig
   */
  connectSensor(sensorId: string, linkConfig: SensorLinkConfig): OperationResult {
    if (!isValidSensorId(sensorId)) {
      return { success: false, error: `Invalid sensor ID: ${sensorId}` }
    }
    const controller = this.controllers.get(sensorId)
    if (!controller) {
      logger.error(`Unknown sensor ID: ${sensorId}`)
      return { success: false, error: `Unknown sensor ID: ${sensorId}` }
    }
    if (!isValidPort(linkConfig.port)) {
      return { success: false, error: `Invalid port: ${linkConfig.port}` }
    }
    if (!isValidBaudRate(linkConfig.baudRate)) {
      return { success: false, error: `Invalid baud rate: ${linkConfig.baudRate}` }
    }
    if (controller.isRunning()) {
      logger.warn(`${sensorId}: Already connected, keeping ${controller.getConfig().port}`)
      return { success: false, error: 'Already connected' }
    }

    logger.info(
      `Connecting ${sensorId} to ${linkConfig.port} @ ${linkConfig.baudRate} baud ` +
        `with ${linkConfig.initCommands.length} init commands`
    )
    controller.updateConfig(linkConfig)

    const result = controller.connect()
    if (result.success) {
      this.config.setSensorConfig(sensorId, linkConfig)
      logger.info(`${sensorId}: Connection initiated successfully`)
    } else {
      logger.warn(`${sensorId}: Failed to initiate connection: ${result.error}`)
    }
    return result
  }

  /**
   * Connect every sensor that has a port saved.
   */
  connectConfigured(): string[] {
    const started: string[] = []
    for (const [sensorId, controller] of this.controllers) {
      const linkConfig = controller.getConfig()
      if (linkConfig.port && this.connectSensor(sensorId, linkConfig).success) {
        started.push(sensorId)
      }
    }
    return started
  }

  /**
   *
   * @param sensorId
   */
  async disconnectSensor(sensorId: string): Promise<void> {
    const controller = this.controllers.get(sensorId)
    if (!controller) {
      logger.error(`Unknown sensor ID: ${sensorId}`)
      return
    }
    await controller.disconnect()
  }

  /**
   *
   */
  async disconnectAll(): Promise<void> {
    logger.info('Disconnecting all sensors')
    await Promise.all(
      Array.from(this.controllers.values())
        .filter((controller) => controller.getState().runId !== null)
        .map((controller) => controller.disconnect())
    )
  }

  /**
   *
   * @param sensorId
   */
  getSensorController(sensorId: string): SensorController | null {
    return this.controllers.get(sensorId) ?? null
  }

  /**
   *
   */
  getAllSensorIds(): string[] {
    return Array.from(this.controllers.keys())
  }

  /**
   *
   */
  getConnectedSensorIds(): string[] {
    return Array.from(this.controllers.values())
      .filter((controller) => controller.isConnected())
      .map((controller) => controller.sensorId)
  }

  // ==========================================================================
  // Output rate
  // ==========================================================================

  /**
   * Persist the rate and send it to every connected structured-protocol sensor.
   * @param rateHz
   */
  async setOutputRate(rateHz: number): Promise<OutputRateResult> {
    if (!isValidOutputRate(rateHz)) {
      return { success: false, error: `Invalid output rate: ${rateHz} (must be 1-10 Hz)` }
    }
    this.config.setOutputRate(rateHz)

    const applied: string[] = []
    const skipped: string[] = []
    for (const controller of this.controllers.values()) {
      if (!controller.isConnected()) continue
      const result = await controller.setOutputRate(rateHz)
      if (result.success) {
        applied.push(controller.sensorId)
      } else {
        skipped.push(controller.sensorId)
      }
    }

    logger.info(`Output rate ${rateHz} Hz applied to [${applied.join(', ')}], skipped [${skipped.join(', ')}]`)
    return { success: true, applied, skipped }
  }

  // ==========================================================================
  // Export
  // ==========================================================================

  /**
   *
   * @param sensorId
   * @param filePath
   */
  async exportSingleSensorCsv(sensorId: string, filePath: string): Promise<ExportResult> {
    const controller = this.controllers.get(sensorId)
    if (!controller) {
      return { success: false, error: `Unknown sensor ID: ${sensorId}` }
    }
    const readings = controller.getBufferSnapshot()
    logger.info(`Exporting ${readings.length} records from ${sensorId} to ${filePath}`)
    return writeSingleSensorCsv(filePath, readings)
  }

  /**
   * Export the selected sensors (all by default). Sensors without data are left out.
   * @param filePath
   * @param sensorIds
   */
  async exportMultiSensorCsv(filePath: string, sensorIds?: string[]): Promise<ExportResult> {
    const targetIds = sensorIds ?? this.getAllSensorIds()
    if (targetIds.length === 0) {
      return { success: false, error: 'No sensors specified for export' }
    }

    const sensorData = new Map<string, AnemometerReading[]>()
    for (const sensorId of targetIds) {
      const controller = this.controllers.get(sensorId)
      if (!controller) {
        logger.error(`Unknown sensor ID: ${sensorId}`)
        return { success: false, error: `Unknown sensor ID: ${sensorId}` }
      }
      const readings = controller.getBufferSnapshot()
      if (readings.length > 0) {
        sensorData.set(sensorId, readings)
      } else {
        logger.warn(`${sensorId}: No data available`)
      }
    }

    if (sensorData.size === 0) {
      logger.warn('No data available from any selected sensor')
      return { success: false, error: 'No data available from any selected sensor' }
    }

    return writeMultiSensorCsv(filePath, sensorData)
  }

  // ==========================================================================
  // Memory monitor
  // ==========================================================================

  /**
   *
   */
  startMemoryMonitor(): void {
    if (this.memoryTimer) return
    const interval = this.options.memoryCheckIntervalMs ?? MEMORY_CHECK_INTERVAL
    this.memoryTimer = setInterval(() => this.checkMemoryUsage(), interval)
    this.memoryTimer.unref()
    logger.info(`Memory monitor started (interval ${interval}ms)`)
  }

  /**
   *
   */
  stopMemoryMonitor(): void {
    if (this.memoryTimer) {
      clearInterval(this.memoryTimer)
      this.memoryTimer = null
      logger.info('Memory monitor stopped')
    }
  }

  /**
   * Sample RSS and emit 'memory-warning' (MB) above the threshold.
   * @returns current usage in MB
   */
  checkMemoryUsage(): number {
    const memoryMb = this.readMemoryUsage() / (1024 * 1024)
    const threshold = this.options.memoryWarningThresholdMb ?? MEMORY_WARNING_THRESHOLD_MB
    logger.debug(`Memory usage: ${memoryMb.toFixed(1)} MB`)
    if (memoryMb > threshold) {
      logger.warn(`Memory usage exceeded threshold: ${memoryMb.toFixed(1)} MB (threshold: ${threshold} MB)`)
      this.emit('memory-warning', memoryMb)
    }
    return memoryMb
  }

  /**
   * Stop monitoring and disconnect everything.
   */
  async shutdown(): Promise<void> {
    this.stopMemoryMonitor()
    await this.disconnectAll()
  }

  // ==========================================================================
  // Wiring
  // ==========================================================================

  private wireController(controller: SensorController): void {
    for (const event of FORWARDED_EVENTS) {
      controller.on(event, (payload: unknown) => this.emit(event, payload))
    }
    controller.on('error', (payload: unknown) => {
      if (this.listenerCount('error') > 0) {
        this.emit('error', payload)
      }
    })
    controller.on('sensor-info', ({ info }: { sensorId: string; info: SensorInfo }) => {
      const rate = this.config.getOutputRate()
      controller.setOutputRate(rate).then(
        (result) => {
          if (!result.success) {
            logger.warn(`${controller.sensorId}: Output rate not applied: ${result.error}`)
          }
        },
        (error) => logger.error(`${controller.sensorId}: Output rate failed: ${describeError(error)}`)
      )
      logger.info(`${controller.sensorId}: ${info.model ?? 'Sensor'} ready, applying output rate ${rate} Hz`)
    })
  }
}
