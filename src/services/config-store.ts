import Conf, { type Schema } from 'conf'
import { homedir } from 'os'
import { join } from 'path'

import type { SensorLinkConfig } from '../types/anemometer'
import { createLogger } from './log-service'
import { DEFAULT_BAUD_RATE, DEFAULT_OUTPUT_RATE, VALID_BAUD_RATES } from './validators'

const logger = createLogger('ConfigStore')

export const SENSOR_IDS = ['Sensor1', 'Sensor2', 'Sensor3', 'Sensor4'] as const

/** Home of config.json and the logs directory */
export const DEFAULT_CONFIG_DIRECTORY = join(homedir(), '.windlink')

/**
 * Persisted application configuration
 */
export interface WindlinkConfigSchema {
  /**
   * Link parameters per sensor id
   */
  sensors: Record<string, SensorLinkConfig>
  /**
   * Output rate (Hz) pushed to structured-protocol sensors on connect
   */
  outputRate: number
  /**
   * Default directory for CSV exports
   */
  exportDirectory: string
}

const windlinkConfigSchema: Schema<WindlinkConfigSchema> = {
  sensors: {
    type: 'object',
    additionalProperties: {
      type: 'object',
      properties: {
        port: {
          type: 'string',
        },
        baudRate: {
          type: 'number',
          enum: [...VALID_BAUD_RATES],
        },
        initCommands: {
          type: 'array',
          items: { type: 'string' },
        },
      },
      required: ['port', 'baudRate', 'initCommands'],
    },
  },
  outputRate: {
    type: 'number',
    minimum: 1,
    maximum: 10,
  },
  exportDirectory: {
    type: 'string',
  },
}

/**
 *
 */
export const defaultSensorConfig = (): SensorLinkConfig => ({
  port: '',
  baudRate: DEFAULT_BAUD_RATE,
  initCommands: [],
})

const defaultConfig = (): WindlinkConfigSchema => ({
  sensors: Object.fromEntries(SENSOR_IDS.map((id) => [id, defaultSensorConfig()])),
  outputRate: DEFAULT_OUTPUT_RATE,
  exportDirectory: join(homedir(), 'windlink-exports'),
})

/**
 * Typed view over the persisted configuration.
 */
export class ConfigStore {
  private readonly store: Conf<WindlinkConfigSchema>

  /**
   * @param cwd - directory holding config.json; defaults to the per-user config directory
   */
  constructor(cwd?: string) {
    this.store = new Conf<WindlinkConfigSchema>({
      projectName: 'windlink',
      cwd,
      configName: 'config',
      schema: windlinkConfigSchema,
      defaults: defaultConfig(),
      clearInvalidConfig: true,
    })
    logger.info(`Configuration loaded from ${this.store.path}`)
  }

  /**
   * Config for one sensor, filled with defaults when never saved.
   * @param sensorId
   */
  getSensorConfig(sensorId: string): SensorLinkConfig {
    const saved = this.store.get('sensors')[sensorId]
    return saved ? { ...saved, initCommands: [...saved.initCommands] } : defaultSensorConfig()
  }

  /**
   *
   * @param sensorId
   * @param config
   */
  setSensorConfig(sensorId: string, config: SensorLinkConfig): void {
    const sensors = { ...this.store.get('sensors'), [sensorId]: config }
    this.store.set('sensors', sensors)
  }

  /**
   * Every known sensor id (the four defaults plus any saved extras), sorted.
   */
  getSensorIds(): string[] {
    const ids = new Set<string>([...SENSOR_IDS, ...Object.keys(this.store.get('sensors'))])
    return Array.from(ids).sort()
  }

  /**
   *
   */
  getOutputRate(): number {
    return this.store.get('outputRate')
  }

  /**
   *
   * @param rateHz
   */
  setOutputRate(rateHz: number): void {
    this.store.set('outputRate', rateHz)
  }

  /**
   *
   */
  getExportDirectory(): string {
    return this.store.get('exportDirectory')
  }

  /**
   *
   * @param directory
   */
  setExportDirectory(directory: string): void {
    this.store.set('exportDirectory', directory)
  }

  /**
   * Absolute path of the backing file.
   */
  get path(): string {
    return this.store.path
  }

  /**
   * Restore defaults.
   */
  reset(): void {
    this.store.clear()
  }
}

let storeInstance: ConfigStore | null = null

/**
 * Get the shared config store (lazy initialization).
 */
export function getConfigStore(): ConfigStore {
  if (!storeInstance) {
    storeInstance = new ConfigStore(DEFAULT_CONFIG_DIRECTORY)
  }
  return storeInstance
}
