/**
 * Input validation for sensor configuration and export paths.
 *
 * Path checks return a result object carrying the normalized value or a readable
 * error, so callers can surface the message without try/catch.
 */

import { extname, normalize } from 'path'

import { OUTPUT_RATE_MAX, OUTPUT_RATE_MIN } from './anemometer-protocol'

export const VALID_BAUD_RATES = [9600, 19200, 38400, 57600, 115200] as const
export const DEFAULT_BAUD_RATE = 115200
export const DEFAULT_OUTPUT_RATE = 5

/** Windows COM ports */
export const RE_COM_PORT = /^COM\d+$/i

/** POSIX serial devices */
export const RE_DEVICE_PATH = /^\/dev\/[\w.-]+(\/[\w.-]+)*$/

export const RE_SENSOR_ID = /^[a-zA-Z0-9_]{1,20}$/

export interface ValidatedPath {
  success: true
  normalizedPath: string
}

export interface PathValidationError {
  success: false
  error: string
}

export type PathValidationResult = ValidatedPath | PathValidationError

/**
 * COM<n> on Windows or a /dev/... device elsewhere.
 * @param port
 */
export function isValidPort(port: string): boolean {
  if (!port) {
    return false
  }
  return RE_COM_PORT.test(port) || RE_DEVICE_PATH.test(port)
}

/**
 *
 * @param baudRate
 */
export function isValidBaudRate(baudRate: number): boolean {
  return VALID_BAUD_RATES.some((valid) => valid === baudRate)
}

/**
 * Output rate in Hz, 1 to 10 inclusive.
 * @param rate
 */
export function isValidOutputRate(rate: number): boolean {
  return Number.isFinite(rate) && rate >= OUTPUT_RATE_MIN && rate <= OUTPUT_RATE_MAX
}

/**
 *
 * @param sensorId
 */
export function isValidSensorId(sensorId: string): boolean {
  return RE_SENSOR_ID.test(sensorId)
}

/**
 * Validate an export target.
 *
 * Rules:
 * - Must not be empty
 * - No `..` segment anywhere in the path
 * - Extension must be .csv (any case)
 *
 * @param filePath
 * @example
 * ```typescript
 * const result = validateCsvPath('/data/run1.csv')
 * if (!result.success) console.error(result.error)
 * ```
 */
export function validateCsvPath(filePath: string): PathValidationResult {
  if (!filePath || filePath.trim() === '') {
    return { success: false, error: 'File path is empty' }
  }

  const segments = filePath.split(/[\\/]+/)
  if (segments.includes('..')) {
    return { success: false, error: 'Path contains invalid traversal (..)' }
  }

  if (extname(filePath).toLowerCase() !== '.csv') {
    return { success: false, error: 'File must have .csv extension' }
  }

  return { success: true, normalizedPath: normalize(filePath) }
}
