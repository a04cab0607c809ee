// * CSV export for single-sensor buffers and time-aligned multi-sensor sets.
// * Files carry a UTF-8 BOM and CRLF line endings so spreadsheet tools open them directly.
// * WRITE PATTERN: content goes to <path>.tmp first, then is renamed over the target.

import * as fs from 'fs/promises'
import * as path from 'path'

import type { AnemometerReading } from '../types/anemometer'
import { describeError } from './anemometer-protocol'
import { formatTimestamp, readingToCsvFields } from './anemometer-reading'
import { createLogger } from './log-service'
import { synchronizeReadings, SYNC_TOLERANCE_MS } from './sensor-synchronizer'
import { validateCsvPath } from './validators'

const logger = createLogger('CsvExporter')

// ============================================================================
// Constants
// ============================================================================

export const UTF8_BOM = '\uFEFF'
export const CSV_LINE_ENDING = '\r\n'
export const MISSING_VALUE = 'N/A'

export const CHANNEL_COLUMNS = ['S', 'D', 'U', 'V', 'W', 'T', 'PI', 'RO'] as const
export const SINGLE_SENSOR_HEADER = ['Timestamp', 'Sensor_ID', ...CHANNEL_COLUMNS]

// ============================================================================
// Type Definitions
// ============================================================================

export interface ExportSuccess {
  success: true
  filePath: string
  rowCount: number
  message: string
}

export interface ExportFailure {
  success: false
  error: string
}

export type ExportResult = ExportSuccess | ExportFailure

// ============================================================================
// Helpers
// ============================================================================

// Minimal quoting: only fields containing a delimiter, quote or line break.
const escapeField = (field: string): string => (/[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field)

const toLine = (fields: readonly string[]): string => fields.map(escapeField).join(',')

/**
 * Column names for the multi-sensor layout.
 * @param sensorIds - already sorted
 */
export function buildMultiSensorHeader(sensorIds: readonly string[]): string[] {
  const header = ['Timestamp']
  for (const id of sensorIds) {
    header.push(`${id}_ID`, ...CHANNEL_COLUMNS.map((column) => `${id}_${column}`))
  }
  return header
}

/**
 * Map a file-system failure to a readable cause.
 * @param error
 */
export function describeWriteError(error: unknown): string {
  const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined
  if (code === 'ENOSPC') {
    return 'Disk full - insufficient space to write file'
  }
  if (code === 'EACCES' || code === 'EPERM') {
    return 'Permission denied - cannot write to file'
  }
  return `File write error: ${describeError(error)}`
}

// * Atomic write: tmp file then rename. Parents are created on demand.
async function writeCsvFile(filePath: string, lines: string[]): Promise<void> {
  const tmpPath = filePath + '.tmp'
  const content = UTF8_BOM + lines.join(CSV_LINE_ENDING) + CSV_LINE_ENDING

  await fs.mkdir(path.dirname(filePath), { recursive: true })
  try {
    await fs.writeFile(tmpPath, content, 'utf-8')
    await fs.rename(tmpPath, filePath)
  } catch (error) {
    await fs.rm(tmpPath, { force: true }).catch((cleanupError) => {
      logger.warn(`Could not remove ${tmpPath}: ${describeError(cleanupError)}`)
    })
    throw error
  }
}

// ============================================================================
// Exports
// ============================================================================

/**
 * Write one sensor's readings, one row per reading in the given order.
 * @param filePath
 * @param readings
 */
export async function writeSingleSensorCsv(
  filePath: string,
  readings: readonly AnemometerReading[]
): Promise<ExportResult> {
  const validation = validateCsvPath(filePath)
  if (!validation.success) {
    logger.error(`Invalid filepath: ${validation.error}`)
    return { success: false, error: validation.error }
  }

  if (readings.length === 0) {
    logger.warn('No data to write')
    return { success: false, error: 'No data to write' }
  }

  const lines = [toLine(SINGLE_SENSOR_HEADER)]
  for (const reading of readings) {
    lines.push(toLine([formatTimestamp(reading.timestamp), ...readingToCsvFields(reading)]))
  }

  try {
    await writeCsvFile(validation.normalizedPath, lines)
  } catch (error) {
    const message = describeWriteError(error)
    logger.error(message)
    return { success: false, error: message }
  }

  logger.info(`Wrote ${readings.length} records to ${validation.normalizedPath}`)
  return {
    success: true,
    filePath: validation.normalizedPath,
    rowCount: readings.length,
    message: `Successfully wrote ${readings.length} records`,
  }
}

/**
 * Write several sensors aligned on the union of their timestamps.
 * Sensors are laid out in sorted id order; a sensor without a reading inside the
 * tolerance gets N/A in all nine of its columns.
 * @param filePath
 * @param sensorData - sensor id → readings
 * @param toleranceMs
 */
export async function writeMultiSensorCsv(
  filePath: string,
  sensorData: ReadonlyMap<string, readonly AnemometerReading[]>,
  toleranceMs: number = SYNC_TOLERANCE_MS
): Promise<ExportResult> {
  const validation = validateCsvPath(filePath)
  if (!validation.success) {
    logger.error(`Invalid filepath: ${validation.error}`)
    return { success: false, error: validation.error }
  }

  if (sensorData.size === 0 || Array.from(sensorData.values()).every((readings) => readings.length === 0)) {
    logger.warn('No data to write')
    return { success: false, error: 'No data to write' }
  }

  const rows = synchronizeReadings(sensorData, toleranceMs)
  const sensorIds = Array.from(sensorData.keys()).sort()

  const lines = [toLine(buildMultiSensorHeader(sensorIds))]
  for (const row of rows) {
    const fields = [formatTimestamp(row.timestamp)]
    for (const id of sensorIds) {
      const reading = row.readings.get(id)
      if (reading) {
        fields.push(...readingToCsvFields(reading))
      } else {
        fields.push(...Array<string>(CHANNEL_COLUMNS.length + 1).fill(MISSING_VALUE))
      }
    }
    lines.push(toLine(fields))
  }

  try {
    await writeCsvFile(validation.normalizedPath, lines)
  } catch (error) {
    const message = describeWriteError(error)
    logger.error(message)
    return { success: false, error: message }
  }

  logger.info(`Wrote ${rows.length} synchronized rows for ${sensorIds.length} sensors to ${validation.normalizedPath}`)
  return {
    success: true,
    filePath: validation.normalizedPath,
    rowCount: rows.length,
    message: `Successfully wrote ${rows.length} synchronized records`,
  }
}
