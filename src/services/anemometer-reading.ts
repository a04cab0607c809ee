// * Reading construction and formatting.
// * Readings are frozen at construction; validity is derived once from the eight channels.

import type { AnemometerReading, ParsedFields } from '../types/anemometer'
import { InvalidReadingError, isErrorValue, REQUIRED_TAGS } from './anemometer-protocol'

/**
 * Build an immutable reading from a validated field map.
 * PI and RO default to 0 when the line did not carry them.
 * @param sensorId
 * @param fields
 * @param timestamp - epoch ms, receipt time
 * @throws {InvalidReadingError} when a required tag is missing
 */
export function createReading(sensorId: string, fields: ParsedFields, timestamp: number = Date.now()): AnemometerReading {
  const required = (tag: (typeof REQUIRED_TAGS)[number]): number => {
    const value = fields.get(tag)
    if (value === undefined) {
      throw new InvalidReadingError(`Missing required tag ${tag}`)
    }
    return value
  }

  const speed2d = required('S')
  const direction = required('D')
  const u = required('U')
  const v = required('V')
  const w = required('W')
  const temperature = required('T')
  const pitch = fields.get('PI') ?? 0
  const roll = fields.get('RO') ?? 0

  const channels = [speed2d, direction, u, v, w, temperature, pitch, roll]

  return Object.freeze({
    timestamp,
    sensorId,
    speed2d,
    direction,
    u,
    v,
    w,
    temperature,
    pitch,
    roll,
    isValid: !channels.some(isErrorValue),
  })
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0')

/**
 * Local wall-clock time as "YYYY-MM-DD HH:mm:ss.SSS".
 * @param timestamp - epoch ms
 */
export function formatTimestamp(timestamp: number): string {
  const date = new Date(timestamp)
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`
  )
}

/**
 * Channel values in export column order: S, D, U, V, W, T, PI, RO.
 * @param reading
 */
export function readingChannels(reading: AnemometerReading): number[] {
  return [
    reading.speed2d,
    reading.direction,
    reading.u,
    reading.v,
    reading.w,
    reading.temperature,
    reading.pitch,
    reading.roll,
  ]
}

/**
 * Sensor id followed by the eight channels fixed to two decimals.
 * @param reading
 */
export function readingToCsvFields(reading: AnemometerReading): string[] {
  return [reading.sensorId, ...readingChannels(reading).map((value) => value.toFixed(2))]
}
