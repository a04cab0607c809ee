// * Multi-sensor time alignment.
// * The row axis is the sorted union of every reading timestamp. Each axis timestamp takes, per sensor,
// * the nearest reading within the tolerance; a reading may fill several rows.

import type { AnemometerReading } from '../types/anemometer'

/** ±0.5 s */
export const SYNC_TOLERANCE_MS = 500

/**
 * One aligned row. `readings` holds every requested sensor id in sorted order;
 * null marks a sensor with no reading inside the tolerance.
 */
export interface SynchronizedRow {
  timestamp: number
  readings: Map<string, AnemometerReading | null>
}

/**
 * Sorted, de-duplicated union of all reading timestamps.
 * @param sensorData
 */
export function buildTimestampAxis(sensorData: ReadonlyMap<string, readonly AnemometerReading[]>): number[] {
  const all = new Set<number>()
  for (const readings of sensorData.values()) {
    for (const reading of readings) {
      all.add(reading.timestamp)
    }
  }
  return Array.from(all).sort((a, b) => a - b)
}

// First index whose timestamp is strictly greater than target.
const upperBound = (sorted: readonly AnemometerReading[], target: number): number => {
  let lo = 0
  let hi = sorted.length
  while (lo < hi) {
    const mid = (lo + hi) >>> 1
    if (sorted[mid].timestamp <= target) {
      lo = mid + 1
    } else {
      hi = mid
    }
  }
  return lo
}

/**
 * Nearest reading to targetTime within toleranceMs. On equal distance the later reading wins.
 * @param sorted - readings ordered by timestamp
 * @param targetTime
 * @param toleranceMs
 */
export function findNearestReading(
  sorted: readonly AnemometerReading[],
  targetTime: number,
  toleranceMs: number = SYNC_TOLERANCE_MS
): AnemometerReading | null {
  if (sorted.length === 0) return null

  const idx = upperBound(sorted, targetTime)
  const candidates: AnemometerReading[] = []

  // Last reading at or before the target
  if (idx > 0) {
    candidates.push(sorted[idx - 1])
  }
  // Last reading sharing the first timestamp after the target
  if (idx < sorted.length) {
    candidates.push(sorted[upperBound(sorted, sorted[idx].timestamp) - 1])
  }

  let nearest: AnemometerReading | null = null
  let bestDiff = toleranceMs
  for (const candidate of candidates) {
    const diff = Math.abs(candidate.timestamp - targetTime)
    if (diff <= bestDiff) {
      bestDiff = diff
      nearest = candidate
    }
  }
  return nearest
}

/**
 * Align several sensors onto one timestamp axis.
 * @param sensorData - sensor id → readings (any order)
 * @param toleranceMs
 */
export function synchronizeReadings(
  sensorData: ReadonlyMap<string, readonly AnemometerReading[]>,
  toleranceMs: number = SYNC_TOLERANCE_MS
): SynchronizedRow[] {
  const sensorIds = Array.from(sensorData.keys()).sort()
  const sortedBySensor = new Map<string, AnemometerReading[]>()
  for (const id of sensorIds) {
    const readings = sensorData.get(id) ?? []
    sortedBySensor.set(
      id,
      [...readings].sort((a, b) => a.timestamp - b.timestamp)
    )
  }

  return buildTimestampAxis(sensorData).map((timestamp) => {
    const readings = new Map<string, AnemometerReading | null>()
    for (const id of sensorIds) {
      readings.set(id, findNearestReading(sortedBySensor.get(id) ?? [], timestamp, toleranceMs))
    }
    return { timestamp, readings }
  })
}
