import { describe, expect, it } from 'vitest'

import { BoundedReadingBuffer, DEFAULT_BUFFER_CAPACITY } from '../src/services/reading-buffer'
import { makeReading } from './mocks/readings'

describe('BoundedReadingBuffer', () => {
  it('should default to 200000 readings', () => {
    expect(new BoundedReadingBuffer().capacity).toBe(DEFAULT_BUFFER_CAPACITY)
    expect(DEFAULT_BUFFER_CAPACITY).toBe(200_000)
  })

  it('should reject a non-positive capacity', () => {
    expect(() => new BoundedReadingBuffer(0)).toThrow(RangeError)
    expect(() => new BoundedReadingBuffer(2.5)).toThrow(RangeError)
  })

  it('should return null from latest when empty', () => {
    const buffer = new BoundedReadingBuffer(3)

    expect(buffer.latest()).toBeNull()
    expect(buffer.snapshot()).toEqual([])
    expect(buffer.size).toBe(0)
  })

  it('should keep readings oldest first below capacity', () => {
    const buffer = new BoundedReadingBuffer(3)
    buffer.append(makeReading('Sensor1', 1))
    buffer.append(makeReading('Sensor1', 2))

    expect(buffer.snapshot().map((r) => r.timestamp)).toEqual([1, 2])
    expect(buffer.latest()?.timestamp).toBe(2)
    expect(buffer.size).toBe(2)
  })

  it('should evict the oldest reading once full', () => {
    const buffer = new BoundedReadingBuffer(3)
    for (let t = 1; t <= 5; t++) {
      buffer.append(makeReading('Sensor1', t))
    }

    expect(buffer.size).toBe(3)
    expect(buffer.snapshot().map((r) => r.timestamp)).toEqual([3, 4, 5])
    expect(buffer.latest()?.timestamp).toBe(5)
  })

  it('should keep the last 200000 of 200001 readings in order', () => {
    const buffer = new BoundedReadingBuffer()
    for (let t = 0; t <= DEFAULT_BUFFER_CAPACITY; t++) {
      buffer.append(makeReading('Sensor1', t))
    }

    const snapshot = buffer.snapshot()
    expect(snapshot).toHaveLength(DEFAULT_BUFFER_CAPACITY)
    expect(snapshot[0].timestamp).toBe(1)
    expect(snapshot[snapshot.length - 1].timestamp).toBe(DEFAULT_BUFFER_CAPACITY)
    expect(snapshot.every((reading, i) => reading.timestamp === i + 1)).toBe(true)
  })

  it('should return an independent copy from snapshot', () => {
    const buffer = new BoundedReadingBuffer(3)
    buffer.append(makeReading('Sensor1', 1))
    const snapshot = buffer.snapshot()
    buffer.append(makeReading('Sensor1', 2))

    expect(snapshot).toHaveLength(1)
  })

  it('should empty on clear and accept new readings afterwards', () => {
    const buffer = new BoundedReadingBuffer(2)
    buffer.append(makeReading('Sensor1', 1))
    buffer.append(makeReading('Sensor1', 2))
    buffer.append(makeReading('Sensor1', 3))
    buffer.clear()

    expect(buffer.size).toBe(0)
    expect(buffer.latest()).toBeNull()

    buffer.append(makeReading('Sensor1', 4))
    expect(buffer.snapshot().map((r) => r.timestamp)).toEqual([4])
  })
})
