import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { WorkerState } from '../src/services/anemometer-worker'
import type { SensorErrorEvent, SensorLinkConfig, SensorStatusEvent } from '../src/types/anemometer'
import {
  FAST_CONTROLLER_OPTIONS,
  installStructuredResponder,
  TestSensorController,
  type TestWorker,
  VALID_LINE,
} from './mocks/mock-serial-link'
import { makeReading } from './mocks/readings'

const CONFIG: SensorLinkConfig = { port: '/dev/ttyUSB0', baudRate: 115200, initCommands: [] }

describe('SensorController', () => {
  let controller: TestSensorController
  let statuses: boolean[]
  let errors: string[]

  const waitForReading = (worker: TestWorker | undefined): Promise<void> =>
    vi.waitFor(() => expect(worker?.getState()).toBe(WorkerState.READING), { timeout: 2000, interval: 5 })

  beforeEach(() => {
    controller = new TestSensorController('Sensor1', CONFIG, FAST_CONTROLLER_OPTIONS)
    statuses = []
    errors = []
    controller.on('status', (event: SensorStatusEvent) => statuses.push(event.connected))
    controller.on('error', (event: SensorErrorEvent) => errors.push(event.message))
  })

  afterEach(async () => {
    await controller.disconnect()
  })

  describe('connect', () => {
    it('should refuse to connect without a port', () => {
      const unconfigured = new TestSensorController('Sensor2', { ...CONFIG, port: '' }, FAST_CONTROLLER_OPTIONS)

      expect(unconfigured.connect()).toEqual({ success: false, error: 'No port configured' })
      expect(unconfigured.workers).toHaveLength(0)
    })

    it('should start a worker and report the connection', async () => {
      expect(controller.connect()).toEqual({ success: true })
      await waitForReading(controller.workers[0])

      const state = controller.getState()
      expect(state.connected).toBe(true)
      expect(state.runId).toBe(controller.workers[0].runId)
      expect(state.protocol).toEqual({ kind: 'unknown' })
      expect(statuses).toEqual([true])
    })

    it('should refuse a second connect while the worker runs', () => {
      controller.connect()

      expect(controller.connect()).toEqual({ success: false, error: 'Already connected' })
      expect(controller.workers).toHaveLength(1)
    })

    it('should buffer and forward readings', async () => {
      const forwarded: number[] = []
      controller.on('reading', (reading: { speed2d: number }) => forwarded.push(reading.speed2d))
      controller.connect()
      await waitForReading(controller.workers[0])

      controller.links[0].simulateData(VALID_LINE)
      await vi.waitFor(() => expect(controller.buffer.size).toBe(1))

      expect(forwarded).toEqual([1.5])
      expect(controller.getLatestReading()?.temperature).toBe(20.25)
      expect(controller.getBufferSnapshot()).toHaveLength(1)
    })
  })

  describe('isRunning', () => {
    it('should follow the worker from connect to disconnect', async () => {
      expect(controller.isRunning()).toBe(false)

      controller.connect()
      expect(controller.isRunning()).toBe(true)
      await waitForReading(controller.workers[0])

      await controller.disconnect()
      expect(controller.isRunning()).toBe(false)
    })
  })

  describe('disconnect', () => {
    it('should stop the worker and report disconnected', async () => {
      controller.connect()
      await waitForReading(controller.workers[0])

      await controller.disconnect()

      expect(statuses).toEqual([true, false])
      expect(controller.getState()).toMatchObject({ connected: false, runId: null, reconnectAttempts: 0 })
      expect(controller.links[0].isOpen).toBe(false)
      expect(controller.workers).toHaveLength(1)
    })

    it('should allow reconnecting after a disconnect', async () => {
      controller.connect()
      await waitForReading(controller.workers[0])
      await controller.disconnect()

      expect(controller.connect()).toEqual({ success: true })
      await waitForReading(controller.workers[1])
      expect(controller.isConnected()).toBe(true)
    })
  })

  describe('reconnection', () => {
    it('should start a new worker after the link fails', async () => {
      const scheduled: Array<{ attempt: number; delayMs: number }> = []
      controller.on('reconnect-scheduled', ({ attempt, delayMs }: { attempt: number; delayMs: number }) =>
        scheduled.push({ attempt, delayMs })
      )
      controller.connect()
      await waitForReading(controller.workers[0])

      controller.links[0].simulateError(new Error('unplugged'))
      await waitForReading(controller.workers[1])

      expect(scheduled).toEqual([{ attempt: 1, delayMs: 10 }])
      expect(errors).toEqual(['Serial error reading data: Serial link error: unplugged'])
      expect(statuses).toEqual([true, false, true])
      expect(controller.getState()).toMatchObject({ connected: true, reconnectAttempts: 0 })
      expect(controller.getState().runId).toBe(controller.workers[1].runId)
    })

    it('should ignore events from a replaced worker', async () => {
      controller.connect()
      await waitForReading(controller.workers[0])
      controller.links[0].simulateError(new Error('unplugged'))
      await waitForReading(controller.workers[1])

      controller.workers[0].emit('reading', makeReading('Sensor1', 1))
      controller.workers[0].emit('connection-status', false)

      expect(controller.buffer.size).toBe(0)
      expect(controller.isConnected()).toBe(true)
    })

    it('should give up after four failed attempts', async () => {
      const scheduled: number[] = []
      let exhausted: number | null = null
      controller.prepareLink = (link) => {
        link.openError = new Error('busy')
      }
      controller.on('reconnect-scheduled', ({ delayMs }: { delayMs: number }) => scheduled.push(delayMs))
      controller.on('reconnect-exhausted', ({ attempts }: { attempts: number }) => {
        exhausted = attempts
      })

      controller.connect()
      await vi.waitFor(() => expect(exhausted).toBe(4), { timeout: 3000, interval: 10 })

      expect(scheduled).toEqual([10, 20, 40, 80])
      expect(controller.workers).toHaveLength(5)
      expect(statuses).toEqual([false, false, false, false, false])
      expect(controller.getState()).toMatchObject({
        connected: false,
        reconnectAttempts: 4,
        lastError: 'Max reconnection attempts (4) reached',
      })
    })

    it('should not reconnect after an explicit disconnect', async () => {
      controller.connect()
      await waitForReading(controller.workers[0])

      await controller.disconnect()
      await new Promise((resolve) => setTimeout(resolve, 50))

      expect(controller.workers).toHaveLength(1)
    })
  })

  describe('structured commands', () => {
    it('should reject commands for sensors without the structured protocol', async () => {
      controller.connect()
      await waitForReading(controller.workers[0])

      expect(await controller.setOutputRate(5)).toEqual({
        success: false,
        error: 'Sensor does not use the structured protocol',
      })
      expect(await controller.setOutputRate(0)).toEqual({
        success: false,
        error: 'Invalid output rate: 0 (must be 1-10 Hz)',
      })
    })

    it('should send output rate, tag and save commands to structured sensors', async () => {
      controller.prepareLink = installStructuredResponder
      controller.connect()
      await waitForReading(controller.workers[0])

      expect(controller.getState().protocol.kind).toBe('structured')
      expect(controller.getSensorInfo()?.serialNumber).toBe('TSM-0042')

      expect(await controller.setOutputRate(5)).toEqual({ success: true })
      expect(await controller.enableTaggedOutput('PI')).toEqual({ success: true })
      expect(await controller.saveDeviceSettings()).toEqual({ success: true })
      expect(controller.links[0].writtenText()).toBe(
        '{json}{version}{settings}{outputrate 5}{set Display.PI.Tagged true}{save}'
      )
    })

    it('should fail to send a raw command without a worker', async () => {
      expect(await controller.sendCommand('{save}')).toBe(false)
    })
  })

  describe('updateConfig', () => {
    it('should clear the buffer when the port changes', () => {
      controller.buffer.append(makeReading('Sensor1', 1))

      controller.updateConfig({ ...CONFIG, initCommands: ['rate 10'] })
      expect(controller.buffer.size).toBe(1)

      controller.updateConfig({ ...CONFIG, port: '/dev/ttyUSB1' })
      expect(controller.buffer.size).toBe(0)
      expect(controller.getConfig().port).toBe('/dev/ttyUSB1')
    })

    it('should clear the buffer on request', () => {
      controller.buffer.append(makeReading('Sensor1', 1))
      controller.clearBuffer()

      expect(controller.getLatestReading()).toBeNull()
    })
  })
})
