import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { ConfigStore, DEFAULT_CONFIG_DIRECTORY, SENSOR_IDS } from '../src/services/config-store'

describe('ConfigStore', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'windlink-config-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should keep the default config beside the logs in ~/.windlink', () => {
    expect(DEFAULT_CONFIG_DIRECTORY).toBe(path.join(os.homedir(), '.windlink'))
  })

  it('should start with defaults for the four sensors', () => {
    const store = new ConfigStore(tempDir)

    expect(store.getSensorIds()).toEqual([...SENSOR_IDS])
    expect(store.getSensorConfig('Sensor1')).toEqual({ port: '', baudRate: 115200, initCommands: [] })
    expect(store.getOutputRate()).toBe(5)
    expect(store.path).toBe(path.join(tempDir, 'config.json'))
  })

  it('should persist sensor settings across instances', () => {
    const store = new ConfigStore(tempDir)
    store.setSensorConfig('Sensor2', { port: '/dev/ttyUSB1', baudRate: 38400, initCommands: ['rate 10'] })
    store.setOutputRate(8)
    store.setExportDirectory('/data/exports')

    const reopened = new ConfigStore(tempDir)
    expect(reopened.getSensorConfig('Sensor2')).toEqual({
      port: '/dev/ttyUSB1',
      baudRate: 38400,
      initCommands: ['rate 10'],
    })
    expect(reopened.getOutputRate()).toBe(8)
    expect(reopened.getExportDirectory()).toBe('/data/exports')
  })

  it('should list extra sensor ids after the defaults, sorted', () => {
    const store = new ConfigStore(tempDir)
    store.setSensorConfig('Mast', { port: 'COM4', baudRate: 115200, initCommands: [] })

    expect(store.getSensorIds()).toEqual(['Mast', 'Sensor1', 'Sensor2', 'Sensor3', 'Sensor4'])
  })

  it('should return defaults for an unknown sensor', () => {
    const store = new ConfigStore(tempDir)

    expect(store.getSensorConfig('Nowhere')).toEqual({ port: '', baudRate: 115200, initCommands: [] })
  })

  it('should hand out copies of saved init commands', () => {
    const store = new ConfigStore(tempDir)
    store.setSensorConfig('Sensor1', { port: 'COM3', baudRate: 115200, initCommands: ['a'] })

    store.getSensorConfig('Sensor1').initCommands.push('b')

    expect(store.getSensorConfig('Sensor1').initCommands).toEqual(['a'])
  })

  it('should reject values outside the schema', () => {
    const store = new ConfigStore(tempDir)

    expect(() => store.setOutputRate(20)).toThrow()
    expect(store.getOutputRate()).toBe(5)
  })

  it('should fall back to defaults when the file is corrupt', () => {
    fs.writeFileSync(path.join(tempDir, 'config.json'), '{ not json')

    const store = new ConfigStore(tempDir)

    expect(store.getOutputRate()).toBe(5)
  })

  it('should restore defaults on reset', () => {
    const store = new ConfigStore(tempDir)
    store.setOutputRate(2)
    store.reset()

    expect(store.getOutputRate()).toBe(5)
  })
})
