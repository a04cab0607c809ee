import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import {
  buildMultiSensorHeader,
  describeWriteError,
  writeMultiSensorCsv,
  writeSingleSensorCsv,
} from '../src/services/csv-exporter'
import { makeReading } from './mocks/readings'

const T0 = new Date(2024, 0, 1, 12, 0, 0, 123).getTime()
const ROW_VALUES = '1.50,90.00,0.50,-0.50,0.10,20.25,0.00,0.00'
const MISSING = Array(9).fill('N/A').join(',')

describe('CSV export', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'windlink-csv-'))
  })

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  describe('writeSingleSensorCsv', () => {
    it('should write a BOM, header and one CRLF row per reading', async () => {
      const filePath = path.join(tempDir, 'single.csv')

      const result = await writeSingleSensorCsv(filePath, [
        makeReading('Sensor1', T0),
        makeReading('Sensor1', T0 + 200, { isValid: false, temperature: -99.9 }),
      ])

      expect(result).toEqual({
        success: true,
        filePath,
        rowCount: 2,
        message: 'Successfully wrote 2 records',
      })
      const content = await fs.readFile(filePath, 'utf-8')
      expect(content).toBe(
        '\uFEFFTimestamp,Sensor_ID,S,D,U,V,W,T,PI,RO\r\n' +
          `2024-01-01 12:00:00.123,Sensor1,${ROW_VALUES}\r\n` +
          '2024-01-01 12:00:00.323,Sensor1,1.50,90.00,0.50,-0.50,0.10,-99.90,0.00,0.00\r\n'
      )
    })

    it('should create missing parent directories and leave no temp file', async () => {
      const filePath = path.join(tempDir, 'nested', 'run', 'out.csv')

      const result = await writeSingleSensorCsv(filePath, [makeReading('Sensor1', T0)])

      expect(result.success).toBe(true)
      expect(await fs.readdir(path.dirname(filePath))).toEqual(['out.csv'])
    })

    it('should refuse an empty reading list', async () => {
      const result = await writeSingleSensorCsv(path.join(tempDir, 'empty.csv'), [])

      expect(result).toEqual({ success: false, error: 'No data to write' })
    })

    it('should refuse a path without the csv extension', async () => {
      const result = await writeSingleSensorCsv(path.join(tempDir, 'out.txt'), [makeReading('Sensor1', T0)])

      expect(result).toEqual({ success: false, error: 'File must have .csv extension' })
    })

    it('should report a write failure when the target is a directory', async () => {
      const filePath = path.join(tempDir, 'taken.csv')
      await fs.mkdir(filePath)

      const result = await writeSingleSensorCsv(filePath, [makeReading('Sensor1', T0)])

      expect(result.success).toBe(false)
      expect(await fs.readdir(tempDir)).toEqual(['taken.csv'])
    })
  })

  describe('writeMultiSensorCsv', () => {
    it('should align sensors and fill gaps with N/A', async () => {
      const filePath = path.join(tempDir, 'multi.csv')
      const data = new Map([
        ['Sensor2', [makeReading('Sensor2', T0 + 300)]],
        ['Sensor1', [makeReading('Sensor1', T0), makeReading('Sensor1', T0 + 1000)]],
      ])

      const result = await writeMultiSensorCsv(filePath, data)

      expect(result).toEqual({
        success: true,
        filePath,
        rowCount: 3,
        message: 'Successfully wrote 3 synchronized records',
      })
      const lines = (await fs.readFile(filePath, 'utf-8')).split('\r\n')
      expect(lines).toEqual([
        '\uFEFFTimestamp,Sensor1_ID,Sensor1_S,Sensor1_D,Sensor1_U,Sensor1_V,Sensor1_W,Sensor1_T,Sensor1_PI,Sensor1_RO,' +
          'Sensor2_ID,Sensor2_S,Sensor2_D,Sensor2_U,Sensor2_V,Sensor2_W,Sensor2_T,Sensor2_PI,Sensor2_RO',
        `2024-01-01 12:00:00.123,Sensor1,${ROW_VALUES},Sensor2,${ROW_VALUES}`,
        `2024-01-01 12:00:00.423,Sensor1,${ROW_VALUES},Sensor2,${ROW_VALUES}`,
        `2024-01-01 12:00:01.123,Sensor1,${ROW_VALUES},${MISSING}`,
        '',
      ])
    })

    it('should refuse input with no readings at all', async () => {
      const result = await writeMultiSensorCsv(path.join(tempDir, 'multi.csv'), new Map([['Sensor1', []]]))

      expect(result).toEqual({ success: false, error: 'No data to write' })
    })

    it('should refuse a traversal path', async () => {
      const result = await writeMultiSensorCsv('../escape.csv', new Map([['Sensor1', [makeReading('Sensor1', T0)]]]))

      expect(result).toEqual({ success: false, error: 'Path contains invalid traversal (..)' })
    })
  })

  describe('helpers', () => {
    it('should prefix every channel column with the sensor id', () => {
      expect(buildMultiSensorHeader(['A'])).toEqual(['Timestamp', 'A_ID', 'A_S', 'A_D', 'A_U', 'A_V', 'A_W', 'A_T', 'A_PI', 'A_RO'])
    })

    it('should describe common write failures', () => {
      expect(describeWriteError(Object.assign(new Error('nope'), { code: 'ENOSPC' }))).toBe(
        'Disk full - insufficient space to write file'
      )
      expect(describeWriteError(Object.assign(new Error('nope'), { code: 'EACCES' }))).toBe(
        'Permission denied - cannot write to file'
      )
      expect(describeWriteError(new Error('boom'))).toBe('File write error: boom')
    })
  })
})
