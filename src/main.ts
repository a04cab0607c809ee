import { join } from 'path'

import { AppController } from './services/app-controller'
import { describeError } from './services/anemometer-protocol'
import { DEFAULT_CONFIG_DIRECTORY, getConfigStore } from './services/config-store'
import { createLogger, type LogLevel, setupLogService } from './services/log-service'
import type { SensorErrorEvent, SensorProgressEvent, SensorStatusEvent } from './types/anemometer'

// Setup the logger service as soon as possible to avoid different behaviors across runtime
const logLevels: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly']
const requestedLevel = logLevels.find((level) => level === process.env.WINDLINK_LOG_LEVEL)
setupLogService({ level: requestedLevel ?? 'info', logDirectory: join(DEFAULT_CONFIG_DIRECTORY, 'logs') })

const store = getConfigStore()

const logger = createLogger('Main')

const app = new AppController(store)

app.on('status', ({ sensorId, connected }: SensorStatusEvent) => {
  logger.info(`${sensorId}: ${connected ? 'connected' : 'disconnected'}`)
})
app.on('init-progress', ({ sensorId, message }: SensorProgressEvent) => {
  logger.info(`${sensorId}: ${message}`)
})
app.on('error', ({ sensorId, message }: SensorErrorEvent) => {
  logger.error(`${sensorId}: ${message}`)
})
app.on('reconnect-exhausted', ({ sensorId }: { sensorId: string }) => {
  logger.error(`${sensorId}: Reconnection abandoned, reconnect manually`)
})
app.on('memory-warning', (memoryMb: number) => {
  logger.warn(`High memory usage: ${memoryMb.toFixed(1)} MB. Consider exporting and clearing buffers.`)
})

const shutdown = (signal: string): void => {
  logger.info(`Received ${signal}, exporting and shutting down`)
  const exportPath = join(store.getExportDirectory(), `windlink-${Date.now()}.csv`)
  app
    .shutdown()
    .then(() => app.exportMultiSensorCsv(exportPath))
    .then((result) => {
      if (result.success) {
        logger.info(`Exported ${result.rowCount} rows to ${result.filePath}`)
      } else {
        logger.warn(`Export skipped: ${result.error}`)
      }
      process.exit(0)
    })
    .catch((error) => {
      logger.error(`Shutdown failed: ${describeError(error)}`)
      process.exit(1)
    })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))

logger.info('Beginning sensor startup at:', new Date().toISOString())
const ports = await app.listPorts()
logger.info(`Available ports: ${ports.map((port) => port.path).join(', ') || 'none'}`)

const started = app.connectConfigured()
if (started.length === 0) {
  logger.warn(`No sensors configured. Edit ${store.path} to assign ports.`)
}
app.startMemoryMonitor()
