/**
 * Shared types for the anemometer acquisition engine.
 *
 * Used by the worker, controllers, synchronizer and exporters so that every
 * layer agrees on the reading shape and on the events a sensor can produce.
 */

// ============================================================================
// Readings
// ============================================================================

/**
 * One decoded telemetry line from a single sensor.
 * Timestamps are epoch milliseconds taken when the line was received.
 */
export interface AnemometerReading {
  readonly timestamp: number
  readonly sensorId: string
  /** S: horizontal wind speed (m/s) */
  readonly speed2d: number
  /** D: wind direction (degrees) */
  readonly direction: number
  readonly u: number
  readonly v: number
  readonly w: number
  /** T: sonic temperature (°C) */
  readonly temperature: number
  /** PI: 0 when the sensor does not report it */
  readonly pitch: number
  /** RO: 0 when the sensor does not report it */
  readonly roll: number
  /** false when any channel carries a sensor error sentinel */
  readonly isValid: boolean
}

/** Tag → value map produced by the line parser. */
export type ParsedFields = Map<string, number>

// ============================================================================
// Protocol negotiation
// ============================================================================

/**
 * Device description gathered during the structured-protocol handshake.
 * Fields the device did not report stay undefined.
 */
export interface SensorInfo {
  protocol: 'structured'
  firmwareVersion: string
  model?: string
  serialNumber?: string
  sampleRate?: number
  enabledTags: string[]
  rawVersion?: string
  rawSettings?: string
}

/**
 *
 */
export type NegotiatedProtocol =
  | { kind: 'unknown' }
  | { kind: 'structured'; info: SensorInfo }
  | { kind: 'legacy' }

// ============================================================================
// Configuration and state
// ============================================================================

/**
 * Link parameters consumed at connect time.
 */
export interface SensorLinkConfig {
  port: string
  baudRate: number
  /** Legacy CLI commands sent when the structured handshake fails */
  initCommands: string[]
}

/**
 * Per-sensor connection snapshot, owned by its controller.
 */
export interface ConnectionState {
  connected: boolean
  reconnectAttempts: number
  lastError: string | null
  protocol: NegotiatedProtocol
  runId: string | null
}

// ============================================================================
// Event payloads
// ============================================================================

/**
 *
 */
export interface SensorStatusEvent {
  sensorId: string
  connected: boolean
}

/**
 *
 */
export interface SensorErrorEvent {
  sensorId: string
  message: string
}

/**
 *
 */
export interface SensorProgressEvent {
  sensorId: string
  message: string
}

/**
 *
 */
export interface ReconnectScheduledEvent {
  sensorId: string
  attempt: number
  delayMs: number
}

/**
 * Result envelope used by service boundaries that must not throw.
 */
export type OperationResult = { success: true } | { success: false; error: string }
