/**
 * Ultrasonic Anemometer Protocol (TypeScript)
 *
 * Wire-level definitions shared by the acquisition worker and the protocol
 * negotiator: telemetry line parsing, error sentinels, command strings and
 * handshake timings.
 *
 * ARCHITECTURE:
 * - Telemetry arrives as whitespace-separated TAG VALUE pairs, one line per sample
 * - Structured firmware answers brace commands ({json}, {settings}...) with JSON
 * - Legacy firmware exposes a line CLI entered with Ctrl+C
 *
 * Example telemetry:
 *   "S 9.89 D 134 U -4.52 V 4.36 W -7.64 T 27.96 PI 2.1 RO -1.3"
 */

import type { ParsedFields } from '../types/anemometer'
import { createLogger } from './log-service'

const logger = createLogger('AnemometerProtocol')

// ============================================================================
// Protocol Constants
// ============================================================================

/** Tags the firmware is documented to emit */
export const KNOWN_TAGS: ReadonlySet<string> = new Set(['S', 'D', 'DV', 'U', 'V', 'W', 'T', 'PI', 'RO'])

/** Tags every accepted line must carry */
export const REQUIRED_TAGS = ['S', 'D', 'U', 'V', 'W', 'T'] as const

/** Tags defaulted to 0 when absent */
export const OPTIONAL_TAGS = ['PI', 'RO'] as const

/** Values the firmware writes when a measurement failed */
export const ERROR_SENTINELS = [-99.9, -99.99] as const

export const ERROR_SENTINEL_TOLERANCE = 0.001

/** Unread input above this many bytes is discarded as overflow */
export const MAX_INPUT_BACKLOG = 4096

export const CTRL_C = 0x03
export const LEGACY_LINE_TERMINATOR = '\r\n'

// ============================================================================
// Structured Commands
// ============================================================================

export const CMD_JSON_PROBE = '{json}'
export const CMD_VERSION = '{version}'
export const CMD_SETTINGS = '{settings}'
export const CMD_SAVE = '{save}'

export const OUTPUT_RATE_MIN = 1
export const OUTPUT_RATE_MAX = 10

/**
 *
 * @param rateHz
 */
export function makeOutputRateCmd(rateHz: number): string {
  return `{outputrate ${rateHz}}`
}

/**
 *
 * @param tag
 */
export function makeEnableTagCmd(tag: string): string {
  return `{set Display.${tag}.Tagged true}`
}

// ============================================================================
// Timing Constants (milliseconds)
// ============================================================================

export const BYTE_PACING_DELAY = 10 // Firmware drops bytes written faster than this
export const COMMAND_SETTLE_DELAY = 100
export const READ_LINE_TIMEOUT = 1000
export const PROBE_SETTLE_BEFORE = 300
export const PROBE_SETTLE_AFTER = 200
export const PROBE_TIMEOUT = 2000
export const VERSION_TIMEOUT = 2000
export const SETTINGS_TIMEOUT = 3000
export const LEGACY_PROMPT_TIMEOUT = 2000
export const LEGACY_COMMAND_WINDOW = 2000
export const LEGACY_INTER_COMMAND_DELAY = 100

// ============================================================================
// Regular Expressions
// ============================================================================

/** Tag-shaped token: one or two letters */
export const RE_TAG_TOKEN = /^[A-Z]{1,2}$/

/** Decimal float with optional sign and exponent */
export const RE_NUMBER_TOKEN = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/

/** Telemetry line interleaved with command responses */
export const RE_TELEMETRY_LINE = /^S\s+[-+]?\.?\d/i

/** Legacy CLI prompt */
export const RE_LEGACY_PROMPT = />/

/** Legacy CLI error reply */
export const RE_LEGACY_ERROR = /error|invalid/i

/** Structured firmware rejecting a command */
export const RE_COMMAND_REJECTED = /Invalid Parameter|Invalid Command/

// ============================================================================
// Custom Errors
// ============================================================================

/**
 * Raised when a line carries no TAG VALUE pairs.
 */
export class ParseError extends Error {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'ParseError'
  }
}

/**
 *
 */
export class InvalidReadingError extends Error {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'InvalidReadingError'
  }
}

/**
 * Link-level failure: the port errored, closed under us or refused a write.
 */
export class SerialIOError extends Error {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'SerialIOError'
  }
}

/**
 *
 */
export class ProtocolError extends Error {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'ProtocolError'
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * True for the firmware's error sentinels (-99.9, -99.99), within 0.001.
 * @param value
 */
export function isErrorValue(value: number): boolean {
  return ERROR_SENTINELS.some((sentinel) => Math.abs(value - sentinel) < ERROR_SENTINEL_TOLERANCE)
}

/**
 *
 * @param line
 */
export function isTelemetryLine(line: string): boolean {
  return RE_TELEMETRY_LINE.test(line.trim())
}

/**
 * Message text of anything thrown.
 * @param error
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 *
 * @param ms
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

// ============================================================================
// AnemometerLineParser Class
// ============================================================================

// * TAG VALUE parser. Only state kept is the set of unknown tags already reported.
// * A token is taken as a tag when it is known or tag-shaped AND the next token is numeric;
// * otherwise the scan advances by one token.
/**
 *
 */
export class AnemometerLineParser {
  private readonly unknownTags = new Set<string>()

  /**
   * Parse one telemetry line into a tag → value map.
   * Repeated tags keep the last value.
   * @param line
   * @throws {ParseError} on empty input or when no pair is found
   */
  parseLine(line: string): ParsedFields {
    const trimmed = line.trim()
    if (!trimmed) {
      throw new ParseError('Empty line')
    }

    const tokens = trimmed.split(/\s+/)
    const fields: ParsedFields = new Map()

    let i = 0
    while (i < tokens.length - 1) {
      const tag = tokens[i].toUpperCase()
      const valueToken = tokens[i + 1]

      if ((KNOWN_TAGS.has(tag) || RE_TAG_TOKEN.test(tag)) && RE_NUMBER_TOKEN.test(valueToken)) {
        if (!KNOWN_TAGS.has(tag) && !this.unknownTags.has(tag)) {
          this.unknownTags.add(tag)
          logger.debug(`Unknown tag '${tag}' accepted`)
        }
        fields.set(tag, parseFloat(valueToken))
        i += 2
      } else {
        i += 1
      }
    }

    if (fields.size === 0) {
      throw new ParseError(`No tag/value pairs found in line: ${trimmed.slice(0, 80)}`)
    }

    return fields
  }

  /**
   * True when every required tag is present.
   * @param fields
   */
  validateFields(fields: ParsedFields): boolean {
    const missing = REQUIRED_TAGS.find((tag) => !fields.has(tag))
    if (missing) {
      logger.warn(`Missing required tag: ${missing}`)
      return false
    }
    return true
  }

  /**
   *
   * @param fields
   */
  hasErrorValues(fields: ParsedFields): boolean {
    for (const value of fields.values()) {
      if (isErrorValue(value)) {
        return true
      }
    }
    return false
  }

  /**
   * Tags outside KNOWN_TAGS seen so far.
   */
  getUnknownTags(): string[] {
    return Array.from(this.unknownTags)
  }
}
