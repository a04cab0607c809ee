/**
 * Protocol negotiation for a freshly opened anemometer link.
 *
 * Structured firmware is queried first with `{json}`; when it answers, version and
 * settings are queried to fill a SensorInfo. Otherwise the legacy CLI is entered
 * with Ctrl+C and the configured init commands are replayed. A device that answers
 * neither is assumed to be streaming already.
 *
 * Nothing here is fatal: unexpected response shapes leave SensorInfo fields unset.
 */

import type { NegotiatedProtocol, SensorInfo } from '../types/anemometer'
import {
  CMD_JSON_PROBE,
  CMD_SETTINGS,
  CMD_VERSION,
  CTRL_C,
  describeError,
  isTelemetryLine,
  LEGACY_COMMAND_WINDOW,
  LEGACY_INTER_COMMAND_DELAY,
  LEGACY_LINE_TERMINATOR,
  LEGACY_PROMPT_TIMEOUT,
  PROBE_SETTLE_AFTER,
  PROBE_SETTLE_BEFORE,
  PROBE_TIMEOUT,
  RE_COMMAND_REJECTED,
  RE_LEGACY_ERROR,
  RE_LEGACY_PROMPT,
  SETTINGS_TIMEOUT,
  sleep,
  VERSION_TIMEOUT,
} from './anemometer-protocol'
import type { LineReadResult } from './link/line-reader'
import { createLogger } from './log-service'

const logger = createLogger('ProtocolNegotiator')

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * What the negotiator needs from the link owner.
 */
export interface NegotiationChannel {
  /** Write text one byte at a time with firmware pacing */
  writePaced(text: string): Promise<void>
  writeRaw(data: Buffer): Promise<void>
  readLine(timeoutMs: number): Promise<LineReadResult>
  resetInput(): void
  isStopRequested(): boolean
}

/**
 *
 */
export interface NegotiationTimings {
  settleBeforeProbeMs: number
  settleAfterMs: number
  probeTimeoutMs: number
  versionTimeoutMs: number
  settingsTimeoutMs: number
  promptTimeoutMs: number
  commandWindowMs: number
  interCommandDelayMs: number
}

export const DEFAULT_NEGOTIATION_TIMINGS: NegotiationTimings = {
  settleBeforeProbeMs: PROBE_SETTLE_BEFORE,
  settleAfterMs: PROBE_SETTLE_AFTER,
  probeTimeoutMs: PROBE_TIMEOUT,
  versionTimeoutMs: VERSION_TIMEOUT,
  settingsTimeoutMs: SETTINGS_TIMEOUT,
  promptTimeoutMs: LEGACY_PROMPT_TIMEOUT,
  commandWindowMs: LEGACY_COMMAND_WINDOW,
  interCommandDelayMs: LEGACY_INTER_COMMAND_DELAY,
}

/**
 *
 */
export interface NegotiationHooks {
  onProgress?: (message: string) => void
  onError?: (message: string) => void
}

type JsonRecord = Record<string, unknown>

/**
 * Decoded reply to a brace command.
 */
export type DeviceResponse =
  | { kind: 'json'; value: JsonRecord }
  | { kind: 'raw'; text: string }
  | { kind: 'error'; error: string }

// ============================================================================
// Response helpers
// ============================================================================

/** Output setting name → telemetry tag */
export const OUTPUT_TAG_MAP: ReadonlyArray<readonly [string, string]> = [
  ['Wind Speed', 'S'],
  ['Wind Direction', 'D'],
  ['Vertical Direction', 'DV'],
  ['U', 'U'],
  ['V', 'V'],
  ['W', 'W'],
  ['Sonic Temperature', 'T'],
  ['Pitch', 'PI'],
  ['Roll', 'RO'],
  ['Status', 'ST'],
]

const SETTINGS_MARKER_KEYS = ['Model', 'Serial Number', 'Probe', 'Output', 'Display']

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const asText = (value: unknown): string | undefined => {
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

/**
 * Decode the joined lines of a brace-command reply.
 * A single-key object wrapping another object is unwrapped; when the full text is not
 * valid JSON the block between the first inner `{` and the last inner `}` is tried.
 * @param text
 */
export function parseDeviceResponse(text: string): DeviceResponse {
  if (RE_COMMAND_REJECTED.test(text)) {
    return { kind: 'error', error: 'Invalid command' }
  }

  if (text.startsWith('{') && text.endsWith('}')) {
    try {
      const parsed: unknown = JSON.parse(text)
      if (isRecord(parsed)) {
        const values = Object.values(parsed)
        const [only] = values
        if (values.length === 1 && isRecord(only)) {
          return { kind: 'json', value: only }
        }
        return { kind: 'json', value: parsed }
      }
    } catch (error) {
      logger.debug(`Reply is not plain JSON (${describeError(error)}), trying inner block`)
      const innerStart = text.indexOf('{', 1)
      const innerEnd = text.lastIndexOf('}', text.length - 2)
      if (innerStart > 0 && innerEnd > innerStart) {
        try {
          const inner: unknown = JSON.parse(text.slice(innerStart, innerEnd + 1))
          if (isRecord(inner)) {
            return { kind: 'json', value: inner }
          }
        } catch (innerError) {
          logger.debug(`Inner block is not JSON either: ${describeError(innerError)}`)
        }
      }
    }
  }

  return { kind: 'raw', text }
}

/**
 * Pull model, serial number and firmware version out of a textual {version} reply.
 * @param raw
 */
export function parseVersionText(raw: string): { model?: string; serialNumber?: string; version?: string } {
  const result: { model?: string; serialNumber?: string; version?: string } = {}
  for (const line of raw.split('\n')) {
    if (line.includes('TriSonica')) {
      result.model = line.trim()
    } else if (line.includes('Serial Number:')) {
      result.serialNumber = line.split(':').slice(1).join(':').trim()
    } else if (line.includes('Version:') && result.version === undefined) {
      result.version = line.split(':').slice(1).join(':').trim()
    }
  }
  return result
}

/**
 * Locate the settings object in a {settings} reply: the `Settings` member, or the reply
 * itself when unwrapping already removed that key.
 * @param value
 */
export function extractSettings(value: JsonRecord): JsonRecord | null {
  const wrapped = value['Settings']
  if (isRecord(wrapped)) {
    return wrapped
  }
  if (SETTINGS_MARKER_KEYS.some((key) => key in value)) {
    return value
  }
  return null
}

/**
 * Enabled telemetry tags from the `Output` table, or from `Display` when Output is absent.
 * @param settings
 */
export function extractEnabledTags(settings: JsonRecord): string[] {
  const output = settings['Output']
  if (isRecord(output)) {
    return OUTPUT_TAG_MAP.filter(([name]) => output[name] === 'Yes').map(([, tag]) => tag)
  }

  const display = settings['Display']
  if (isRecord(display)) {
    return OUTPUT_TAG_MAP.filter(([name, tag]) => {
      const entry = display[tag] ?? display[name]
      return entry === 'Yes' || (isRecord(entry) && entry['Enabled'] === true)
    }).map(([, tag]) => tag)
  }

  return []
}

// ============================================================================
// ProtocolNegotiator Class
// ============================================================================

// * One-shot negotiation per open connection.
// * Structured handshake first, legacy CLI second, 'unknown' when neither applies.
/**
 *
 */
export class ProtocolNegotiator {
  private readonly timings: NegotiationTimings

  /**
   *
   * @param sensorId
   * @param channel
   * @param hooks
   * @param timings
   */
  constructor(
    private readonly sensorId: string,
    private readonly channel: NegotiationChannel,
    private readonly hooks: NegotiationHooks = {},
    timings: Partial<NegotiationTimings> = {}
  ) {
    this.timings = { ...DEFAULT_NEGOTIATION_TIMINGS, ...timings }
  }

  /**
   *
   * @param initCommands - legacy CLI commands; an empty list skips the legacy path
   */
  async negotiate(initCommands: readonly string[]): Promise<NegotiatedProtocol> {
    const info = await this.tryStructured()
    if (info) {
      return { kind: 'structured', info }
    }

    if (this.channel.isStopRequested()) {
      return { kind: 'unknown' }
    }

    if (initCommands.length > 0) {
      logger.info(`${this.sensorId}: Structured protocol unavailable, using legacy CLI`)
      await this.runLegacyInit(initCommands)
      return { kind: 'legacy' }
    }

    logger.info(`${this.sensorId}: No protocol negotiated, assuming device is streaming`)
    return { kind: 'unknown' }
  }

  /**
   * Send a brace command and decode the reply.
   * @param command
   * @param timeoutMs
   */
  async sendStructuredCommand(command: string, timeoutMs: number): Promise<DeviceResponse> {
    logger.debug(`${this.sensorId}: Sending ${command}`)
    await this.channel.writePaced(command)
    return this.readResponse(timeoutMs)
  }

  // ==========================================================================
  // Structured protocol
  // ==========================================================================

  private async tryStructured(): Promise<SensorInfo | null> {
    logger.info(`${this.sensorId}: Probing structured protocol`)
    await sleep(this.timings.settleBeforeProbeMs)
    this.channel.resetInput()

    const probe = await this.sendStructuredCommand(CMD_JSON_PROBE, this.timings.probeTimeoutMs)
    if (probe.kind !== 'json' || !('JSON' in probe.value)) {
      if (probe.kind === 'error') {
        logger.info(`${this.sensorId}: Structured protocol not available (${probe.error})`)
      } else {
        logger.warn(`${this.sensorId}: Unexpected {json} reply`)
      }
      return null
    }

    const firmwareVersion = asText(probe.value['Version']) ?? 'unknown'
    logger.info(`${this.sensorId}: Structured protocol confirmed (FW: ${firmwareVersion})`)
    this.progress(`JSON Protocol v${firmwareVersion}`)

    const info: SensorInfo = { protocol: 'structured', firmwareVersion, enabledTags: [] }
    if (this.stopInterrupted('version query')) {
      return null
    }

    const version = await this.sendStructuredCommand(CMD_VERSION, this.timings.versionTimeoutMs)
    if (version.kind === 'raw') {
      const parsed = parseVersionText(version.text)
      info.rawVersion = version.text
      info.model = parsed.model
      info.serialNumber = parsed.serialNumber
      if (firmwareVersion === 'unknown' && parsed.version) {
        info.firmwareVersion = parsed.version
      }
      this.progress(`Model: ${info.model ?? 'Unknown'}`)
    } else if (version.kind === 'json') {
      info.rawVersion = JSON.stringify(version.value)
    }

    if (this.stopInterrupted('settings query')) {
      return null
    }

    const settingsReply = await this.sendStructuredCommand(CMD_SETTINGS, this.timings.settingsTimeoutMs)
    if (settingsReply.kind === 'json') {
      const settings = extractSettings(settingsReply.value)
      info.rawSettings = JSON.stringify(settingsReply.value)
      if (settings) {
        this.applySettings(info, settings)
      } else {
        logger.warn(`${this.sensorId}: Unrecognized {settings} layout, keeping raw reply`)
      }
    } else if (settingsReply.kind === 'raw') {
      info.rawSettings = settingsReply.text
    }

    await sleep(this.timings.settleAfterMs)
    this.channel.resetInput()
    logger.info(`${this.sensorId}: Structured initialization complete`)
    return info
  }

  private applySettings(info: SensorInfo, settings: JsonRecord): void {
    info.model = asText(settings['Model']) ?? info.model
    info.serialNumber = asText(settings['Serial Number']) ?? info.serialNumber

    const probe = settings['Probe']
    if (isRecord(probe)) {
      const rate = Number(probe['SampleRate'])
      if (Number.isFinite(rate)) {
        info.sampleRate = rate
      }
    }

    info.enabledTags = extractEnabledTags(settings)
    if (info.enabledTags.length > 0) {
      logger.info(`${this.sensorId}: Enabled tags: ${info.enabledTags.join(', ')}`)
    }

    this.progress(`S/N: ${info.serialNumber ?? 'Unknown'}, Rate: ${info.sampleRate ?? 'Unknown'}Hz`)
  }

  // * Reads until braces balance or the deadline passes; telemetry lines are skipped.
  private async readResponse(timeoutMs: number): Promise<DeviceResponse> {
    const deadline = Date.now() + timeoutMs
    const lines: string[] = []
    let depth = 0
    let sawOpen = false

    while (Date.now() < deadline && !this.channel.isStopRequested()) {
      const result = await this.channel.readLine(deadline - Date.now())
      if (!result.complete || !result.text || isTelemetryLine(result.text)) {
        continue
      }

      lines.push(result.text)
      const opens = result.text.split('{').length - 1
      const closes = result.text.split('}').length - 1
      if (opens > 0) {
        sawOpen = true
      }
      depth += opens - closes

      if (sawOpen && depth <= 0) {
        break
      }
    }

    if (lines.length === 0) {
      return { kind: 'error', error: 'No response' }
    }
    return parseDeviceResponse(lines.join('\n'))
  }

  // ==========================================================================
  // Legacy CLI
  // ==========================================================================

  private async runLegacyInit(commands: readonly string[]): Promise<void> {
    await this.channel.writeRaw(Buffer.from([CTRL_C]))
    this.progress('Ctrl+C (entering CLI mode)')

    if (!(await this.waitForPrompt())) {
      logger.warn(`${this.sensorId}: No CLI prompt received, sending commands anyway`)
    }

    for (const command of commands) {
      if (this.channel.isStopRequested()) {
        logger.info(`${this.sensorId}: Init sequence interrupted`)
        return
      }

      await this.channel.writeRaw(Buffer.from(`${command}${LEGACY_LINE_TERMINATOR}`, 'ascii'))
      this.progress(command)
      await this.collectCommandReply(command)
      await sleep(this.timings.interCommandDelayMs)
    }

    await sleep(this.timings.settleAfterMs)
    this.channel.resetInput()
    logger.info(`${this.sensorId}: Legacy init sequence complete`)
  }

  private async waitForPrompt(): Promise<boolean> {
    const deadline = Date.now() + this.timings.promptTimeoutMs
    while (Date.now() < deadline && !this.channel.isStopRequested()) {
      const result = await this.channel.readLine(deadline - Date.now())
      if (RE_LEGACY_PROMPT.test(result.text)) {
        return true
      }
    }
    return false
  }

  private async collectCommandReply(command: string): Promise<void> {
    const deadline = Date.now() + this.timings.commandWindowMs
    while (Date.now() < deadline && !this.channel.isStopRequested()) {
      const result = await this.channel.readLine(deadline - Date.now())
      if (result.text && RE_LEGACY_ERROR.test(result.text)) {
        const message = `Command '${command}' returned error: ${result.text}`
        logger.warn(`${this.sensorId}: ${message}`)
        this.hooks.onError?.(message)
      }
    }
  }

  private stopInterrupted(step: string): boolean {
    if (!this.channel.isStopRequested()) {
      return false
    }
    logger.info(`${this.sensorId}: Stop requested, skipping ${step}`)
    return true
  }

  private progress(message: string): void {
    this.hooks.onProgress?.(message)
  }
}
