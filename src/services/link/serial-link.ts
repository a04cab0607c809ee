// * Serial link abstraction over the serialport package.
// * Callback APIs are wrapped in promises; the worker only talks to the SerialLink interface
// * so tests can substitute an in-process link.

import EventEmitter from 'events'
import { SerialPort } from 'serialport'

/**
 *
 */
export interface SerialLink {
  readonly isOpen: boolean
  open(): Promise<void>
  close(): Promise<void>
  write(data: Buffer): Promise<void>
  /** Discard pending input and output at the driver level */
  flush(): Promise<void>
  on(event: 'data', listener: (data: Buffer) => void): this
  on(event: 'error', listener: (error: Error) => void): this
  on(event: 'close', listener: () => void): this
}

/**
 *
 */
export interface SerialPortInfo {
  path: string
  manufacturer?: string
  serialNumber?: string
  vendorId?: string
  productId?: string
}

/**
 * 8N1 link on a physical or virtual serial port.
 */
export class SerialPortLink extends EventEmitter implements SerialLink {
  private readonly port: SerialPort

  /**
   *
   * @param path
   * @param baudRate
   */
  constructor(path: string, baudRate: number) {
    super()
    this.port = new SerialPort({
      path,
      baudRate,
      dataBits: 8,
      parity: 'none',
      stopBits: 1,
      autoOpen: false,
    })
    this.port.on('data', (data: Buffer) => this.emit('data', data))
    this.port.on('error', (error: Error) => this.emit('error', error))
    this.port.on('close', () => this.emit('close'))
  }

  /**
   *
   */
  get isOpen(): boolean {
    return this.port.isOpen
  }

  /**
   *
   */
  open(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.open((error) => (error ? reject(error) : resolve()))
    })
  }

  /**
   *
   */
  close(): Promise<void> {
    if (!this.port.isOpen) {
      return Promise.resolve()
    }
    return new Promise((resolve, reject) => {
      this.port.close((error) => (error ? reject(error) : resolve()))
    })
  }

  /**
   * Write and wait until the bytes have left the driver.
   * @param data
   */
  write(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.write(data, (writeError) => {
        if (writeError) {
          reject(writeError)
          return
        }
        this.port.drain((drainError) => (drainError ? reject(drainError) : resolve()))
      })
    })
  }

  /**
   *
   */
  flush(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.flush((error) => (error ? reject(error) : resolve()))
    })
  }
}

/**
 * Enumerate serial ports visible to the OS.
 */
export async function listSerialPorts(): Promise<SerialPortInfo[]> {
  const ports = await SerialPort.list()
  return ports.map((port) => ({
    path: port.path,
    manufacturer: port.manufacturer,
    serialNumber: port.serialNumber,
    vendorId: port.vendorId,
    productId: port.productId,
  }))
}
