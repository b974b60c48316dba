import assert from 'node:assert'
import net from 'node:net'

import { BUFFERS, ERRORS } from './constants'
import { Decoder } from './decode'
import { MemcacheError, transportError } from './errors'

import type { TcpNetConnectOpts } from 'node:net'

/** The part of a {@link net.Socket} used by a {@link Connection} */
export interface Transport {
  readonly destroyed: boolean
  on(event: 'connect' | 'end' | 'close', listener: () => void): this
  on(event: 'error', listener: (error: Error) => void): this
  write(buffer: Uint8Array, callback: (error?: Error | null) => void): boolean
  destroy(error?: Error): this
  unref(): this
}

/** Create a {@link Transport}, by default this is `net.connect` */
export type TransportFactory = (options: TcpNetConnectOpts) => Transport

export interface ConnectionOptions {
  host: string
  port?: number
  /** Milliseconds to wait for the connection to be established */
  connectTimeout?: number
  /** Milliseconds to wait for each read or write */
  timeout?: number
  noDelay?: boolean
  factory?: TransportFactory
}

const defaultFactory: TransportFactory = (options) => net.connect(options)

/** Apply defaults to some {@link ConnectionOptions}, asserting their validity */
export function connectionOptions(options: ConnectionOptions): Required<ConnectionOptions> {
  const {
    host,
    port = 11211,
    timeout = 1000,
    connectTimeout = timeout,
    noDelay = false,
    factory = defaultFactory,
  } = options

  assert(host, 'No host name specified')
  assert(port > 0 && port < 65536 && (Math.floor(port) == port), `Invalid port ${port}`)
  assert(timeout > 0, `Invalid timeout ${timeout}`)
  assert(connectTimeout > 0, `Invalid connect timeout ${connectTimeout}`)

  return { host, port, timeout, connectTimeout, noDelay, factory }
}

interface Waiter {
  resolve: () => void
  reject: (error: Error) => void
}

/**
 * An established connection to a _Memcached_ server.
 *
 * Instances are only handed out by {@link Connection.open} once connected,
 * and are never reused once they fail or get closed: check `alive`.
 */
export class Connection {
  readonly #decoder = new Decoder()
  readonly #buffer = Buffer.allocUnsafeSlow(BUFFERS.RECV_SIZE)
  readonly #socket: Transport
  readonly #timeout: number
  readonly #ready: Promise<Connection>

  #waiter?: Waiter
  #failure?: MemcacheError

  private constructor(options: ConnectionOptions) {
    const { host, port, timeout, connectTimeout, noDelay, factory } = connectionOptions(options)

    this.#timeout = timeout

    const socket = this.#socket = factory({
      host,
      port,
      noDelay,
      onread: {
        buffer: this.#buffer,
        callback: (bytes: number, buffer: Uint8Array): boolean => {
          this.#decoder.append(buffer, 0, bytes)
          this.#waiter?.resolve()
          return true
        },
      },
    })

    this.#ready = new Promise((resolve, reject) => {
      let connected = false

      const timer = setTimeout(() => socket.destroy(new MemcacheError(ERRORS.TRANSPORT,
          `Timeout connecting to ${host}:${port} after ${connectTimeout} ms`)), connectTimeout)

      socket.on('error', (error) => {
        const failure = transportError(error)
        clearTimeout(timer)
        if (! connected) reject(failure)
        this.#fail(failure)
      })

      socket.on('end', () => this.#fail(new MemcacheError(ERRORS.UNEXPECTED_CLOSE,
          'Connection closed by server')))

      socket.on('close', () => {
        clearTimeout(timer)
        if (! connected) reject(new MemcacheError(ERRORS.TRANSPORT, `Unable to connect to ${host}:${port}`))
        this.#fail(new MemcacheError(ERRORS.UNEXPECTED_CLOSE, 'Connection closed'))
      })

      socket.on('connect', () => {
        clearTimeout(timer)
        connected = true
        socket.unref()
        resolve(this)
      })
    })
  }

  /** Open a new {@link Connection}, resolving once connected */
  static open(options: ConnectionOptions): Promise<Connection> {
    return new Connection(options).#ready
  }

  /* ======================================================================== */

  /** Whether this connection can still be used */
  get alive(): boolean {
    return ! this.#failure
  }

  /** Bytes read from the socket but not yet consumed */
  get pending(): Buffer {
    return this.#decoder.pending
  }

  /* ======================================================================== */

  #fail(failure: MemcacheError): void {
    if (this.#failure) return
    this.#failure = failure
    this.#waiter?.reject(failure)
  }

  /** Wait for more data to be appended to our decoder */
  #more(): Promise<void> {
    if (this.#failure) return Promise.reject(this.#failure)

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.#waiter = undefined
        reject(new MemcacheError(ERRORS.TRANSPORT, `No response after ${this.#timeout} ms`))
      }, this.#timeout)

      this.#waiter = {
        resolve: (): void => {
          clearTimeout(timer)
          this.#waiter = undefined
          resolve()
        },
        reject: (error: Error): void => {
          clearTimeout(timer)
          this.#waiter = undefined
          reject(error)
        },
      }
    })
  }

  /** Write a command to the socket */
  send(buffer: Buffer): Promise<void> {
    if (this.#failure) return Promise.reject(this.#failure)

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new MemcacheError(ERRORS.TRANSPORT, `Write not completed after ${this.#timeout} ms`))
      }, this.#timeout)

      this.#socket.write(buffer, (error) => {
        clearTimeout(timer)
        if (error) reject(transportError(error))
        else resolve()
      })
    })
  }

  /** Read the next line from the socket, without its terminator */
  async readLine(): Promise<string> {
    for (;;) {
      const line = this.#decoder.line()
      if (line !== undefined) return line
      await this.#more()
    }
  }

  /** Read _size_ bytes of data (and their terminator) from the socket */
  async readValue(size: number): Promise<Buffer> {
    for (;;) {
      const value = this.#decoder.value(size)
      if (value !== undefined) return value
      await this.#more()
    }
  }

  /** Close this connection, discarding anything pending */
  close(): void {
    this.#fail(new MemcacheError(ERRORS.UNEXPECTED_CLOSE, 'Connection closed by client'))
    this.#decoder.reset()
    if (! this.#socket.destroyed) this.#socket.destroy()
  }
}
