import pino from 'pino'

import { Connection, connectionOptions } from './connection'
import { END, ERRORS, NOT_FOUND } from './constants'
import { encodeCommand, encodeString } from './encode'
import { MemcacheError } from './errors'
import { checkErrors, classifyArithmetic, classifyMisc, classifyStore, parseValueHeader } from './response'
import { deserialize, serialize } from './serde'
import { optionsFromEnv } from './config'

import type { Logger } from 'pino'
import type { ClientOptions } from './config'
import type { ConnectionOptions } from './connection'
import type { StoreName, StoreResult } from './constants'
import type { Command, StoreCommand } from './encode'
import type { Deserializer, Serializable, Serializer } from './serde'

/** The `ClientResult` interface associate a value with its _CAS_. */
export interface ClientResult<T extends Serializable> {
  /** The value returned by the {@link MemtextClient} */
  value: T
  /** The _CAS_ of the value being returned */
  cas: bigint
}

/** Options for the store family of commands */
export interface StoreOptions {
  /** Seconds until the item expires, or `0` (the default) for never */
  expire?: number
  /** Do not wait for (nor return) the server's reply */
  noreply?: boolean
}

interface Fetched {
  value: Serializable
  cas?: bigint
}

type State =
  | { readonly status: 'disconnected' }
  | { readonly status: 'connected', readonly connection: Connection }

const DISCONNECTED: State = { status: 'disconnected' }

function noop(): void {
  // errors are reported to the caller of each operation
}

/**
 * A client for a single _Memcached_ server, speaking the text protocol.
 *
 * The client holds (at most) one connection, opened by the first operation.
 * Operations are executed one at a time, in the order they were called.
 * Any error closes the connection, and the next operation reconnects.
 */
export class MemtextClient {
  readonly #options: Required<ConnectionOptions>
  readonly #serializer: Serializer
  readonly #deserializer: Deserializer
  readonly #ignoreErrors: boolean
  readonly #defaultNoreply: boolean
  readonly #logger: Logger

  #state: State = DISCONNECTED
  #closes = 0 // calls to "close()", to spot one happening while connecting
  #queue: Promise<void> = Promise.resolve()

  /** Construct a new {@link MemtextClient} from environment variables */
  constructor()
  /** Construct a new {@link MemtextClient} given the specified {@link ClientOptions} */
  constructor(options: ClientOptions)

  constructor(options: ClientOptions = optionsFromEnv()) {
    const {
      ignoreErrors = false,
      defaultNoreply = true,
      serializer = serialize,
      deserializer = deserialize,
      logger = pino({ name: 'memtext', level: process.env.MEMCACHED_LOG_LEVEL || 'silent' }),
    } = options

    this.#options = connectionOptions(options)
    this.#serializer = serializer
    this.#deserializer = deserializer
    this.#ignoreErrors = ignoreErrors
    this.#defaultNoreply = defaultNoreply
    this.#logger = logger.child({ server: `${this.host}:${this.port}` })
  }

  /* ======================================================================== */

  /** Whether this client currently holds a live connection */
  get connected(): boolean {
    return (this.#state.status === 'connected') && this.#state.connection.alive
  }

  get host(): string {
    return this.#options.host
  }

  get port(): number {
    return this.#options.port
  }

  get timeout(): number {
    return this.#options.timeout
  }

  /* ======================================================================== */

  async #connect(): Promise<Connection> {
    if (this.#state.status === 'connected') {
      if (this.#state.connection.alive) return this.#state.connection
      this.#disconnect()
    }

    this.#logger.debug('Connecting')
    const closes = this.#closes
    const connection = await Connection.open(this.#options)

    if (closes !== this.#closes) {
      connection.close()
      throw new MemcacheError(ERRORS.UNEXPECTED_CLOSE, 'Connection closed by client')
    }

    this.#state = { status: 'connected', connection }
    return connection
  }

  #disconnect(error?: unknown): void {
    if (this.#state.status === 'disconnected') return

    if (error) this.#logger.debug({ err: error }, 'Disconnecting after error')
    else this.#logger.debug('Disconnecting')

    const { connection } = this.#state
    this.#state = DISCONNECTED
    connection.close()
  }

  /**
   * Run a command: build its bytes, connect, send and let `exchange` read
   * the reply. Runs after all previously queued commands completed, and
   * closes the connection on _any_ error.
   */
  #execute<R>(
      build: () => Command,
      exchange: (connection: Connection, command: Command) => Promise<R>,
  ): Promise<R> {
    const run = this.#queue.then(async () => {
      try {
        const command = build()
        const buffer = encodeCommand(command)
        const connection = await this.#connect()
        this.#logger.debug({ command: command.name }, 'Sending command')
        await connection.send(buffer)
        return await exchange(connection, command)
      } catch (error) {
        this.#disconnect(error)
        throw error
      }
    })

    this.#queue = run.then(noop, noop)
    return run
  }

  #serialize(key: string, value: Serializable): [ Buffer, number ] {
    const [ data, flags ] = this.#serializer(key, value)
    return [ typeof data === 'string' ? encodeString(data, 'Value') : data, flags ]
  }

  /* ======================================================================== */

  #store<N extends StoreName>(
      name: N,
      key: string,
      value: Serializable,
      options: StoreOptions,
      noreply: boolean,
      cas?: bigint | string,
  ): Promise<StoreResult<N> | undefined> {
    const { expire = 0 } = options

    return this.#execute(() => {
      const [ data, flags ] = this.#serialize(key, value)
      const command: StoreCommand = { name, key, flags, expire, value: data, cas, noreply }
      return command
    }, async (connection) => {
      if (noreply) return undefined
      return classifyStore(await connection.readLine(), name)
    })
  }

  async #fetch(name: 'get' | 'gets', keys: readonly string[]): Promise<Map<string, Fetched>> {
    if (! keys.length) return new Map()

    try {
      return await this.#execute(() => ({ name, keys }), async (connection) => {
        const result = new Map<string, Fetched>()
        for (;;) {
          const line = await connection.readLine()
          checkErrors(line, name)
          if (line === END) return result

          const { key, flags, size, cas } = parseValueHeader(line, name === 'gets')
          const data = await connection.readValue(size)
          result.set(key, { value: this.#deserializer(key, data, flags), cas })
        }
      })
    } catch (error) {
      if (! this.#ignoreErrors) throw error
      this.#logger.warn({ err: error, command: name }, 'Ignoring error fetching keys')
      return new Map()
    }
  }

  #misc(build: () => Command, noreply: boolean): Promise<string | undefined> {
    return this.#execute(build, async (connection, command) => {
      if (noreply) return undefined
      return classifyMisc(await connection.readLine(), command.name)
    })
  }

  async #batch<T>(
      items: Iterable<T>,
      keyOf: (item: T) => string,
      operation: (item: T) => Promise<unknown>,
  ): Promise<void> {
    const failures: unknown[] = []
    for (const item of items) {
      try {
        await operation(item)
      } catch (error) {
        this.#logger.warn({ err: error, key: keyOf(item) }, 'Batch operation failed')
        failures.push(error)
      }
    }
    if (failures.length) throw failures[0]
  }

  /* ======================================================================== */

  /**
   * Store a value for the given key.
   *
   * Returns `STORED`, or `undefined` when `noreply` is set.
   */
  set(key: string, value: Serializable, options: StoreOptions = {}): Promise<StoreResult<'set'> | undefined> {
    return this.#store('set', key, value, options, options.noreply ?? this.#defaultNoreply)
  }

  /**
   * Store many values, one `set` command at a time, in iteration order.
   *
   * Every entry is attempted, even after an earlier one failed; the first
   * failure is then re-thrown. When this fails, all, some or none of the
   * values might have been stored.
   */
  async setMany(
      values: Record<string, Serializable> | Map<string, Serializable>,
      options: StoreOptions = {},
  ): Promise<void> {
    const entries = values instanceof Map ? values.entries() : Object.entries(values)
    await this.#batch(entries, ([ key ]) => key, ([ key, value ]) => this.set(key, value, options))
  }

  /** Store a value only if the key does _not_ exist: `STORED` or `NOT_STORED` */
  add(key: string, value: Serializable, options: StoreOptions = {}): Promise<StoreResult<'add'> | undefined> {
    return this.#store('add', key, value, options, options.noreply ?? this.#defaultNoreply)
  }

  /** Store a value only if the key exists: `STORED` or `NOT_STORED` */
  replace(key: string, value: Serializable, options: StoreOptions = {}): Promise<StoreResult<'replace'> | undefined> {
    return this.#store('replace', key, value, options, options.noreply ?? this.#defaultNoreply)
  }

  /** Append data to the value of an existing key: `STORED` or `NOT_STORED` */
  append(key: string, value: Serializable, options: StoreOptions = {}): Promise<StoreResult<'append'> | undefined> {
    return this.#store('append', key, value, options, options.noreply ?? this.#defaultNoreply)
  }

  /** Prepend data to the value of an existing key: `STORED` or `NOT_STORED` */
  prepend(key: string, value: Serializable, options: StoreOptions = {}): Promise<StoreResult<'prepend'> | undefined> {
    return this.#store('prepend', key, value, options, options.noreply ?? this.#defaultNoreply)
  }

  /**
   * Store a value only if its _CAS_ still matches the one given.
   *
   * Returns `STORED`, `EXISTS` (someone else modified the value), or
   * `NOT_FOUND`. Unlike other store commands, `noreply` defaults to `false`.
   */
  cas(
      key: string,
      value: Serializable,
      cas: bigint | string,
      options: StoreOptions = {},
  ): Promise<StoreResult<'cas'> | undefined> {
    return this.#store('cas', key, value, options, options.noreply ?? false, cas)
  }

  /** Get the value (or `undefined`) associated with the given key */
  async get<T extends Serializable>(key: string): Promise<T | undefined> {
    const result = await this.#fetch('get', [ key ])
    return result.get(key)?.value as T | undefined
  }

  /** Get the values for the given keys; keys not found are not in the map */
  async getMany<T extends Serializable>(keys: readonly string[]): Promise<Map<string, T>> {
    const result = new Map<string, T>()
    for (const [ key, { value } ] of await this.#fetch('get', keys)) {
      result.set(key, value as T)
    }
    return result
  }

  /** Get the value and _CAS_ associated with the given key */
  async gets<T extends Serializable>(key: string): Promise<ClientResult<T> | undefined> {
    const result = await this.getsMany<T>([ key ])
    return result.get(key)
  }

  /** Get values and _CAS_ for the given keys; keys not found are not in the map */
  async getsMany<T extends Serializable>(keys: readonly string[]): Promise<Map<string, ClientResult<T>>> {
    const result = new Map<string, ClientResult<T>>()
    for (const [ key, { value, cas = 0n } ] of await this.#fetch('gets', keys)) {
      result.set(key, { value: value as T, cas })
    }
    return result
  }

  /** Delete the given key: `DELETED` or `NOT_FOUND` */
  delete(key: string, options: { noreply?: boolean } = {}): Promise<string | undefined> {
    const { noreply = this.#defaultNoreply } = options
    return this.#misc(() => ({ name: 'delete', key, noreply }), noreply)
  }

  /**
   * Delete many keys, one `delete` command at a time, in order.
   *
   * Every key is attempted, even after an earlier one failed; the first
   * failure is then re-thrown. When this fails, all, some or none of the
   * keys might have been deleted.
   */
  async deleteMany(keys: readonly string[], options: { noreply?: boolean } = {}): Promise<void> {
    await this.#batch(keys, (key) => key, (key) => this.delete(key, options))
  }

  #counter(
      name: 'incr' | 'decr',
      key: string,
      delta: bigint | number,
      options: { noreply?: boolean },
  ): Promise<bigint | typeof NOT_FOUND | undefined> {
    const { noreply = false } = options
    return this.#execute(() => ({ name, key, delta, noreply }), async (connection) => {
      if (noreply) return undefined
      return classifyArithmetic(await connection.readLine(), name)
    })
  }

  /** Increment a counter, returning its new value or `NOT_FOUND` */
  incr(key: string, delta: bigint | number, options: { noreply?: boolean } = {}): Promise<bigint | typeof NOT_FOUND | undefined> {
    return this.#counter('incr', key, delta, options)
  }

  /** Decrement a counter (never below zero), returning its new value or `NOT_FOUND` */
  decr(key: string, delta: bigint | number, options: { noreply?: boolean } = {}): Promise<bigint | typeof NOT_FOUND | undefined> {
    return this.#counter('decr', key, delta, options)
  }

  /** Update the expiry of the given key: `TOUCHED` (or `OK`) or `NOT_FOUND` */
  touch(key: string, options: StoreOptions = {}): Promise<string | undefined> {
    const { expire = 0, noreply = this.#defaultNoreply } = options
    return this.#misc(() => ({ name: 'touch', key, expire, noreply }), noreply)
  }

  /** Invalidate all items, now or in `delay` seconds: `OK` */
  flushAll(options: { delay?: number, noreply?: boolean } = {}): Promise<string | undefined> {
    const { delay = 0, noreply = this.#defaultNoreply } = options
    return this.#misc(() => ({ name: 'flush_all', delay, noreply }), noreply)
  }

  /**
   * Ask the server to close the connection, and close it on our side.
   *
   * The client can still be used afterwards, and will reconnect.
   */
  async quit(): Promise<void> {
    await this.#execute(() => ({ name: 'quit' }), async () => this.#disconnect())
  }

  /** Close the connection, if open. The next operation will reconnect. */
  close(): void {
    this.#closes ++
    this.#disconnect()
  }
}
