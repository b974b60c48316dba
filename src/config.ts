import assert from 'node:assert'

import type { Logger } from 'pino'
import type { TransportFactory } from './connection'
import type { Deserializer, Serializer } from './serde'

export interface ClientOptions {
  /** The host name of the _Memcached_ server */
  host: string
  /** The port of the _Memcached_ server (default: `11211`) */
  port?: number
  /** Milliseconds to wait for a connection (default: same as `timeout`) */
  connectTimeout?: number
  /** Milliseconds to wait for each read or write (default: `1000`) */
  timeout?: number
  /** Disable Nagle's algorithm on the socket (default: `false`) */
  noDelay?: boolean
  /** Treat _any_ error in `get`, `getMany`, `gets` and `getsMany` as a miss */
  ignoreErrors?: boolean
  /** Whether store, `delete`, `touch` and `flushAll` skip replies (default: `true`) */
  defaultNoreply?: boolean
  /** Convert values to bytes and flags (default: {@link serialize}) */
  serializer?: Serializer
  /** Convert bytes and flags to values (default: {@link deserialize}) */
  deserializer?: Deserializer
  /** The `pino` logger to use (default: silent unless `MEMCACHED_LOG_LEVEL` is set) */
  logger?: Logger
  /** Create the socket, for testing */
  factory?: TransportFactory
}

/** Parse a `host[:port]` string, where IPv6 addresses are `[addr]:port` */
export function parseHost(string: string): { host: string, port?: number } {
  let host = string
  let port: string | undefined

  const bracketed = /^\[([^\]]*)\](?::(.*))?$/.exec(string)
  if (bracketed) {
    [ , host = '', port ] = bracketed
  } else {
    const index = string.lastIndexOf(':')
    // more than one colon: a bare IPv6 address
    if ((index >= 0) && (string.indexOf(':') === index)) {
      host = string.slice(0, index)
      port = string.slice(index + 1)
    }
  }

  if (port === undefined) return { host }
  assert(/^\d+$/.test(port), `Invalid port in "${string}"`)
  return { host, port: parseInt(port) }
}

function parseNumber(value?: string): number | undefined {
  if ((value === undefined) || (value === '')) return undefined
  return Number(value)
}

function parseBoolean(value?: string): boolean | undefined {
  if (! value) return undefined
  return [ 'true', '1', 'yes' ].includes(value.toLowerCase())
}

/** Read {@link ClientOptions} from `MEMCACHED_...` environment variables */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): ClientOptions {
  assert(env.MEMCACHED_HOST, 'No host configured (MEMCACHED_HOST)')

  return {
    ...parseHost(env.MEMCACHED_HOST),
    timeout: parseNumber(env.MEMCACHED_TIMEOUT),
    connectTimeout: parseNumber(env.MEMCACHED_CONNECT_TIMEOUT),
    noDelay: parseBoolean(env.MEMCACHED_NO_DELAY),
    ignoreErrors: parseBoolean(env.MEMCACHED_IGNORE_ERRORS),
  }
}
