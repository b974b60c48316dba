import { BUFFERS, ERRORS, TERMINATOR } from './constants'
import { MemcacheError } from './errors'

import type { StoreName } from './constants'

// Every command is a single line, and store commands add a data block:
//
// set <key> <flags> <expire> <bytes>[ noreply]\r\n<data>\r\n
// cas <key> <flags> <expire> <bytes> <cas>[ noreply]\r\n<data>\r\n
// get|gets <key> [<key> ...]\r\n
// delete <key>[ noreply]\r\n
// incr|decr <key> <delta>[ noreply]\r\n
// touch <key> <expire>[ noreply]\r\n
// flush_all <delay>[ noreply]\r\n
// quit\r\n

export interface StoreCommand {
  readonly name: StoreName
  readonly key: string
  readonly flags: number
  readonly expire: number
  readonly value: Buffer
  /** Required by (and only sent with) the `cas` command */
  readonly cas?: bigint | string
  readonly noreply: boolean
}

export interface FetchCommand {
  readonly name: 'get' | 'gets'
  readonly keys: readonly string[]
}

export interface DeleteCommand {
  readonly name: 'delete'
  readonly key: string
  readonly noreply: boolean
}

export interface ArithmeticCommand {
  readonly name: 'incr' | 'decr'
  readonly key: string
  readonly delta: bigint | number
  readonly noreply: boolean
}

export interface TouchCommand {
  readonly name: 'touch'
  readonly key: string
  readonly expire: number
  readonly noreply: boolean
}

export interface FlushCommand {
  readonly name: 'flush_all'
  readonly delay: number
  readonly noreply: boolean
}

export interface QuitCommand {
  readonly name: 'quit'
}

/** All the commands we know how to encode, tagged by `name` */
export type Command =
  | StoreCommand
  | FetchCommand
  | DeleteCommand
  | ArithmeticCommand
  | TouchCommand
  | FlushCommand
  | QuitCommand

/** Names of all the commands we know how to encode */
export type CommandName = Command['name']

/* ========================================================================== */

function invalid(message: string): MemcacheError {
  return new MemcacheError(ERRORS.CLIENT_ERROR, message)
}

/** Lone surrogates have no UTF-8 representation */
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/

/** Whitespace and control characters (ASCII) can not appear in keys */
// eslint-disable-next-line no-control-regex
const INVALID_KEY = /[\x00-\x20\x7f]/

/** Encode a string as UTF-8, failing when it is not well-formed */
export function encodeString(string: string, what: string = 'String'): Buffer {
  if (LONE_SURROGATE.test(string)) throw invalid(`${what} can not be encoded as UTF-8`)
  return Buffer.from(string, 'utf-8')
}

function checkKey(key: string): string {
  const length = encodeString(key, `Key "${key}"`).length
  if (length === 0) throw invalid('Empty key')
  if (length > BUFFERS.KEY_SIZE) throw invalid(`Key too long (len=${length})`)
  if (INVALID_KEY.test(key)) throw invalid(`Invalid characters in key "${key}"`)
  return key
}

function checkInteger(value: number, what: string): number {
  if (! Number.isSafeInteger(value)) throw invalid(`Invalid ${what} ${value}`)
  return value
}

function checkFlags(flags: number): number {
  checkInteger(flags, 'flags')
  if ((flags < 0) || (flags > 0xffff)) throw invalid(`Invalid flags ${flags}`)
  return flags
}

function checkDelta(delta: bigint | number): string {
  if (typeof delta === 'number') checkInteger(delta, 'delta')
  if (delta < 0) throw invalid(`Invalid delta ${delta}`)
  return delta.toString()
}

function checkCas(cas: bigint | string | undefined): string {
  const token = cas === undefined ? '' : cas.toString()
  if (! /^\d+$/.test(token)) throw invalid(`Invalid cas "${token}"`)
  return token
}

function line(parts: (string | number)[], noreply: boolean): string {
  if (noreply) parts.push('noreply')
  return `${parts.join(' ')}\r\n`
}

/* ========================================================================== */

/**
 * Encode a {@link Command} into the bytes to write on the wire.
 *
 * Keys and arguments are validated first, and a {@link MemcacheError} with
 * kind `client-error` is thrown for anything we would not be able to send.
 */
export function encodeCommand(command: Command): Buffer {
  switch (command.name) {
    case 'set':
    case 'add':
    case 'replace':
    case 'append':
    case 'prepend':
    case 'cas': {
      const { name, key, flags, expire, value, cas, noreply } = command
      const parts = [ name, checkKey(key), checkFlags(flags), checkInteger(expire, 'expire'), value.length ]
      if (name === 'cas') parts.push(checkCas(cas))

      const header = Buffer.from(line(parts, noreply), 'utf-8')
      return Buffer.concat([ header, value, TERMINATOR ])
    }

    case 'get':
    case 'gets': {
      if (! command.keys.length) throw invalid('No keys to fetch')
      const keys = command.keys.map(checkKey)
      return Buffer.from(line([ command.name, ...keys ], false), 'utf-8')
    }

    case 'delete':
      return Buffer.from(line([ 'delete', checkKey(command.key) ], command.noreply), 'utf-8')

    case 'incr':
    case 'decr': {
      const parts = [ command.name, checkKey(command.key), checkDelta(command.delta) ]
      return Buffer.from(line(parts, command.noreply), 'utf-8')
    }

    case 'touch': {
      const parts = [ 'touch', checkKey(command.key), checkInteger(command.expire, 'expire') ]
      return Buffer.from(line(parts, command.noreply), 'utf-8')
    }

    case 'flush_all': {
      const parts = [ 'flush_all', checkInteger(command.delay, 'delay') ]
      return Buffer.from(line(parts, command.noreply), 'utf-8')
    }

    case 'quit':
      return Buffer.from('quit\r\n', 'utf-8')
  }
}
