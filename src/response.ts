import { ERRORS, NOT_FOUND, STORE_RESULTS } from './constants'
import { MemcacheError, unknownResponse } from './errors'

import type { StoreName, StoreResult } from './constants'
import type { CommandName } from './encode'

/** The parsed `VALUE <key> <flags> <size>[ <cas>]` header of a fetched item */
export interface ValueHeader {
  readonly key: string
  readonly flags: number
  readonly size: number
  readonly cas?: bigint
}

/** Everything after the first space of a line (or the whole line) */
function detail(line: string): string {
  return line.slice(line.indexOf(' ') + 1)
}

/**
 * Throw the {@link MemcacheError} corresponding to an error line.
 *
 * Lines starting with `ERROR`, `CLIENT_ERROR` or `SERVER_ERROR` are errors
 * regardless of the command issued; any other line is left alone.
 */
export function checkErrors(line: string, name: CommandName): void {
  if (line.startsWith('ERROR')) {
    throw new MemcacheError(ERRORS.UNKNOWN_COMMAND, `Unknown command "${name}"`)
  }
  if (line.startsWith('CLIENT_ERROR')) {
    throw new MemcacheError(ERRORS.CLIENT_ERROR, detail(line))
  }
  if (line.startsWith('SERVER_ERROR')) {
    throw new MemcacheError(ERRORS.SERVER_ERROR, detail(line))
  }
}

function isStoreResult<N extends StoreName>(name: N, line: string): line is StoreResult<N> {
  const results: readonly string[] = STORE_RESULTS[name]
  return results.includes(line)
}

/** Classify the reply to a store command, returning its outcome token */
export function classifyStore<N extends StoreName>(line: string, name: N): StoreResult<N> {
  checkErrors(line, name)
  if (isStoreResult(name, line)) return line
  throw unknownResponse(line)
}

const UNSIGNED = /^\d+$/

/** Parse a `VALUE` header line, as returned by `get` or `gets` */
export function parseValueHeader(line: string, expectCas: boolean): ValueHeader {
  const parts = line.split(' ')
  if ((parts[0] !== 'VALUE') || (parts.length !== (expectCas ? 5 : 4))) {
    throw unknownResponse(line)
  }

  const [ , key, flags, size, cas ] = parts
  if (! (key && UNSIGNED.test(flags) && UNSIGNED.test(size))) throw unknownResponse(line)

  if (! expectCas) return { key, flags: Number(flags), size: Number(size) }

  if (! UNSIGNED.test(cas)) throw unknownResponse(line)
  return { key, flags: Number(flags), size: Number(size), cas: BigInt(cas) }
}

/** Classify the reply to `incr` or `decr`: the new value, or `NOT_FOUND` */
export function classifyArithmetic(line: string, name: 'incr' | 'decr'): bigint | typeof NOT_FOUND {
  checkErrors(line, name)
  if (line === NOT_FOUND) return NOT_FOUND
  if (UNSIGNED.test(line)) return BigInt(line)
  throw unknownResponse(line)
}

/** Classify the reply to any other command: the line itself */
export function classifyMisc(line: string, name: CommandName): string {
  checkErrors(line, name)
  return line
}
