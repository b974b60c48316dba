import assert from 'node:assert'

import { EMPTY_BUFFER, FLAGS } from './constants'

/** Types that can be serialized by our default {@link Serializer}. */
export type Serializable = bigint | string | number | boolean | null | object

/**
 * Convert a value into the bytes to store, and the 16-bit flags to store
 * alongside them. Strings are encoded as UTF-8.
 */
export type Serializer = (key: string, value: Serializable) => [ Buffer | string, number ]

/** Convert stored bytes back into a value, given the flags they came with */
export type Deserializer = (key: string, value: Buffer, flags: number) => Serializable

/* ========================================================================== */

// Values JSON can't represent are stored as `[ TAG, kind, payload ]` arrays
const TAG = '\0memtext\0'

function replacer(this: Record<string, unknown>, key: string, value: unknown): unknown {
  const original = this[key] // before "toJSON()" turned dates into strings
  if (typeof original === 'bigint') return [ TAG, 'bigint', original.toString() ]
  if (original instanceof Date) return [ TAG, 'date', original.getTime() ]
  if (original instanceof Set) return [ TAG, 'set', [ ...original ] ]
  if (original instanceof Map) return [ TAG, 'map', [ ...original ] ]
  return value
}

function isEntry(entry: unknown): entry is [ unknown, unknown ] {
  return Array.isArray(entry) && (entry.length === 2)
}

const REVIVERS = new Map<unknown, (payload: unknown) => unknown>([
  [ 'bigint', (payload) => BigInt(String(payload)) ],
  [ 'date', (payload) => new Date(typeof payload === 'number' ? payload : NaN) ],
  [ 'set', (payload) => new Set(Array.isArray(payload) ? payload : []) ],
  [ 'map', (payload) => new Map(Array.isArray(payload) ? payload.filter(isEntry) : []) ],
])

function reviver(_key: string, value: unknown): unknown {
  if (! (Array.isArray(value) && (value.length === 3) && (value[0] === TAG))) return value
  const revive = REVIVERS.get(value[1])
  return revive ? revive(value[2]) : value
}

interface TypedArrayType {
  new (length: number): NodeJS.TypedArray
  readonly BYTES_PER_ELEMENT: number
  readonly name: string
}

/** Flags for each kind of typed array, in the order "instanceof" checks them */
const TYPED_ARRAYS = new Map<FLAGS, TypedArrayType>([
  [ FLAGS.UINT8ARRAY, Uint8Array ],
  [ FLAGS.UINT8CLAMPEDARRAY, Uint8ClampedArray ],
  [ FLAGS.UINT16ARRAY, Uint16Array ],
  [ FLAGS.UINT32ARRAY, Uint32Array ],
  [ FLAGS.INT8ARRAY, Int8Array ],
  [ FLAGS.INT16ARRAY, Int16Array ],
  [ FLAGS.INT32ARRAY, Int32Array ],
  [ FLAGS.BIGUINT64ARRAY, BigUint64Array ],
  [ FLAGS.BIGINT64ARRAY, BigInt64Array ],
  [ FLAGS.FLOAT32ARRAY, Float32Array ],
  [ FLAGS.FLOAT64ARRAY, Float64Array ],
])

/** Allocate a new typed array, aligned, holding a copy of the bytes read */
function makeTypedArray(type: TypedArrayType, source: Buffer): NodeJS.TypedArray {
  const { BYTES_PER_ELEMENT: size, name } = type
  assert(source.length % size === 0, `Invalid length ${source.length} for ${name}`)

  const array = new type(source.length / size)
  new Uint8Array(array.buffer).set(source)
  return array
}

/** How to read back the bytes stored with each of our flags */
const DECODERS = new Map<number, (value: Buffer) => Serializable>([
  [ FLAGS.BIGINT, (value) => BigInt(value.toString('utf-8')) ],
  [ FLAGS.BOOLEAN, (value) => value.some((byte) => byte !== 0x00) ],
  [ FLAGS.NUMBER, (value) => Number(value.toString('utf-8')) ],
  [ FLAGS.STRING, (value) => value.toString('utf-8') ],
  [ FLAGS.NULL, () => null ],
  [ FLAGS.JSON, (value) => JSON.parse(value.toString('utf-8'), reviver) ],
])

for (const [ flags, type ] of TYPED_ARRAYS) {
  DECODERS.set(flags, (value) => makeTypedArray(type, value))
}

/* ========================================================================== */

/**
 * The default {@link Serializer}.
 *
 * Buffers are stored as they are (flags `0`), while strings, numbers,
 * booleans, bigints, `null` and typed arrays each get their own flags.
 * Any other object is stored as JSON (preserving `bigint`, {@link Date},
 * {@link Set} and {@link Map}).
 */
export const serialize: Serializer = (_key, value) => {
  if (value === null) return [ EMPTY_BUFFER, FLAGS.NULL ]
  if (Buffer.isBuffer(value)) return [ value, FLAGS.RAW ]

  if (typeof value === 'string') return [ value, FLAGS.STRING ]
  if (typeof value === 'number') return [ String(value), FLAGS.NUMBER ]
  if (typeof value === 'bigint') return [ String(value), FLAGS.BIGINT ]
  if (typeof value === 'boolean') return [ Buffer.of(value ? 0xff : 0x00), FLAGS.BOOLEAN ]

  assert(typeof value === 'object', `Unable to store value of type "${typeof value}"`)

  // typed arrays are stored as their bytes, in the platform's byte order
  for (const [ flags, type ] of TYPED_ARRAYS) {
    if (! (value instanceof type)) continue
    return [ Buffer.from(value.buffer, value.byteOffset, value.byteLength), flags ]
  }

  // any other "object" gets serialized as JSON
  return [ JSON.stringify(value, replacer), FLAGS.JSON ]
}

/**
 * The default {@link Deserializer}, reversing {@link serialize}.
 *
 * Values stored with flags `0` or with flags we don't know about are
 * returned as a {@link Buffer}.
 */
export const deserialize: Deserializer = (_key, value, flags) => {
  const decode = DECODERS.get(flags)
  return decode ? decode(value) : Buffer.from(value)
}
