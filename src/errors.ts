import { BUFFERS, ERRORS } from './constants'

/**
 * The only error raised by this library (serializer hooks aside).
 *
 * Callers branch on {@link MemcacheError.kind}, one of the {@link ERRORS}.
 * Errors coming from the socket are wrapped with kind
 * {@link ERRORS.TRANSPORT} and kept as the `cause`.
 */
export class MemcacheError extends Error {
  readonly kind: ERRORS

  constructor(kind: ERRORS, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'MemcacheError'
    this.kind = kind
  }
}

/** Wrap anything thrown by the socket layer in a transport error */
export function transportError(error: unknown): MemcacheError {
  if (error instanceof MemcacheError) return error
  const message = error instanceof Error ? error.message : String(error)
  return new MemcacheError(ERRORS.TRANSPORT, message, { cause: error })
}

/** A reply we can not make sense of, keeping a short excerpt of it */
export function unknownResponse(line: string): MemcacheError {
  const excerpt = line.slice(0, BUFFERS.EXCERPT_SIZE)
  return new MemcacheError(ERRORS.UNKNOWN_RESPONSE, `Unknown response "${excerpt}"`)
}
