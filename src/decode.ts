import { BUFFERS, EMPTY_BUFFER, TERMINATOR } from './constants'
import { unknownResponse } from './errors'

// Replies are a sequence of lines, each terminated by "\r\n", where a
// "VALUE <key> <flags> <size>" line is followed by exactly <size> bytes of
// data and another "\r\n":
//
// VALUE foo 0 3\r\n
// bar\r\n
// END\r\n
//
// Chunks read from the socket can split any of this anywhere, including
// right between the "\r" and the "\n" of a terminator.

/**
 * An incremental parser extracting lines and values from a byte stream.
 *
 * Chunks are fed with {@link Decoder.append}, and consumed with
 * {@link Decoder.line} or {@link Decoder.value}, which return `undefined`
 * until enough bytes have been appended. Whatever follows the last line or
 * value returned is kept _pending_ for the next call.
 *
 * Bytes are kept in a single buffer, growing geometrically. While a value
 * is awaited, the buffer is sized to hold it whole, so that each byte of
 * the value is copied once.
 */
export class Decoder {
  #buffer: Buffer = EMPTY_BUFFER
  #start = 0 // first pending byte in #buffer
  #end = 0 // end of the pending bytes in #buffer
  #scanned = 0 // pending bytes known not to contain a terminator
  #shared = false // a value returned by "value()" still views #buffer

  /** A view of the bytes appended but not yet consumed */
  get pending(): Buffer {
    return this.#buffer.subarray(this.#start, this.#end)
  }

  /** Append a chunk of data, copying it (sockets recycle their buffers) */
  append(chunk: Uint8Array, start: number = 0, end: number = chunk.length): void {
    if (start >= end) return

    this.#reserve(end - start, false)
    this.#buffer.set(chunk.subarray(start, end), this.#end)
    this.#end += end - start
  }

  /** Return the next line (without its terminator) or `undefined` */
  line(): string | undefined {
    const pending = this.pending

    // a "\r" at the very end of what we scanned might be followed by "\n"
    const from = this.#scanned > 0 ? this.#scanned - 1 : 0
    const index = pending.indexOf(TERMINATOR, from)

    if (index < 0) {
      this.#scanned = pending.length
      return
    }

    const line = pending.toString('utf-8', 0, index)
    this.#consume(index + TERMINATOR.length)
    return line
  }

  /**
   * Return the next _size_ bytes (followed by a terminator) or `undefined`.
   *
   * The returned {@link Buffer} is _not_ a copy, but it is never written to
   * by this decoder again.
   */
  value(size: number): Buffer | undefined {
    const length = size + TERMINATOR.length
    const pending = this.pending

    if (pending.length < length) {
      this.#reserve(length - pending.length, true)
      return
    }

    if (! pending.subarray(size, length).equals(TERMINATOR)) {
      throw unknownResponse(pending.toString('utf-8', size))
    }

    const value = pending.subarray(0, size)
    this.#shared = true
    this.#consume(length)
    return value
  }

  /** Forget all pending bytes */
  reset(): void {
    this.#buffer = EMPTY_BUFFER
    this.#start = this.#end = this.#scanned = 0
    this.#shared = false
  }

  /** Make room for _length_ more bytes after the pending ones */
  #reserve(length: number, exact: boolean): void {
    if ((! this.#shared) && (this.#end + length <= this.#buffer.length)) return

    const pending = this.#end - this.#start
    const needed = pending + length

    if ((! this.#shared) && (exact ? needed : needed * 2) <= this.#buffer.length) {
      this.#buffer.copy(this.#buffer, 0, this.#start, this.#end)
    } else {
      const buffer = Buffer.allocUnsafeSlow(exact ? needed : Math.max(needed * 2, BUFFERS.RECV_SIZE))
      this.#buffer.copy(buffer, 0, this.#start, this.#end)
      this.#buffer = buffer
      this.#shared = false
    }

    this.#start = 0
    this.#end = pending
  }

  #consume(length: number): void {
    this.#start += length
    this.#scanned = 0

    if (this.#start < this.#end) return
    if (this.#shared) this.#buffer = EMPTY_BUFFER
    this.#start = this.#end = 0
    this.#shared = false
  }
}
