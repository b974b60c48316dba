import { expect } from 'chai'
import { constants, decode, ERRORS } from '../src/index'

/** Read lines, and the value following each "VALUE" line, as they come */
class Reader {
  readonly decoder = new decode.Decoder()
  readonly items: string[] = []
  #size?: number

  feed(chunk: Uint8Array): void {
    this.decoder.append(chunk)

    for (;;) {
      if (this.#size !== undefined) {
        const value = this.decoder.value(this.#size)
        if (value === undefined) return
        this.items.push(`<${value.toString('utf-8')}>`)
        this.#size = undefined
      } else {
        const line = this.decoder.line()
        if (line === undefined) return
        this.items.push(line)
        if (line.startsWith('VALUE ')) this.#size = Number(line.split(' ')[3])
      }
    }
  }
}

describe('Decoding Replies', () => {
  const stream = Buffer.from([
    'VALUE foo 1 3',
    'bar',
    'VALUE baz 0 10 12345',
    'line\r\nline', // a value containing a terminator
    'VALUE empty 0 0',
    '',
    'VALUE euro 1 3',
    '€', // three bytes in UTF-8
    'END',
    'STORED',
    '',
  ].join('\r\n'), 'utf-8')

  const expected = [
    'VALUE foo 1 3', '<bar>',
    'VALUE baz 0 10 12345', '<line\r\nline>',
    'VALUE empty 0 0', '<>',
    'VALUE euro 1 3', '<€>',
    'END',
    'STORED',
  ]

  it('should decode lines and values from chunks of any size', () => {
    for (let size = 1; size <= stream.length; size ++) {
      const reader = new Reader()

      for (let offset = 0; offset < stream.length; offset += size) {
        reader.feed(stream.subarray(offset, offset + size))
      }

      expect(reader.items, `chunk size ${size}`).to.eql(expected)
      expect(reader.decoder.pending, `chunk size ${size}`).to.have.length(0)
    }
  })

  it('should wait for a terminator split between chunks', () => {
    const decoder = new decode.Decoder()

    decoder.append(Buffer.from('END\r', 'utf-8'))
    expect(decoder.line()).to.be.undefined
    expect(decoder.line()).to.be.undefined

    decoder.append(Buffer.from('\nST', 'utf-8'))
    expect(decoder.line()).to.equal('END')
    expect(decoder.line()).to.be.undefined
    expect(decoder.pending.toString('utf-8')).to.equal('ST')
  })

  it('should copy appended chunks', () => {
    const decoder = new decode.Decoder()
    const chunk = Buffer.from('xxSTOREDxx', 'utf-8')

    decoder.append(chunk, 2, 8)
    chunk.fill(0)

    decoder.append(constants.TERMINATOR)
    expect(decoder.line()).to.equal('STORED')
  })

  it('should ignore empty chunks', () => {
    const decoder = new decode.Decoder()
    decoder.append(constants.EMPTY_BUFFER)
    decoder.append(Buffer.from('abc', 'utf-8'), 2, 2)
    expect(decoder.pending).to.have.length(0)
  })

  it('should wait for a whole value and its terminator', () => {
    const decoder = new decode.Decoder()

    decoder.append(Buffer.from('abc', 'utf-8'))
    expect(decoder.value(3)).to.be.undefined

    decoder.append(Buffer.from('\r', 'utf-8'))
    expect(decoder.value(3)).to.be.undefined

    decoder.append(Buffer.from('\nEND\r\n', 'utf-8'))
    expect(decoder.value(3)?.toString('utf-8')).to.equal('abc')
    expect(decoder.line()).to.equal('END')
  })

  it('should fail when a value is not followed by a terminator', () => {
    const decoder = new decode.Decoder()
    decoder.append(Buffer.from('abcdEND\r\n', 'utf-8'))

    expect(() => decoder.value(3))
        .to.throw('Unknown response "dEND\r\n"')
        .with.property('kind', ERRORS.UNKNOWN_RESPONSE)
  })

  it('should keep values returned when more data is appended', () => {
    const decoder = new decode.Decoder()
    decoder.append(Buffer.from('abc\r\nEN', 'utf-8'))

    const value = decoder.value(3)
    decoder.append(Buffer.from('D\r\nVALUE x 0 3\r\nxyz\r\n', 'utf-8'))

    expect(decoder.line()).to.equal('END')
    expect(decoder.line()).to.equal('VALUE x 0 3')
    expect(decoder.value(3)?.toString('utf-8')).to.equal('xyz')
    expect(value?.toString('utf-8')).to.equal('abc')
  })

  it('should read large values in linear time', function() {
    this.timeout(5000)

    for (const size of [ 1 << 20, 4 << 20, 16 << 20 ]) {
      const decoder = new decode.Decoder()
      decoder.append(Buffer.from(`VALUE big 0 ${size}\r\n`, 'utf-8'))
      expect(decoder.line()).to.equal(`VALUE big 0 ${size}`)

      const data = Buffer.alloc(size + 2, 0x61)
      data.write('\r\n', size, 'latin1')

      let value: Buffer | undefined
      for (let offset = 0; value === undefined; offset += 4096) {
        expect(offset, `size ${size}`).to.be.lessThan(data.length)
        decoder.append(data, offset, Math.min(offset + 4096, data.length))
        value = decoder.value(size)
      }

      expect(value).to.have.length(size)
      expect(value[0]).to.equal(0x61)
      expect(value[size - 1]).to.equal(0x61)
      // the value was collected in a single allocation
      expect(value.buffer.byteLength).to.equal(size + 2)

      decoder.append(Buffer.from('END\r\n', 'utf-8'))
      expect(decoder.line()).to.equal('END')
    }
  })

  it('should forget pending bytes when reset', () => {
    const decoder = new decode.Decoder()
    decoder.append(Buffer.from('END\r', 'utf-8'))
    expect(decoder.line()).to.be.undefined

    decoder.reset()
    decoder.append(Buffer.from('\nOK\r\n', 'utf-8'))
    expect(decoder.line()).to.equal('\nOK')
  })
})
