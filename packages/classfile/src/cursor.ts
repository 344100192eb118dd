import { FormatError } from '@tinyjvm/types'
import { decodeModifiedUtf8 } from './modified-utf8'

/**
 * Sequential big-endian reader over a byte buffer.
 * Every read past the end throws a FormatError naming the offset.
 */
export class ByteCursor {
  private readonly view: DataView
  private offset = 0

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  get position(): number {
    return this.offset
  }

  get remaining(): number {
    return this.bytes.length - this.offset
  }

  isAtEnd(): boolean {
    return this.offset >= this.bytes.length
  }

  readU1(): number {
    this.ensure(1)
    const val = this.view.getUint8(this.offset)
    this.offset += 1
    return val
  }

  readU2(): number {
    this.ensure(2)
    const val = this.view.getUint16(this.offset)
    this.offset += 2
    return val
  }

  readU4(): number {
    this.ensure(4)
    const val = this.view.getUint32(this.offset)
    this.offset += 4
    return val
  }

  readS4(): number {
    this.ensure(4)
    const val = this.view.getInt32(this.offset)
    this.offset += 4
    return val
  }

  readS8(): bigint {
    this.ensure(8)
    const val = this.view.getBigInt64(this.offset)
    this.offset += 8
    return val
  }

  readF4(): number {
    this.ensure(4)
    const val = this.view.getFloat32(this.offset)
    this.offset += 4
    return val
  }

  readF8(): number {
    this.ensure(8)
    const val = this.view.getFloat64(this.offset)
    this.offset += 8
    return val
  }

  readBytes(length: number): Uint8Array {
    this.ensure(length)
    const val = this.bytes.slice(this.offset, this.offset + length)
    this.offset += length
    return val
  }

  /**
   * Read a u2 length followed by that many bytes of modified UTF-8
   */
  readUtf8(): string {
    const length = this.readU2()
    const start = this.offset
    const [error, text] = decodeModifiedUtf8(this.readBytes(length))
    if (error) {
      throw new FormatError(error.message, start)
    }
    return text
  }

  /**
   * A cursor over the next `length` bytes; this cursor skips past them
   */
  sub(length: number): ByteCursor {
    return new ByteCursor(this.readBytes(length))
  }

  private ensure(length: number): void {
    if (length < 0 || this.offset + length > this.bytes.length) {
      throw new FormatError(
        `Unexpected end of data: needed ${length} bytes, ${this.remaining} left`,
        this.offset,
      )
    }
  }
}
