import { encodeModifiedUtf8 } from './modified-utf8'

/**
 * Growable big-endian byte sink, the encoding counterpart of ByteCursor
 */
export class ByteWriter {
  private buffer = new Uint8Array(256)
  private view = new DataView(this.buffer.buffer)
  private length = 0

  get size(): number {
    return this.length
  }

  writeU1(value: number): this {
    this.grow(1)
    this.view.setUint8(this.length, value)
    this.length += 1
    return this
  }

  writeU2(value: number): this {
    this.grow(2)
    this.view.setUint16(this.length, value)
    this.length += 2
    return this
  }

  writeU4(value: number): this {
    this.grow(4)
    this.view.setUint32(this.length, value >>> 0)
    this.length += 4
    return this
  }

  writeS4(value: number): this {
    this.grow(4)
    this.view.setInt32(this.length, value)
    this.length += 4
    return this
  }

  writeS8(value: bigint): this {
    this.grow(8)
    this.view.setBigInt64(this.length, BigInt.asIntN(64, value))
    this.length += 8
    return this
  }

  writeF4(value: number): this {
    this.grow(4)
    this.view.setFloat32(this.length, value)
    this.length += 4
    return this
  }

  writeF8(value: number): this {
    this.grow(8)
    this.view.setFloat64(this.length, value)
    this.length += 8
    return this
  }

  writeBytes(bytes: Uint8Array): this {
    this.grow(bytes.length)
    this.buffer.set(bytes, this.length)
    this.length += bytes.length
    return this
  }

  /**
   * u2 length followed by modified UTF-8 bytes
   */
  writeUtf8(text: string): this {
    const encoded = encodeModifiedUtf8(text)
    return this.writeU2(encoded.length).writeBytes(encoded)
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length)
  }

  private grow(extra: number): void {
    if (this.length + extra <= this.buffer.length) return
    let capacity = this.buffer.length * 2
    while (capacity < this.length + extra) capacity *= 2
    const next = new Uint8Array(capacity)
    next.set(this.buffer.subarray(0, this.length))
    this.buffer = next
    this.view = new DataView(next.buffer)
  }
}
