/**
 * Modified UTF-8
 *
 * Class files store strings as UTF-16 code units packed one, two or three bytes
 * at a time. U+0000 takes the two-byte form and supplementary characters are
 * written as two three-byte surrogates, so standard UTF-8 decoders reject both.
 */

import { type Safe, safeError, safeResult } from '@tinyjvm/types'

export function decodeModifiedUtf8(bytes: Uint8Array): Safe<string> {
  const units: number[] = []
  let i = 0
  while (i < bytes.length) {
    const a = bytes[i]
    if ((a & 0x80) === 0) {
      if (a === 0) {
        return safeError(new Error(`Invalid zero byte in modified UTF-8 at ${i}`))
      }
      units.push(a)
      i += 1
    } else if ((a & 0xe0) === 0xc0) {
      const b = bytes[i + 1]
      if (b === undefined || (b & 0xc0) !== 0x80) {
        return safeError(new Error(`Truncated two-byte sequence at ${i}`))
      }
      units.push(((a & 0x1f) << 6) | (b & 0x3f))
      i += 2
    } else if ((a & 0xf0) === 0xe0) {
      const b = bytes[i + 1]
      const c = bytes[i + 2]
      if (
        b === undefined ||
        c === undefined ||
        (b & 0xc0) !== 0x80 ||
        (c & 0xc0) !== 0x80
      ) {
        return safeError(new Error(`Truncated three-byte sequence at ${i}`))
      }
      units.push(((a & 0x0f) << 12) | ((b & 0x3f) << 6) | (c & 0x3f))
      i += 3
    } else {
      return safeError(
        new Error(`Invalid modified UTF-8 lead byte 0x${a.toString(16)} at ${i}`),
      )
    }
  }
  return safeResult(String.fromCharCode(...units))
}

export function encodeModifiedUtf8(text: string): Uint8Array {
  const out: number[] = []
  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i)
    if (unit !== 0 && unit < 0x80) {
      out.push(unit)
    } else if (unit < 0x800) {
      out.push(0xc0 | (unit >> 6), 0x80 | (unit & 0x3f))
    } else {
      out.push(
        0xe0 | (unit >> 12),
        0x80 | ((unit >> 6) & 0x3f),
        0x80 | (unit & 0x3f),
      )
    }
  }
  return Uint8Array.from(out)
}
