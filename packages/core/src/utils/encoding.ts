/**
 * Encoding Utilities
 *
 * Hex rendering for opcodes and magic numbers
 */

import { type Hex, toHex } from 'viem'

export type { Hex }

/**
 * Render a byte as 0xNN
 */
export function byteToHex(value: number): Hex {
  return toHex(value & 0xff, { size: 1 })
}

/**
 * Render an unsigned 32-bit value as 0xNNNNNNNN
 */
export function u32ToHex(value: number): Hex {
  return toHex(value >>> 0, { size: 4 })
}
