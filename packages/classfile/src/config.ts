/**
 * Class File Format Constants
 */

import type { ConstantTag } from '@tinyjvm/types'

export const CLASS_FILE_MAGIC = 0xcafebabe

// Tag byte of each constant-pool entry kind
export const CONSTANT_TAGS = {
  Utf8: 1,
  Integer: 3,
  Float: 4,
  Long: 5,
  Double: 6,
  Class: 7,
  String: 8,
  Fieldref: 9,
  Methodref: 10,
  InterfaceMethodref: 11,
  NameAndType: 12,
  MethodHandle: 15,
  MethodType: 16,
  InvokeDynamic: 18,
} as const satisfies Record<ConstantTag, number>

// Tags that are valid in a class file but have no decoder here
export const UNSUPPORTED_CONSTANT_TAGS: Record<number, string> = {
  17: 'Dynamic',
  19: 'Module',
  20: 'Package',
}

export const CLASS_ACCESS_FLAGS = {
  ACC_PUBLIC: 0x0001,
  ACC_FINAL: 0x0010,
  ACC_SUPER: 0x0020,
  ACC_INTERFACE: 0x0200,
  ACC_ABSTRACT: 0x0400,
  ACC_SYNTHETIC: 0x1000,
  ACC_ANNOTATION: 0x2000,
  ACC_ENUM: 0x4000,
} as const

export const FIELD_ACCESS_FLAGS = {
  ACC_PUBLIC: 0x0001,
  ACC_PRIVATE: 0x0002,
  ACC_PROTECTED: 0x0004,
  ACC_STATIC: 0x0008,
  ACC_FINAL: 0x0010,
  ACC_VOLATILE: 0x0040,
  ACC_TRANSIENT: 0x0080,
  ACC_SYNTHETIC: 0x1000,
  ACC_ENUM: 0x4000,
} as const

export const METHOD_ACCESS_FLAGS = {
  ACC_PUBLIC: 0x0001,
  ACC_PRIVATE: 0x0002,
  ACC_PROTECTED: 0x0004,
  ACC_STATIC: 0x0008,
  ACC_FINAL: 0x0010,
  ACC_SYNCHRONIZED: 0x0020,
  ACC_BRIDGE: 0x0040,
  ACC_VARARGS: 0x0080,
  ACC_NATIVE: 0x0100,
  ACC_ABSTRACT: 0x0400,
  ACC_STRICT: 0x0800,
  ACC_SYNTHETIC: 0x1000,
} as const

/**
 * Names of the flags set in `value`, in table order
 */
export function parseFlags(
  value: number,
  flags: Readonly<Record<string, number>>,
): string[] {
  return Object.entries(flags)
    .filter(([, mask]) => (value & mask) !== 0)
    .map(([name]) => name)
}
