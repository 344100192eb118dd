import { FormatError } from '@tinyjvm/types'
import { describe, expect, it } from 'vitest'
import { parseFieldDescriptor, parseMethodDescriptor, toDescriptor } from '../descriptor'
import { Heap } from '../heap'
import {
  describeValue,
  doubleValue,
  floatValue,
  formatDouble,
  formatFloat,
  formatValue,
  intValue,
  longValue,
  NULL_VALUE,
  narrowInt,
  referenceValue,
} from '../values'

describe('value constructors', () => {
  it('wrap to the width of their category', () => {
    expect(intValue(2 ** 31)).toEqual({ type: 'int', value: -(2 ** 31) })
    expect(longValue(2n ** 63n)).toEqual({ type: 'long', value: -(2n ** 63n) })
    expect(floatValue(0.1).value).toBe(Math.fround(0.1))
  })

  it('narrow sub-int storage', () => {
    expect(narrowInt(200, { kind: 'base', descriptor: 'B' })).toBe(-56)
    expect(narrowInt(-1, { kind: 'base', descriptor: 'C' })).toBe(0xffff)
    expect(narrowInt(3, { kind: 'base', descriptor: 'Z' })).toBe(1)
  })
})

describe('formatting', () => {
  it('spells doubles the way Double.toString does', () => {
    expect(formatDouble(100)).toBe('100.0')
    expect(formatDouble(0.5)).toBe('0.5')
    expect(formatDouble(1e7)).toBe('1.0E7')
    expect(formatDouble(1.5e-4)).toBe('1.5E-4')
    expect(formatDouble(-0)).toBe('-0.0')
    expect(formatDouble(Number.NaN)).toBe('NaN')
    expect(formatDouble(Number.NEGATIVE_INFINITY)).toBe('-Infinity')
  })

  it('spells floats with the fewest digits that survive single precision', () => {
    expect(formatFloat(Math.fround(0.1))).toBe('0.1')
    expect(formatFloat(Math.fround(3.25))).toBe('3.25')
  })

  it('renders every category', () => {
    const heap = new Heap()
    expect(formatValue(intValue(-3))).toBe('-3')
    expect(formatValue(longValue(12n))).toBe('12')
    expect(formatValue(doubleValue(2))).toBe('2.0')
    expect(formatValue(NULL_VALUE)).toBe('null')
    expect(formatValue(referenceValue(heap.newString('text')))).toBe('text')
    expect(formatValue(referenceValue(heap.newInstance('demo/Thing', new Map())))).toBe(
      'demo.Thing@2',
    )
  })

  it('tags values in trace rendering', () => {
    const heap = new Heap()
    expect(describeValue(intValue(5))).toBe('int 5')
    expect(describeValue(floatValue(1.5))).toBe('float 1.5')
    expect(describeValue(referenceValue(heap.newString('hi')))).toBe('ref "hi"')
    expect(describeValue(NULL_VALUE)).toBe('null')
  })
})

describe('Heap', () => {
  it('shares interned strings and class literals', () => {
    const heap = new Heap()
    expect(heap.intern('a')).toBe(heap.intern('a'))
    expect(heap.classLiteral('demo/A')).toBe(heap.classLiteral('demo/A'))
    expect(heap.newString('a')).not.toBe(heap.intern('a'))
    expect(heap.allocationCount).toBe(3)
  })

  it('fills new arrays with the component default', () => {
    const array = new Heap().newArray({ kind: 'base', descriptor: 'J' }, 2)
    expect(array.elements).toEqual([longValue(0n), longValue(0n)])
  })
})

describe('descriptors', () => {
  it('parses a method descriptor with wide and array parameters', () => {
    const [error, descriptor] = parseMethodDescriptor('(IJ[Ljava/lang/String;D)V')
    expect(error).toBeUndefined()
    expect(descriptor?.parameters.map(toDescriptor)).toEqual([
      'I',
      'J',
      '[Ljava/lang/String;',
      'D',
    ])
    expect(descriptor?.returnType).toBeNull()
    expect(descriptor?.parameterSlots).toBe(6)
  })

  it('rejects trailing characters in a field descriptor', () => {
    const [error] = parseFieldDescriptor('II')
    expect(error).toBeInstanceOf(FormatError)
  })

  it('rejects an unterminated class name', () => {
    const [error] = parseMethodDescriptor('(Ljava/lang/String)V')
    expect(error).toBeInstanceOf(FormatError)
  })
})
