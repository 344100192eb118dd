import { logger } from '@tinyjvm/core'
import { FormatError, RESOLUTION_ERRORS, ResolutionError } from '@tinyjvm/types'
import { beforeAll, describe, expect, it } from 'vitest'
import { ConstantPool } from '../constant-pool'
import { PoolBuilder } from './test-utils'

beforeAll(() => {
  logger.init()
})

describe('ConstantPool', () => {
  describe('layout', () => {
    it('keeps class-file numbering across wide constants', () => {
      const [error, pool] = ConstantPool.build([
        { tag: 'Long', value: 5n }, // #1, #2
        { tag: 'Integer', value: 7 }, // #3
        { tag: 'Double', value: 1.5 }, // #4, #5
        { tag: 'Utf8', text: 'x' }, // #6
      ])
      expect(error).toBeUndefined()
      expect(pool?.size).toBe(7)
      expect(pool?.entryAt(2)).toBeNull()
      expect(pool?.entryAt(3)).toEqual({ tag: 'Integer', value: 7 })
      expect(pool?.entries().map(([index]) => index)).toEqual([1, 3, 4, 6])
    })

    it('rejects an embedded index outside the table', () => {
      const [error] = ConstantPool.build([{ tag: 'Class', nameIndex: 9 }])
      expect(error).toBeInstanceOf(FormatError)
      expect(error?.message).toBe('Constant #1 (Class) name_index 9 is outside [1, 2)')
    })

    it('rejects an embedded index naming the upper half of a wide constant', () => {
      const [error] = ConstantPool.build([
        { tag: 'Double', value: 2 },
        { tag: 'String', utf8Index: 2 },
      ])
      expect(error).toBeInstanceOf(FormatError)
      expect(error?.message).toContain('names the unusable half of a wide constant')
    })
  })

  describe('resolution', () => {
    it('follows a method reference down to its names', () => {
      const builder = new PoolBuilder()
      const index = builder.methodref('demo/Calc', 'add', '(II)I')
      const pool = builder.build()

      const [error, reference] = pool.resolveMethodRef(index)
      expect(error).toBeUndefined()
      expect(reference).toEqual({
        className: 'demo/Calc',
        name: 'add',
        descriptor: '(II)I',
      })
    })

    it('splits a name-and-type pair', () => {
      const builder = new PoolBuilder()
      const index = builder.nameAndType('count', 'J')
      expect(builder.build().resolveNameAndType(index)).toEqual([
        undefined,
        { name: 'count', descriptor: 'J' },
      ])
    })

    it('answers the same value on every call', () => {
      const builder = new PoolBuilder()
      const index = builder.fieldref('demo/Box', 'size', 'I')
      const pool = builder.build()

      const first = pool.resolve(index, 'Fieldref')
      const second = pool.resolve(index, 'Fieldref')
      expect(first[1]).toEqual(second[1])
      expect(first[1]).toEqual({
        kind: 'Fieldref',
        className: 'demo/Box',
        name: 'size',
        descriptor: 'I',
      })
    })

    it('resolves loadable constants', () => {
      const builder = new PoolBuilder()
      const text = builder.string('hello')
      const big = builder.long(1n << 40n)
      const pool = builder.build()

      expect(pool.resolveLoadable(text)[1]).toEqual({ kind: 'String', text: 'hello' })
      expect(pool.resolveLoadable(big)[1]).toEqual({ kind: 'Long', value: 1n << 40n })
    })

    it('reports an index out of range', () => {
      const pool = new PoolBuilder().build()
      const [error] = pool.resolve(3, 'Utf8')
      expect(error).toBeInstanceOf(ResolutionError)
      expect(error?.reason).toBe(RESOLUTION_ERRORS.INDEX_OUT_OF_RANGE)
      expect(error?.index).toBe(3)
    })

    it('reports slot 0 as out of range', () => {
      const builder = new PoolBuilder()
      builder.utf8('a')
      const [error] = builder.build().resolve(0, 'Utf8')
      expect(error?.reason).toBe(RESOLUTION_ERRORS.INDEX_OUT_OF_RANGE)
    })

    it('reports the upper half of a Long as unusable', () => {
      const builder = new PoolBuilder()
      builder.long(10n)
      const [error] = builder.build().resolve(2, 'Long')
      expect(error?.reason).toBe(RESOLUTION_ERRORS.UNUSABLE_SLOT)
      expect(error?.index).toBe(2)
    })

    it('reports a kind mismatch at the requested index', () => {
      const builder = new PoolBuilder()
      const index = builder.integer(42)
      const [error] = builder.build().resolveClassName(index)
      expect(error?.reason).toBe(RESOLUTION_ERRORS.KIND_MISMATCH)
      expect(error?.message).toBe('Constant #1 is Integer, expected Class')
    })

    it('reports a kind mismatch found while dereferencing', () => {
      const [, pool] = ConstantPool.build([
        { tag: 'Class', nameIndex: 2 }, // #1
        { tag: 'Integer', value: 3 }, // #2
      ])
      const [error] = pool ? pool.resolveClassName(1) : [undefined]
      expect(error?.reason).toBe(RESOLUTION_ERRORS.KIND_MISMATCH)
      expect(error?.index).toBe(2)
    })

    it('detects a reference cycle', () => {
      const [, pool] = ConstantPool.build([{ tag: 'Class', nameIndex: 1 }])
      const [error] = pool ? pool.resolveClassName(1) : [undefined]
      expect(error?.reason).toBe(RESOLUTION_ERRORS.CYCLE)
    })
  })
})
