import { logger } from '@tinyjvm/core'
import { RuntimeFault, TypeFault, type Value } from '@tinyjvm/types'
import { beforeAll, describe, expect, it } from 'vitest'
import { doubleValue, floatValue, intValue } from '../values'
import { createInterpreter, defineClass, PoolBuilder, returned, u2 } from './test-utils'

beforeAll(() => {
  logger.init()
})

function run(
  descriptor: string,
  code: number[],
  args: Value[] = [],
  pool: PoolBuilder = new PoolBuilder(),
  maxLocals?: number,
) {
  const classDefinition = defineClass({
    name: 'demo/Ops',
    pool,
    methods: [{ name: 'run', descriptor, code, maxLocals }],
  })
  return createInterpreter().execute(classDefinition, 'run', descriptor, args)
}

/** Operand stack just before the trailing return */
function stackAfter(code: number[]): string[] | undefined {
  const classDefinition = defineClass({
    name: 'demo/Shuffle',
    methods: [{ name: 'run', descriptor: '()V', code: [...code, 0xb1] }],
  })
  const interpreter = createInterpreter([], { trace: true })
  const [error] = interpreter.execute(classDefinition, 'run', '()V')
  if (error) throw error
  const logs = interpreter.getExecutionLogs()
  return logs[logs.length - 1]?.stack
}

describe('Instructions', () => {
  describe('stack shuffles', () => {
    it('dup_x1 copies the top value beneath the second', () => {
      expect(stackAfter([0x04, 0x05, 0x5a])).toEqual(['int 2', 'int 1', 'int 2'])
    })

    it('dup_x2 inserts beneath two single-slot values or one long', () => {
      expect(stackAfter([0x04, 0x05, 0x06, 0x5b])).toEqual(['int 3', 'int 1', 'int 2', 'int 3'])
      expect(stackAfter([0x0a, 0x05, 0x5b])).toEqual(['int 2', 'long 1', 'int 2'])
    })

    it('dup2_x1 copies two ints or one long beneath the next value', () => {
      expect(stackAfter([0x04, 0x05, 0x06, 0x5d])).toEqual([
        'int 2',
        'int 3',
        'int 1',
        'int 2',
        'int 3',
      ])
      expect(stackAfter([0x04, 0x09, 0x5d])).toEqual(['long 0', 'int 1', 'long 0'])
    })

    it('dup2_x2 copies the top two slots beneath the next two', () => {
      expect(stackAfter([0x04, 0x05, 0x06, 0x07, 0x5e])).toEqual([
        'int 3',
        'int 4',
        'int 1',
        'int 2',
        'int 3',
        'int 4',
      ])
      expect(stackAfter([0x09, 0x0a, 0x5e])).toEqual(['long 1', 'long 0', 'long 1'])
    })

    it('refuses to dup half of a long', () => {
      expect(() => stackAfter([0x09, 0x59])).toThrow(TypeFault)
    })
  })

  describe('wide', () => {
    it('addresses locals past 255 and takes a 16-bit iinc constant', () => {
      const code = [
        0x11, 0x03, 0xe8, // sipush 1000
        0xc4, 0x36, ...u2(260), // wide istore 260
        0xc4, 0x84, ...u2(260), 0xf8, 0x30, // wide iinc 260 -2000
        0x0a, // lconst_1
        0xc4, 0x37, ...u2(298), // wide lstore 298
        0xc4, 0x15, ...u2(260), // wide iload 260
        0xc4, 0x16, ...u2(298), // wide lload 298
        0x88, // l2i
        0x60, // iadd
        0xac,
      ]
      const [error, result] = run('()I', code, [], new PoolBuilder(), 300)
      expect(error).toBeUndefined()
      expect(result?.returnValue).toEqual(intValue(-999))
    })
  })

  describe('conversions', () => {
    const f2i = (value: number) =>
      returned(run('(F)I', [0x22, 0x8b, 0xac], [floatValue(value)])[1]?.returnValue)
    const d2l = (value: number) => {
      const [, result] = run('(D)J', [0x26, 0x8f, 0xad], [doubleValue(value)], new PoolBuilder(), 2)
      return returned(result?.returnValue)
    }

    it('f2i sends NaN to zero and saturates', () => {
      expect(f2i(Number.NaN)).toBe(0)
      expect(f2i(Number.POSITIVE_INFINITY)).toBe(2147483647)
      expect(f2i(Number.NEGATIVE_INFINITY)).toBe(-2147483648)
      expect(f2i(1e10)).toBe(2147483647)
      expect(f2i(-2.5)).toBe(-2)
    })

    it('d2l sends NaN to zero and saturates', () => {
      expect(d2l(Number.NaN)).toBe(0n)
      expect(d2l(Number.POSITIVE_INFINITY)).toBe(2n ** 63n - 1n)
      expect(d2l(Number.NEGATIVE_INFINITY)).toBe(-(2n ** 63n))
      expect(d2l(-3.9)).toBe(-3n)
    })

    it('l2f rounds the long straight to float precision', () => {
      const pool = new PoolBuilder()
      const value = pool.long(2n ** 60n + 2n ** 36n + 1n)
      const [error, result] = run('()F', [0x14, ...u2(value), 0x89, 0xae], [], pool)
      expect(error).toBeUndefined()
      expect(returned(result?.returnValue)).toBe(2 ** 60 + 2 ** 37)
    })
  })

  describe('floating-point comparison', () => {
    const fcmp = (opcode: number, left: number, right: number) =>
      returned(
        run('(FF)I', [0x22, 0x23, opcode, 0xac], [floatValue(left), floatValue(right)])[1]
          ?.returnValue,
      )
    const dcmp = (opcode: number, left: number, right: number) =>
      returned(
        run(
          '(DD)I',
          [0x26, 0x28, opcode, 0xac],
          [doubleValue(left), doubleValue(right)],
          new PoolBuilder(),
          4,
        )[1]?.returnValue,
      )

    it('fcmpl and fcmpg differ only on NaN', () => {
      expect(fcmp(0x95, Number.NaN, 1)).toBe(-1)
      expect(fcmp(0x96, Number.NaN, 1)).toBe(1)
      expect(fcmp(0x95, 2, 1)).toBe(1)
      expect(fcmp(0x96, 1, 2)).toBe(-1)
      expect(fcmp(0x95, 1, 1)).toBe(0)
    })

    it('dcmpl and dcmpg differ only on NaN', () => {
      expect(dcmp(0x97, 1, Number.NaN)).toBe(-1)
      expect(dcmp(0x98, 1, Number.NaN)).toBe(1)
      expect(dcmp(0x97, 2, 1)).toBe(1)
      expect(dcmp(0x98, 1, 2)).toBe(-1)
      expect(dcmp(0x98, 1, 1)).toBe(0)
    })
  })

  describe('array types', () => {
    it('casts a String[] to Object[]', () => {
      const pool = new PoolBuilder()
      const string = pool.classRef('java/lang/String')
      const objects = pool.classRef('[Ljava/lang/Object;')
      // iconst_1; anewarray String; checkcast Object[]; arraylength; ireturn
      const code = [0x04, 0xbd, ...u2(string), 0xc0, ...u2(objects), 0xbe, 0xac]
      const [error, result] = run('()I', code, [], pool)
      expect(error).toBeUndefined()
      expect(result?.returnValue).toEqual(intValue(1))
    })

    it('treats every array as Serializable', () => {
      const pool = new PoolBuilder()
      const string = pool.classRef('java/lang/String')
      const serializable = pool.classRef('java/io/Serializable')
      const code = [0x04, 0xbd, ...u2(string), 0xc1, ...u2(serializable), 0xac]
      const [, result] = run('()I', code, [], pool)
      expect(result?.returnValue).toEqual(intValue(1))
    })

    it('keeps primitive arrays out of Object[]', () => {
      const pool = new PoolBuilder()
      const objects = pool.classRef('[Ljava/lang/Object;')
      // iconst_1; newarray int; instanceof Object[]; ireturn
      const code = [0x04, 0xbc, 10, 0xc1, ...u2(objects), 0xac]
      const [, result] = run('()I', code, [], pool)
      expect(result?.returnValue).toEqual(intValue(0))
    })

    it('fails a cast from int[] to Object[]', () => {
      const pool = new PoolBuilder()
      const objects = pool.classRef('[Ljava/lang/Object;')
      const code = [0x04, 0xbc, 10, 0xc0, ...u2(objects), 0xbe, 0xac]
      const [error] = run('()I', code, [], pool)
      expect(error).toBeInstanceOf(RuntimeFault)
    })
  })
})
