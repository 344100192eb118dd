import { RUNTIME_FAULTS, RuntimeFault, type Value } from '@tinyjvm/types'
import { describe, expect, it } from 'vitest'
import { MapClassRegistry } from '../class-registry'
import { createNativeTable, nativeKey } from '../natives'
import { Runtime } from '../runtime'
import { intValue, NULL_VALUE, referenceValue } from '../values'
import { captureConsole } from './test-utils'

function setup() {
  const console = captureConsole()
  const runtime = new Runtime(new MapClassRegistry(), console)
  const natives = createNativeTable()
  const call = (className: string, name: string, descriptor: string, args: Value[]) => {
    const native = natives.get(nativeKey(className, name, descriptor))
    if (!native) throw new Error(`no native ${className}.${name}${descriptor}`)
    return native(runtime, args)
  }
  const string = (text: string) => referenceValue(runtime.heap.newString(text))
  return { console, runtime, call, string }
}

describe('bootstrap natives', () => {
  it('measures and indexes strings', () => {
    const { call, string } = setup()
    expect(call('java/lang/String', 'length', '()I', [string('hello')])).toEqual(intValue(5))
    expect(call('java/lang/String', 'charAt', '(I)C', [string('hello'), intValue(1)])).toEqual(
      intValue(0x65),
    )
    expect(call('java/lang/String', 'isEmpty', '()Z', [string('')])).toEqual(intValue(1))
  })

  it('faults on a character index past the end', () => {
    const { call, string } = setup()
    expect(() => call('java/lang/String', 'charAt', '(I)C', [string('ab'), intValue(2)])).toThrow(
      'String index 2 out of bounds for length 2',
    )
  })

  it('hashes strings with the 31-based polynomial', () => {
    const { call, string } = setup()
    expect(call('java/lang/String', 'hashCode', '()I', [string('hi')])).toEqual(intValue(3329))
  })

  it('compares strings by content', () => {
    const { call, string } = setup()
    const equals = (left: Value, right: Value) =>
      call('java/lang/String', 'equals', '(Ljava/lang/Object;)Z', [left, right])
    expect(equals(string('a'), string('a'))).toEqual(intValue(1))
    expect(equals(string('a'), string('b'))).toEqual(intValue(0))
    expect(equals(string('a'), NULL_VALUE)).toEqual(intValue(0))
  })

  it('concatenates into a new string and rejects null', () => {
    const { call, string } = setup()
    const result = call('java/lang/String', 'concat', '(Ljava/lang/String;)Ljava/lang/String;', [
      string('foo'),
      string('bar'),
    ])
    expect(result?.type === 'reference' && result.value.kind === 'string' && result.value.text).toBe(
      'foobar',
    )

    let fault: unknown
    try {
      call('java/lang/String', 'concat', '(Ljava/lang/String;)Ljava/lang/String;', [
        string('foo'),
        NULL_VALUE,
      ])
    } catch (error) {
      fault = error
    }
    expect(fault).toBeInstanceOf(RuntimeFault)
    expect(fault instanceof RuntimeFault && fault.reason).toBe(RUNTIME_FAULTS.NULL_POINTER)
  })

  it('prints each argument type the way String.valueOf does', () => {
    const { call, console, runtime } = setup()
    const out = referenceValue(runtime.newInstance(runtime.resolveClass('java/io/PrintStream')))
    call('java/io/PrintStream', 'print', '(Z)V', [out, intValue(1)])
    call('java/io/PrintStream', 'print', '(C)V', [out, intValue(0x41)])
    call('java/io/PrintStream', 'println', '(Ljava/lang/Object;)V', [out, NULL_VALUE])
    call('java/io/PrintStream', 'println', '()V', [out])
    expect(console.output).toBe('trueAnull\n\n')
  })

  it('gives System.out a PrintStream when System initialises', () => {
    const { call, runtime } = setup()
    const system = runtime.resolveClass('java/lang/System')
    expect(runtime.isInitialized('java/lang/System')).toBe(false)
    expect(runtime.initialize(system)?.method.name).toBe('<clinit>')
    expect(runtime.isInitialized('java/lang/System')).toBe(true)
    expect(runtime.isInitialized('java/lang/Object')).toBe(true)
    call('java/lang/System', '<clinit>', '()V', [])

    const out = system.findField('out')
    if (!out) throw new Error('System.out not declared')
    const value = runtime.getStatic(system, out)
    expect(value.type === 'reference' && value.value.kind === 'instance' && value.value.className).toBe(
      'java/io/PrintStream',
    )
  })
})
