import type {
  ArrayObject,
  ClassObject,
  FieldType,
  InstanceObject,
  StringObject,
  Value,
} from '@tinyjvm/types'
import { defaultValueFor } from './values'

/**
 * Allocation site for every heap object of one interpreter run.
 *
 * Objects are plain records reachable from frames, statics and other objects;
 * the host collector reclaims them once nothing refers to them.
 */
export class Heap {
  private nextId = 1
  private readonly interned = new Map<string, StringObject>()
  private readonly classLiterals = new Map<string, ClassObject>()

  /** Objects allocated so far */
  get allocationCount(): number {
    return this.nextId - 1
  }

  newInstance(className: string, fields: Map<string, Value>): InstanceObject {
    return { kind: 'instance', id: this.allocateId(), className, fields }
  }

  /**
   * Array of `length` default-valued elements; callers check the length
   */
  newArray(componentType: FieldType, length: number): ArrayObject {
    const elements = Array.from({ length }, () => defaultValueFor(componentType))
    return { kind: 'array', id: this.allocateId(), componentType, elements }
  }

  newString(text: string): StringObject {
    return { kind: 'string', id: this.allocateId(), text }
  }

  /**
   * One shared object per distinct text, as string literals are
   */
  intern(text: string): StringObject {
    let object = this.interned.get(text)
    if (!object) {
      object = this.newString(text)
      this.interned.set(text, object)
    }
    return object
  }

  classLiteral(className: string): ClassObject {
    let object = this.classLiterals.get(className)
    if (!object) {
      object = { kind: 'class', id: this.allocateId(), className }
      this.classLiterals.set(className, object)
    }
    return object
  }

  private allocateId(): number {
    return this.nextId++
  }
}
