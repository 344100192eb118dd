/**
 * Per-run execution state
 *
 * Heap, static storage and class initialisation belong to one interpreter
 * run; class definitions and their pools are only read.
 */

import {
  type FieldType,
  type HeapObject,
  type InstanceObject,
  type LoadableConstant,
  type MemberReference,
  RESOLUTION_ERRORS,
  ResolutionError,
  TypeFault,
  unwrapSafe,
  type Value,
} from '@tinyjvm/types'
import {
  type ClassDefinition,
  type FieldInfo,
  isStatic,
  type MethodInfo,
} from './class-definition'
import type { ClassRegistry } from './class-registry'
import { CLASS_INITIALIZER, OBJECT_CLASS, STRING_CLASS } from './config'
import { classNameToType } from './descriptor'
import { Heap } from './heap'
import type { ConsoleSink, PendingInvocation } from './types'
import {
  defaultValueFor,
  doubleValue,
  floatValue,
  intValue,
  longValue,
  matchesStackType,
  referenceValue,
  stackTypeOf,
} from './values'

/** Classes and interfaces every array type widens to */
const ARRAY_SUPERTYPES = new Set([OBJECT_CLASS, 'java/lang/Cloneable', 'java/io/Serializable'])

export interface ResolvedField {
  owner: ClassDefinition
  field: FieldInfo
}

export interface ResolvedMethod {
  owner: ClassDefinition
  method: MethodInfo
}

export class Runtime {
  readonly heap = new Heap()
  private readonly statics = new Map<string, Map<string, Value>>()
  private readonly initialized = new Set<string>()
  /** Classes handed to execute() directly, consulted before the registry */
  private readonly local = new Map<string, ClassDefinition>()

  constructor(
    private readonly classes: ClassRegistry,
    readonly console: ConsoleSink,
  ) {}

  addClass(classDefinition: ClassDefinition): void {
    this.local.set(classDefinition.name, classDefinition)
  }

  /**
   * Look a class up, throwing the registry's error
   */
  resolveClass(name: string): ClassDefinition {
    const local = this.local.get(name)
    if (local) return local
    return unwrapSafe(this.classes.resolveClass(name))
  }

  superclassOf(classDefinition: ClassDefinition): ClassDefinition | null {
    return classDefinition.superName === null
      ? null
      : this.resolveClass(classDefinition.superName)
  }

  /**
   * Whether `className` is `target` or extends or implements it
   */
  isSubclassOf(className: string, target: string): boolean {
    if (className === target || target === OBJECT_CLASS) return true
    const classDefinition = this.resolveClass(className)
    if (classDefinition.interfaces.some((name) => this.isSubclassOf(name, target))) {
      return true
    }
    return (
      classDefinition.superName !== null &&
      this.isSubclassOf(classDefinition.superName, target)
    )
  }

  /**
   * Prepare static storage for `classDefinition` and its superclasses,
   * outermost first. Returns the first class initialiser still to run, already
   * marked as started, or null once the whole chain is initialised.
   */
  initialize(classDefinition: ClassDefinition): PendingInvocation | null {
    const chain: ClassDefinition[] = []
    for (
      let current: ClassDefinition | null = classDefinition;
      current && !this.initialized.has(current.name);
      current = this.superclassOf(current)
    ) {
      chain.unshift(current)
    }

    for (const owner of chain) {
      this.initialized.add(owner.name)
      this.prepareStatics(owner)
      const method = owner.findMethod(CLASS_INITIALIZER, '()V')
      if (method) {
        return { owner, method, args: [], reexecute: true }
      }
    }
    return null
  }

  isInitialized(className: string): boolean {
    return this.initialized.has(className)
  }

  /**
   * Field lookup: the class itself, its interfaces, then its superclass
   */
  resolveField(reference: MemberReference): ResolvedField {
    const found = this.findField(this.resolveClass(reference.className), reference)
    if (!found) {
      throw new ResolutionError(
        RESOLUTION_ERRORS.FIELD_NOT_FOUND,
        `Field ${reference.className}.${reference.name}:${reference.descriptor} not found`,
      )
    }
    return found
  }

  /**
   * Method lookup from `classDefinition` up its superclasses, then through
   * its interfaces for default methods
   */
  resolveMethod(
    classDefinition: ClassDefinition,
    name: string,
    descriptor: string,
  ): ResolvedMethod {
    const found = this.findMethod(classDefinition, name, descriptor)
    if (!found) {
      throw new ResolutionError(
        RESOLUTION_ERRORS.METHOD_NOT_FOUND,
        `Method ${classDefinition.name}.${name}${descriptor} not found`,
      )
    }
    return found
  }

  getStatic(owner: ClassDefinition, field: FieldInfo): Value {
    const value = this.staticsOf(owner.name).get(field.name)
    if (value === undefined) {
      throw new ResolutionError(
        RESOLUTION_ERRORS.FIELD_NOT_FOUND,
        `Static field ${owner.name}.${field.name} has no storage`,
      )
    }
    return value
  }

  setStatic(className: string, fieldName: string, value: Value): void {
    this.staticsOf(className).set(fieldName, value)
  }

  /**
   * Allocate an instance with every instance field of the class chain at its
   * default value
   */
  newInstance(classDefinition: ClassDefinition): InstanceObject {
    const fields = new Map<string, Value>()
    for (
      let current: ClassDefinition | null = classDefinition;
      current;
      current = this.superclassOf(current)
    ) {
      for (const field of current.getFields()) {
        if (!isStatic(field)) {
          fields.set(instanceFieldKey(current, field), defaultValueFor(field.type))
        }
      }
    }
    return this.heap.newInstance(classDefinition.name, fields)
  }

  /**
   * String object for `text`, or null
   */
  stringValue(text: string | null): Value {
    return referenceValue(text === null ? null : this.heap.newString(text))
  }

  /**
   * The value `ldc` pushes for a pool constant
   */
  loadConstant(constant: LoadableConstant): Value {
    switch (constant.kind) {
      case 'Integer':
        return intValue(constant.value)
      case 'Float':
        return floatValue(constant.value)
      case 'Long':
        return longValue(constant.value)
      case 'Double':
        return doubleValue(constant.value)
      case 'String':
        return referenceValue(this.heap.intern(constant.text))
      case 'Class':
        return referenceValue(this.heap.classLiteral(constant.className))
    }
  }

  /**
   * `target` is a class name, or a descriptor for array types
   */
  isInstanceOf(object: HeapObject, target: string): boolean {
    const targetType = unwrapSafe(classNameToType(target))
    switch (object.kind) {
      case 'array':
        return this.isAssignable({ kind: 'array', component: object.componentType }, targetType)
      case 'class':
        return target === OBJECT_CLASS || target === 'java/lang/Class'
      case 'string':
        return this.isAssignable({ kind: 'object', className: STRING_CLASS }, targetType)
      case 'instance':
        return this.isAssignable({ kind: 'object', className: object.className }, targetType)
    }
  }

  /**
   * Reference widening between types; arrays are covariant in reference
   * components and invariant in primitive ones
   */
  isAssignable(source: FieldType, target: FieldType): boolean {
    if (source.kind === 'base' || target.kind === 'base') {
      return (
        source.kind === 'base' &&
        target.kind === 'base' &&
        source.descriptor === target.descriptor
      )
    }
    if (target.kind === 'object') {
      if (source.kind === 'object') return this.isSubclassOf(source.className, target.className)
      return ARRAY_SUPERTYPES.has(target.className)
    }
    return source.kind === 'array' && this.isAssignable(source.component, target.component)
  }

  private staticsOf(className: string): Map<string, Value> {
    let storage = this.statics.get(className)
    if (!storage) {
      storage = new Map()
      this.statics.set(className, storage)
    }
    return storage
  }

  private prepareStatics(owner: ClassDefinition): void {
    for (const field of owner.getFields()) {
      if (isStatic(field)) {
        this.setStatic(owner.name, field.name, this.initialStaticValue(owner, field))
      }
    }
  }

  /**
   * The ConstantValue attribute if present, else the type's default
   */
  private initialStaticValue(owner: ClassDefinition, field: FieldInfo): Value {
    if (field.constantValueIndex === null) return defaultValueFor(field.type)

    const constant = unwrapSafe(owner.pool.resolveLoadable(field.constantValueIndex))
    const value = this.loadConstant(constant)
    if (!matchesStackType(value, stackTypeOf(field.type))) {
      throw new TypeFault(
        `ConstantValue of ${owner.name}.${field.name} is ${constant.kind}, field is ${field.descriptor}`,
      )
    }
    return value
  }

  private findField(
    classDefinition: ClassDefinition,
    reference: MemberReference,
  ): ResolvedField | null {
    const field = classDefinition.findField(reference.name)
    if (field && field.descriptor === reference.descriptor) {
      return { owner: classDefinition, field }
    }
    for (const name of classDefinition.interfaces) {
      const found = this.findField(this.resolveClass(name), reference)
      if (found) return found
    }
    const superclass = this.superclassOf(classDefinition)
    return superclass ? this.findField(superclass, reference) : null
  }

  private findMethod(
    classDefinition: ClassDefinition,
    name: string,
    descriptor: string,
  ): ResolvedMethod | null {
    for (
      let current: ClassDefinition | null = classDefinition;
      current;
      current = this.superclassOf(current)
    ) {
      const method = current.findMethod(name, descriptor)
      if (method) return { owner: current, method }
    }
    return this.findInterfaceMethod(classDefinition, name, descriptor)
  }

  private findInterfaceMethod(
    classDefinition: ClassDefinition,
    name: string,
    descriptor: string,
  ): ResolvedMethod | null {
    for (
      let current: ClassDefinition | null = classDefinition;
      current;
      current = this.superclassOf(current)
    ) {
      for (const interfaceName of current.interfaces) {
        const owner = this.resolveClass(interfaceName)
        const method = owner.findMethod(name, descriptor)
        if (method) return { owner, method }
        const inherited = this.findInterfaceMethod(owner, name, descriptor)
        if (inherited) return inherited
      }
    }
    return null
  }
}

/**
 * Key of an instance field in InstanceObject.fields; the declaring class keeps
 * shadowed fields apart
 */
export function instanceFieldKey(owner: ClassDefinition, field: FieldInfo): string {
  return `${owner.name}.${field.name}`
}

