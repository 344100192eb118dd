/**
 * Class Registry
 *
 * Where the interpreter finds the classes that field access and invocation
 * name: classes defined up front, the built-in bootstrap classes, and an
 * optional loader consulted for anything else.
 */

import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { decodeClassFile } from '@tinyjvm/classfile'
import { logger } from '@tinyjvm/core'
import {
  FormatError,
  RESOLUTION_ERRORS,
  ResolutionError,
  type Safe,
  safeError,
  safeResult,
} from '@tinyjvm/types'
import { tryit } from 'radash'
import { createBootstrapClasses } from './bootstrap'
import { ClassDefinition } from './class-definition'

export interface ClassRegistry {
  resolveClass(name: string): Safe<ClassDefinition, ResolutionError | FormatError>
}

/**
 * Produce the named class, or null when the loader has no such class
 */
export type ClassLoader = (name: string) => Safe<ClassDefinition | null, FormatError>

export interface MapClassRegistryOptions {
  classes?: ClassDefinition[]
  loader?: ClassLoader
  /** Register java/lang/Object, String, System and java/io/PrintStream (default true) */
  bootstrap?: boolean
}

export class MapClassRegistry implements ClassRegistry {
  private readonly classes = new Map<string, ClassDefinition>()
  private readonly loader: ClassLoader | undefined

  constructor(options: MapClassRegistryOptions = {}) {
    if (options.bootstrap ?? true) {
      for (const classDefinition of createBootstrapClasses()) {
        this.define(classDefinition)
      }
    }
    for (const classDefinition of options.classes ?? []) {
      this.define(classDefinition)
    }
    this.loader = options.loader
  }

  /**
   * Register a class, replacing any earlier one of the same name
   */
  define(classDefinition: ClassDefinition): void {
    this.classes.set(classDefinition.name, classDefinition)
  }

  has(name: string): boolean {
    return this.classes.has(name)
  }

  getClassNames(): string[] {
    return [...this.classes.keys()]
  }

  resolveClass(
    name: string,
  ): Safe<ClassDefinition, ResolutionError | FormatError> {
    const known = this.classes.get(name)
    if (known) return safeResult(known)

    if (this.loader) {
      const [error, loaded] = this.loader(name)
      if (error) return safeError(error)
      if (loaded) {
        if (loaded.name !== name) {
          return safeError(
            new FormatError(`Class file for ${name} declares ${loaded.name}`),
          )
        }
        logger.debug('ClassRegistry: loaded class', { name })
        this.define(loaded)
        return safeResult(loaded)
      }
    }

    return safeError(
      new ResolutionError(
        RESOLUTION_ERRORS.CLASS_NOT_FOUND,
        `Class ${name} not found`,
      ),
    )
  }
}

/**
 * Decode a class file from disk into a ClassDefinition
 */
export function loadClassFile(path: string): Safe<ClassDefinition, FormatError> {
  const [readError, bytes] = tryit(() => readFileSync(path))()
  if (readError) {
    return safeError(new FormatError(`Cannot read ${path}: ${readError.message}`))
  }
  const [error, decoded] = decodeClassFile(new Uint8Array(bytes))
  if (error) {
    return safeError(new FormatError(`${path}: ${error.message}`))
  }
  if (decoded.remaining.length > 0) {
    return safeError(
      new FormatError(`${path}: ${decoded.remaining.length} extra bytes after the class file`),
    )
  }
  return ClassDefinition.fromClassFile(decoded.value)
}

/**
 * Loader reading `<directory>/<internal name>.class`
 */
export function createClassPathLoader(directory: string): ClassLoader {
  return (name) => {
    const path = join(directory, `${name}.class`)
    if (!existsSync(path)) return safeResult(null)
    return loadClassFile(path)
  }
}
