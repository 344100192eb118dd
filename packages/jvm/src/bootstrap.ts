/**
 * Bootstrap classes
 *
 * The handful of library classes guest programs reach without a class path:
 * java/lang/Object, java/lang/String, java/lang/System and java/io/PrintStream.
 * Their methods carry no code; the interpreter runs them from the native table.
 */

import {
  CLASS_ACCESS_FLAGS,
  FIELD_ACCESS_FLAGS,
} from '@tinyjvm/classfile'
import { unwrapSafe } from '@tinyjvm/types'
import {
  ClassDefinition,
  type ClassDeclaration,
  type MethodDeclaration,
} from './class-definition'
import { OBJECT_CLASS, STRING_CLASS } from './config'
import { BOOTSTRAP_NATIVES } from './natives'

const PUBLIC_CLASS = CLASS_ACCESS_FLAGS.ACC_PUBLIC | CLASS_ACCESS_FLAGS.ACC_SUPER
const PUBLIC_FINAL_CLASS = PUBLIC_CLASS | CLASS_ACCESS_FLAGS.ACC_FINAL

const DECLARATIONS: ClassDeclaration[] = [
  { name: OBJECT_CLASS, superName: null, accessFlags: PUBLIC_CLASS },
  { name: STRING_CLASS, superName: OBJECT_CLASS, accessFlags: PUBLIC_FINAL_CLASS },
  {
    name: 'java/lang/System',
    superName: OBJECT_CLASS,
    accessFlags: PUBLIC_FINAL_CLASS,
    fields: [
      {
        name: 'out',
        descriptor: 'Ljava/io/PrintStream;',
        accessFlags:
          FIELD_ACCESS_FLAGS.ACC_PUBLIC |
          FIELD_ACCESS_FLAGS.ACC_STATIC |
          FIELD_ACCESS_FLAGS.ACC_FINAL,
      },
    ],
  },
  { name: 'java/io/PrintStream', superName: OBJECT_CLASS, accessFlags: PUBLIC_CLASS },
]

function nativeMethodsOf(className: string): MethodDeclaration[] {
  return BOOTSTRAP_NATIVES.filter((binding) => binding.className === className).map(
    (binding) => ({
      name: binding.name,
      descriptor: binding.descriptor,
      accessFlags: binding.accessFlags,
    }),
  )
}

export function createBootstrapClasses(): ClassDefinition[] {
  return DECLARATIONS.map((declaration) =>
    unwrapSafe(
      ClassDefinition.define({
        ...declaration,
        methods: nativeMethodsOf(declaration.name),
      }),
    ),
  )
}
