/**
 * Instruction Registry
 *
 * Central registry that imports and manages all JVM instruction handlers.
 * Acts as the dispatch table for the interpreter and the disassembler.
 */

import { arithmeticInstructions } from './arithmetic'
import type { JvmInstructionHandler } from './base'
import { comparisonInstructions } from './comparison'
import {
  BIPUSHInstruction,
  constInstructions,
  ldcInstructions,
  NOPInstruction,
  SIPUSHInstruction,
} from './constants'
import {
  conditionalBranchInstructions,
  GOTO_WInstruction,
  GOTOInstruction,
  LOOKUPSWITCHInstruction,
  TABLESWITCHInstruction,
} from './control-flow'
import { conversionInstructions } from './conversions'
import {
  GETFIELDInstruction,
  GETSTATICInstruction,
  PUTFIELDInstruction,
  PUTSTATICInstruction,
} from './fields'
import {
  INVOKEINTERFACEInstruction,
  INVOKESPECIALInstruction,
  INVOKESTATICInstruction,
  INVOKEVIRTUALInstruction,
} from './invoke'
import { IINCInstruction, localInstructions, WIDEInstruction } from './locals'
import {
  ANEWARRAYInstruction,
  ARRAYLENGTHInstruction,
  arrayAccessInstructions,
  CHECKCASTInstruction,
  INSTANCEOFInstruction,
  monitorInstructions,
  MULTIANEWARRAYInstruction,
  NEWARRAYInstruction,
  NEWInstruction,
} from './objects'
import { returnInstructions } from './returns'
import { stackInstructions } from './stack'

/**
 * Instruction Registry
 *
 * Maps opcodes to their corresponding instruction implementations.
 */
export class InstructionRegistry {
  private handlers: Map<number, JvmInstructionHandler> = new Map()

  constructor() {
    this.registerInstructions()
  }

  /**
   * Register all instruction handlers
   */
  private registerInstructions(): void {
    // Constants
    this.register(new NOPInstruction())
    this.registerAll(constInstructions())
    this.register(new BIPUSHInstruction())
    this.register(new SIPUSHInstruction())
    this.registerAll(ldcInstructions())

    // Locals
    this.registerAll(localInstructions())
    this.register(new IINCInstruction())
    this.register(new WIDEInstruction())

    // Operand stack
    this.registerAll(stackInstructions())

    // Arithmetic, conversions and comparisons
    this.registerAll(arithmeticInstructions())
    this.registerAll(conversionInstructions())
    this.registerAll(comparisonInstructions())

    // Control flow
    this.registerAll(conditionalBranchInstructions())
    this.register(new GOTOInstruction())
    this.register(new GOTO_WInstruction())
    this.register(new TABLESWITCHInstruction())
    this.register(new LOOKUPSWITCHInstruction())
    this.registerAll(returnInstructions())

    // Fields
    this.register(new GETSTATICInstruction())
    this.register(new PUTSTATICInstruction())
    this.register(new GETFIELDInstruction())
    this.register(new PUTFIELDInstruction())

    // Invocation
    this.register(new INVOKEVIRTUALInstruction())
    this.register(new INVOKESPECIALInstruction())
    this.register(new INVOKESTATICInstruction())
    this.register(new INVOKEINTERFACEInstruction())

    // Objects and arrays
    this.register(new NEWInstruction())
    this.register(new NEWARRAYInstruction())
    this.register(new ANEWARRAYInstruction())
    this.register(new MULTIANEWARRAYInstruction())
    this.register(new ARRAYLENGTHInstruction())
    this.registerAll(arrayAccessInstructions())
    this.register(new CHECKCASTInstruction())
    this.register(new INSTANCEOFInstruction())
    this.registerAll(monitorInstructions())
  }

  register(handler: JvmInstructionHandler): void {
    this.handlers.set(handler.opcode, handler)
  }

  registerAll(handlers: readonly JvmInstructionHandler[]): void {
    for (const handler of handlers) this.register(handler)
  }

  /**
   * Get instruction handler by opcode
   */
  getHandler(opcode: number): JvmInstructionHandler | undefined {
    return this.handlers.get(opcode)
  }

  /**
   * Check if opcode is registered
   */
  hasHandler(opcode: number): boolean {
    return this.handlers.has(opcode)
  }

  /**
   * Get all registered opcodes
   */
  getRegisteredOpcodes(): number[] {
    return Array.from(this.handlers.keys())
  }

  /**
   * Get all registered handlers
   */
  getAllHandlers(): JvmInstructionHandler[] {
    return Array.from(this.handlers.values())
  }
}
