import { CallStackOverflow, FrameFault } from '@tinyjvm/types'
import type { Frame } from './frame'

/**
 * LIFO of active frames, innermost last, with a depth bound
 */
export class JvmCallStack {
  private readonly frames: Frame[] = []

  constructor(readonly maxDepth: number) {}

  get depth(): number {
    return this.frames.length
  }

  get isEmpty(): boolean {
    return this.frames.length === 0
  }

  /**
   * The executing frame
   */
  get current(): Frame {
    const frame = this.frames[this.frames.length - 1]
    if (!frame) {
      throw new FrameFault('No active frame on the call stack')
    }
    return frame
  }

  push(frame: Frame): void {
    if (this.frames.length >= this.maxDepth) {
      throw new CallStackOverflow(this.maxDepth)
    }
    this.frames.push(frame)
  }

  pop(): Frame {
    const frame = this.frames.pop()
    if (!frame) {
      throw new FrameFault('Call stack underflow')
    }
    return frame
  }

  /**
   * Active frames, innermost first
   */
  innermostFirst(): Frame[] {
    return [...this.frames].reverse()
  }

  clear(): void {
    this.frames.length = 0
  }
}
