import type { BufferKind } from '@iovec/net'

/** Raised by the runtime gates when an argument lacks the required capability. */
export class BufferSequenceError extends Error {
  constructor(
    public readonly index: number,
    public readonly capability: BufferKind,
  ) {
    super(`Argument ${index} is not a ${capability} buffer sequence`)
    this.name = 'BufferSequenceError'
  }
}
