/**
 * Helpers built on the three queries: the operations a buffer layer
 * reaches for most when handed an arbitrary sequence.
 */

import { ConstBuffer, MutableBuffer } from '@iovec/net'
import type { ConstBufferSequence, MutableBufferSequence } from '@iovec/net'

import { buffersBegin } from './iterator'

// A lone region is walked through its one-element pointer, which is one-shot:
// callers iterate the result once.
function regionsOf(seq: ConstBufferSequence): Iterable<ConstBuffer> {
  return seq instanceof ConstBuffer ? buffersBegin(seq) : seq
}

/**
 * First region of a sequence. An empty sequence yields a zero-length
 * MutableBuffer, which satisfies either overload.
 */
export function buffersFront(seq: MutableBufferSequence): MutableBuffer
export function buffersFront(seq: ConstBufferSequence): ConstBuffer
export function buffersFront(seq: ConstBufferSequence): ConstBuffer {
  for (const region of regionsOf(seq)) return region
  return new MutableBuffer()
}

/** Total number of bytes across every region. */
export function bufferBytes(seq: ConstBufferSequence): number {
  let total = 0
  for (const region of regionsOf(seq)) total += region.size
  return total
}

/** Regions of a sequence in traversal order. */
export function buffersToArray(seq: MutableBufferSequence): MutableBuffer[]
export function buffersToArray(seq: ConstBufferSequence): ConstBuffer[]
export function buffersToArray(seq: ConstBufferSequence): ConstBuffer[] {
  return Array.from(regionsOf(seq))
}
