/**
 * Traversal Type Resolver
 *
 * The type obtained when beginning a walk over a sequence's regions:
 *   - ConstBuffer   → BufferPointer<ConstBuffer>    (one-element traversal)
 *   - MutableBuffer → BufferPointer<MutableBuffer>
 *   - anything else → whatever its own [Symbol.iterator]() returns
 */

import { bufferSequenceBegin } from '@iovec/net'
import type { BufferPointer, ConstBuffer, ConstBufferSequence, MutableBuffer } from '@iovec/net'

import type { Decay } from './classify'

type ResolveTraversal<T> =
  [T] extends [never] ? never
  : [T] extends [MutableBuffer] ? BufferPointer<MutableBuffer>
  : [T] extends [ConstBuffer] ? BufferPointer<ConstBuffer>
  : T extends { [Symbol.iterator](): infer I } ? I
  : never

export type BuffersIteratorType<T> = ResolveTraversal<Decay<T>>

/** Begin a traversal over `seq`, typed as BuffersIteratorType of its type. */
export function buffersBegin(seq: MutableBuffer): BuffersIteratorType<MutableBuffer>
export function buffersBegin(seq: ConstBuffer): BuffersIteratorType<ConstBuffer>
export function buffersBegin<S extends Iterable<ConstBuffer>>(seq: S): BuffersIteratorType<S>
export function buffersBegin(seq: ConstBufferSequence): Iterator<ConstBuffer> {
  return bufferSequenceBegin(seq)
}
