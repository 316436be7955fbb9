/**
 * Begin-access for buffer sequences.
 *
 * A lone region is not iterable on its own, so it is walked through a
 * BufferPointer: a one-element traversal that yields the region once.
 * Every other sequence is walked through its own [Symbol.iterator]().
 */

import { ConstBuffer } from './buffer'
import type { ConstBufferSequence } from './sequence'

// ─── One-element traversal ──────────────────────────────────────────────────

export class BufferPointer<B extends ConstBuffer> implements IterableIterator<B> {
  private consumed = false

  constructor(private readonly region: B) {}

  /** The region this pointer refers to. */
  deref(): B {
    return this.region
  }

  next(): IteratorResult<B, undefined> {
    if (this.consumed) return { done: true, value: undefined }
    this.consumed = true
    return { done: false, value: this.region }
  }

  [Symbol.iterator](): BufferPointer<B> {
    return this
  }
}

// ─── Begin ──────────────────────────────────────────────────────────────────

export function bufferSequenceBegin<B extends ConstBuffer>(seq: B): BufferPointer<B>
export function bufferSequenceBegin<S extends Iterable<ConstBuffer>>(
  seq: S,
): ReturnType<S[typeof Symbol.iterator]>
export function bufferSequenceBegin(seq: ConstBufferSequence): Iterator<ConstBuffer>
export function bufferSequenceBegin(seq: ConstBufferSequence): Iterator<ConstBuffer> {
  if (seq instanceof ConstBuffer) return new BufferPointer(seq)
  return seq[Symbol.iterator]()
}
