/**
 * Region-sequence capability check for a single type or value.
 *
 * A buffer sequence is either a lone region or a multi-pass iterable of
 * regions. The read-only capability accepts ConstBuffer elements (which
 * includes MutableBuffer); the read-write capability accepts MutableBuffer only.
 */

import { ConstBuffer, MutableBuffer } from './buffer'

// ─── Concepts ───────────────────────────────────────────────────────────────

export type ConstBufferSequence = ConstBuffer | Iterable<ConstBuffer>

export type MutableBufferSequence = MutableBuffer | Iterable<MutableBuffer>

// ─── Type-level checks ──────────────────────────────────────────────────────

/**
 * `true` if T is a sequence of regions of kind B. Tuple-wrapped so a union
 * conforms only when every member does. Iterators (anything with `next`) are
 * one-shot and never conform, matching isMultiPassIterable.
 */
export type IsBufferSequenceOf<T, B extends ConstBuffer> =
  [T] extends [never] ? false
  : [T] extends [B] ? true
  : [T] extends [{ next(...args: never[]): unknown }] ? false
  : [T] extends [Iterable<infer E>] ? ([E] extends [B] ? true : false)
  : false

export type IsConstBufferSequenceOf<T> = IsBufferSequenceOf<T, ConstBuffer>

export type IsMutableBufferSequenceOf<T> = IsBufferSequenceOf<T, MutableBuffer>

// ─── Runtime checks ─────────────────────────────────────────────────────────

/**
 * An object that can be iterated more than once. Iterators (anything with a
 * `next` method) are one-shot and walking them would consume the caller's data.
 */
export function isMultiPassIterable(value: unknown): value is Iterable<unknown> {
  if (typeof value !== 'object' || value === null) return false
  if (!(Symbol.iterator in value) || typeof value[Symbol.iterator] !== 'function') return false
  return !('next' in value && typeof value.next === 'function')
}

function conformsTo(value: unknown, kind: typeof ConstBuffer): boolean {
  if (value instanceof kind) return true
  if (!isMultiPassIterable(value)) return false
  for (const element of value) {
    if (!(element instanceof kind)) return false
  }
  return true
}

export function conformsToConstBufferSequence(value: unknown): value is ConstBufferSequence {
  return conformsTo(value, ConstBuffer)
}

export function conformsToMutableBufferSequence(value: unknown): value is MutableBufferSequence {
  return conformsTo(value, MutableBuffer)
}
