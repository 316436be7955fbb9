/**
 * Capability Classifier
 *
 * Decides whether every type in a pack is a read-only (const) or
 * read-write (mutable) buffer sequence. Packs are tuple types so routines
 * with rest parameters can pass their argument list straight through.
 *
 *   IsConstBufferSequence<[]>                                    → true
 *   IsConstBufferSequence<[MutableBuffer[], ConstBuffer]>        → true
 *   IsMutableBufferSequence<[MutableBuffer[], ConstBuffer]>      → false
 *
 * The empty pack conforms to both capabilities, so a variadic routine
 * called with zero buffers still type-checks.
 */

import { conformsToConstBufferSequence, conformsToMutableBufferSequence } from '@iovec/net'
import type { BufferKind, ConstBuffer, IsBufferSequenceOf, MutableBuffer } from '@iovec/net'

// ─── Normalization ──────────────────────────────────────────────────────────

/**
 * Strip `readonly` from arrays and tuples. Anything else is already in
 * normal form: `readonly` on an object's properties does not change
 * whether it iterates regions.
 */
export type Decay<T> = T extends readonly unknown[]
  ? { -readonly [K in keyof T]: T[K] }
  : T

// ─── Aggregation ────────────────────────────────────────────────────────────

type AllConform<TN extends readonly unknown[], B extends ConstBuffer> =
  TN extends readonly []
    ? true
    : TN extends readonly [infer Head, ...infer Tail]
      ? IsBufferSequenceOf<Decay<Head>, B> extends true
        ? AllConform<Tail, B>
        : false
      // Non-tuple pack (a rest parameter typed T[]): every element has type T
      : TN extends readonly (infer E)[]
        ? IsBufferSequenceOf<Decay<E>, B>
        : false

/** `true` if every type in TN is a const buffer sequence. */
export type IsConstBufferSequence<TN extends readonly unknown[]> = AllConform<TN, ConstBuffer>

/** `true` if every type in TN is a mutable buffer sequence. */
export type IsMutableBufferSequence<TN extends readonly unknown[]> = AllConform<TN, MutableBuffer>

// ─── Constraints ────────────────────────────────────────────────────────────

/** TN if every member is a const buffer sequence, otherwise `never`. */
export type ConstBufferSequences<TN extends readonly unknown[]> =
  IsConstBufferSequence<TN> extends true ? TN : never

/** TN if every member is a mutable buffer sequence, otherwise `never`. */
export type MutableBufferSequences<TN extends readonly unknown[]> =
  IsMutableBufferSequence<TN> extends true ? TN : never

// ─── Runtime ────────────────────────────────────────────────────────────────

/** Runtime counterpart of IsConstBufferSequence. No arguments → true. */
export function isConstBufferSequence(...values: readonly unknown[]): boolean {
  return values.every((value) => conformsToConstBufferSequence(value))
}

/** Runtime counterpart of IsMutableBufferSequence. No arguments → true. */
export function isMutableBufferSequence(...values: readonly unknown[]): boolean {
  return values.every((value) => conformsToMutableBufferSequence(value))
}

/** Index of the first value lacking the capability, or -1 if all conform. */
export function firstNonConforming(values: readonly unknown[], capability: BufferKind): number {
  const check = capability === 'mutable' ? conformsToMutableBufferSequence : conformsToConstBufferSequence
  return values.findIndex((value) => !check(value))
}
