/**
 * Element Type Selector
 *
 * Picks the one region type a generic routine should present for a pack of
 * buffer sequences: MutableBuffer only when every sequence is mutable,
 * ConstBuffer otherwise. The empty pack selects ConstBuffer.
 *
 * Example: a routine returning the first region of a sequence
 *
 *   function front<S extends ConstBufferSequence>(seq: S): BuffersType<[S]>
 */

import type { BufferKind, ConstBuffer, MutableBuffer } from '@iovec/net'
import { resolveConfig } from '@iovec/config'
import type { TraitsConfig } from '@iovec/config'

import type { IsConstBufferSequence, IsMutableBufferSequence } from './classify'
import { firstNonConforming, isMutableBufferSequence } from './classify'
import { BufferSequenceError } from './errors'
import { defaultLogger } from './lib/logger'
import type { Logger } from './lib/logger'

// ─── Type level ─────────────────────────────────────────────────────────────

/**
 * The region type for a pack: MutableBuffer if every member is mutable, else
 * ConstBuffer. The empty pack is vacuously mutable but still selects ConstBuffer.
 */
export type BuffersType<TN extends readonly unknown[]> =
  TN extends readonly []
    ? ConstBuffer
    : IsMutableBufferSequence<TN> extends true ? MutableBuffer : ConstBuffer

/** Like BuffersType, but `never` when some member is not a buffer sequence at all. */
export type StrictBuffersType<TN extends readonly unknown[]> =
  IsConstBufferSequence<TN> extends true ? BuffersType<TN> : never

/** Kind tag of a region type. */
export type BufferKindOf<B extends ConstBuffer> = B extends MutableBuffer ? 'mutable' : 'const'

// ─── Runtime ────────────────────────────────────────────────────────────────

export interface SelectOptions extends Partial<TraitsConfig> {
  logger?: Logger
}

/** Runtime counterpart of BuffersType. No arguments → 'const'. */
export function buffersType(...values: readonly unknown[]): BufferKind {
  return selectBufferKind(values)
}

/**
 * Select the region kind for `values`. With `strictSelection` on, a value
 * that is not even a const buffer sequence throws BufferSequenceError.
 */
export function selectBufferKind(values: readonly unknown[], options: SelectOptions = {}): BufferKind {
  const { logger = defaultLogger, ...overrides } = options
  const config = resolveConfig(overrides)

  if (config.strictSelection) {
    const index = firstNonConforming(values, 'const')
    if (index !== -1) {
      if (config.trace) logger.log('debug', 'buffers_type.rejected', { index, capability: 'const' })
      throw new BufferSequenceError(index, 'const')
    }
  }

  if (values.length === 0) return 'const'
  return isMutableBufferSequence(...values) ? 'mutable' : 'const'
}
