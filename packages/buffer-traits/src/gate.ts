/**
 * Runtime gates: turn a false verdict into a BufferSequenceError for callers
 * that cannot rely on the type checker (plain JS, values typed `unknown`).
 */

import type { BufferKind } from '@iovec/net'
import { resolveConfig } from '@iovec/config'

import { firstNonConforming } from './classify'
import { BufferSequenceError } from './errors'
import { defaultLogger } from './lib/logger'
import type { SelectOptions } from './select'

/** Throw unless every value has `capability`. No values → passes. */
export function checkBufferSequences(
  values: readonly unknown[],
  capability: BufferKind,
  options: SelectOptions = {},
): void {
  const index = firstNonConforming(values, capability)
  if (index === -1) return

  const { logger = defaultLogger, ...overrides } = options
  if (resolveConfig(overrides).trace) {
    logger.log('debug', 'buffer_sequence.rejected', { index, capability })
  }
  throw new BufferSequenceError(index, capability)
}

export function requireConstBufferSequence(...values: readonly unknown[]): void {
  checkBufferSequences(values, 'const')
}

export function requireMutableBufferSequence(...values: readonly unknown[]): void {
  checkBufferSequences(values, 'mutable')
}
