import { describe, it, expect, expectTypeOf, vi, afterEach } from 'vitest'
import fc from 'fast-check'
import { ConstBuffer, MutableBuffer, constBuffer, mutableBuffer } from '@iovec/net'

import { buffersType, selectBufferKind } from '../select'
import type { BuffersType, StrictBuffersType, BufferKindOf } from '../select'
import { BufferSequenceError } from '../errors'
import { createLogger } from '../lib/logger'

afterEach(() => {
  vi.unstubAllEnvs()
})

const rw = () => [mutableBuffer(new Uint8Array(2))]
const ro = () => [constBuffer('ro')]

// ─── Type level ─────────────────────────────────────────────────────────────

describe('BuffersType', () => {
  it('selects ConstBuffer for the empty pack', () => {
    expectTypeOf<BuffersType<[]>>().toEqualTypeOf<ConstBuffer>()
  })

  it('selects MutableBuffer when every member is mutable', () => {
    expectTypeOf<BuffersType<[MutableBuffer[]]>>().toEqualTypeOf<MutableBuffer>()
    expectTypeOf<BuffersType<[MutableBuffer, readonly MutableBuffer[]]>>().toEqualTypeOf<MutableBuffer>()
  })

  it('selects ConstBuffer as soon as one member is const-only', () => {
    expectTypeOf<BuffersType<[MutableBuffer[], ConstBuffer[]]>>().toEqualTypeOf<ConstBuffer>()
    expectTypeOf<BuffersType<[ConstBuffer]>>().toEqualTypeOf<ConstBuffer>()
  })

  it('silently selects ConstBuffer for non-sequences', () => {
    expectTypeOf<BuffersType<[string]>>().toEqualTypeOf<ConstBuffer>()
  })

  it('can type a routine that returns a region of the selected kind', () => {
    function firstOf<S extends readonly MutableBuffer[]>(seq: S): BuffersType<[S]> | undefined
    function firstOf<S extends readonly ConstBuffer[]>(seq: S): BuffersType<[S]> | undefined
    function firstOf(seq: readonly ConstBuffer[]): ConstBuffer | undefined {
      return seq[0]
    }
    expectTypeOf(firstOf(rw())).toEqualTypeOf<MutableBuffer | undefined>()
    expectTypeOf(firstOf(ro())).toEqualTypeOf<ConstBuffer | undefined>()
  })
})

describe('StrictBuffersType', () => {
  it('agrees with BuffersType on sequences', () => {
    expectTypeOf<StrictBuffersType<[MutableBuffer[]]>>().toEqualTypeOf<MutableBuffer>()
    expectTypeOf<StrictBuffersType<[MutableBuffer[], ConstBuffer]>>().toEqualTypeOf<ConstBuffer>()
    expectTypeOf<StrictBuffersType<[]>>().toEqualTypeOf<ConstBuffer>()
  })

  it('is never when a member is not a sequence', () => {
    expectTypeOf<StrictBuffersType<[MutableBuffer, string]>>().toBeNever()
  })
})

describe('BufferKindOf', () => {
  it('tags each region type', () => {
    expectTypeOf<BufferKindOf<MutableBuffer>>().toEqualTypeOf<'mutable'>()
    expectTypeOf<BufferKindOf<ConstBuffer>>().toEqualTypeOf<'const'>()
  })
})

// ─── Runtime ────────────────────────────────────────────────────────────────

describe('buffersType', () => {
  it('selects const for no arguments', () => {
    expect(buffersType()).toBe('const')
  })

  it('matches the worked scenarios', () => {
    expect(buffersType(rw())).toBe('mutable')
    expect(buffersType(rw(), ro())).toBe('const')
  })

  it('adding one const-only sequence to a mutable pack flips the kind (property-based)', () => {
    fc.assert(fc.property(fc.integer({ min: 1, max: 5 }), fc.nat(), (n, at) => {
      const pack: unknown[] = Array.from({ length: n }, rw)
      if (buffersType(...pack) !== 'mutable') return false
      pack.splice(at % (n + 1), 0, ro())
      return buffersType(...pack) === 'const'
    }))
  })
})

describe('selectBufferKind', () => {
  it('is permissive by default', () => {
    vi.stubEnv('IOVEC_STRICT_SELECTION', '')
    expect(selectBufferKind([rw(), 42])).toBe('const')
  })

  it('rejects non-sequences in strict mode', () => {
    expect(() => selectBufferKind([rw(), 42], { strictSelection: true }))
      .toThrow(new BufferSequenceError(1, 'const'))
  })

  it('still selects normally in strict mode', () => {
    expect(selectBufferKind([rw()], { strictSelection: true })).toBe('mutable')
    expect(selectBufferKind([], { strictSelection: true })).toBe('const')
  })

  it('reads strict mode from the environment', () => {
    vi.stubEnv('IOVEC_STRICT_SELECTION', 'true')
    expect(() => selectBufferKind(['text'])).toThrow(BufferSequenceError)
  })

  it('logs the rejection when tracing', () => {
    const lines: string[] = []
    const logger = createLogger((line) => lines.push(line), () => new Date('2024-01-02T03:04:05.000Z'))

    expect(() => selectBufferKind([ro(), 'x'], { strictSelection: true, trace: true, logger }))
      .toThrow(BufferSequenceError)
    expect(lines).toEqual([
      '{"ts":"2024-01-02T03:04:05.000Z","level":"debug","event":"buffers_type.rejected","index":1,"capability":"const"}',
    ])
  })

  it('stays quiet when not tracing', () => {
    const lines: string[] = []
    const logger = createLogger((line) => lines.push(line))
    expect(() => selectBufferKind(['x'], { strictSelection: true, trace: false, logger })).toThrow()
    expect(lines).toEqual([])
  })
})
