/**
 * Canonical region kinds for scatter/gather I/O.
 *
 * A region is a view over a contiguous span of bytes. Two kinds exist:
 *   - ConstBuffer:   read-only region
 *   - MutableBuffer: read-write region
 *
 * MutableBuffer extends ConstBuffer, so a read-write region is accepted
 * wherever a read-only one is expected. The reverse does not type-check:
 * `mutable` is the literal `true` on MutableBuffer and `boolean` on ConstBuffer.
 */

const textEncoder = new TextEncoder()

// ─── Read-only region ───────────────────────────────────────────────────────

export class ConstBuffer {
  // Makes the class nominal: an object literal with the same fields is not a region.
  private declare readonly brand: void

  readonly mutable: boolean = false

  constructor(readonly data: Uint8Array = new Uint8Array(0)) {}

  /** Number of bytes in the region. */
  get size(): number {
    return this.data.byteLength
  }

  /** A region over the same memory with the first `n` bytes skipped. */
  advance(n: number): ConstBuffer {
    return new ConstBuffer(this.data.subarray(clampOffset(n, this.size)))
  }
}

// ─── Read-write region ──────────────────────────────────────────────────────

export class MutableBuffer extends ConstBuffer {
  override readonly mutable: true = true

  override advance(n: number): MutableBuffer {
    return new MutableBuffer(this.data.subarray(clampOffset(n, this.size)))
  }

  /** Read-only view of the same bytes. */
  toConst(): ConstBuffer {
    return new ConstBuffer(this.data)
  }
}

/** Tag naming one of the two region kinds. */
export type BufferKind = 'const' | 'mutable'

// ─── Factories ──────────────────────────────────────────────────────────────

/** Read-only region over bytes, an ArrayBuffer, or a UTF-8 encoded string. */
export function constBuffer(source: Uint8Array | ArrayBuffer | string): ConstBuffer {
  if (typeof source === 'string') return new ConstBuffer(textEncoder.encode(source))
  return new ConstBuffer(toBytes(source))
}

/** Read-write region over existing memory. */
export function mutableBuffer(source: Uint8Array | ArrayBuffer): MutableBuffer {
  return new MutableBuffer(toBytes(source))
}

function toBytes(source: Uint8Array | ArrayBuffer): Uint8Array {
  return source instanceof Uint8Array ? source : new Uint8Array(source)
}

function clampOffset(n: number, size: number): number {
  if (!Number.isFinite(n) || n <= 0) return 0
  return Math.min(Math.floor(n), size)
}
