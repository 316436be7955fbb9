// Region kinds
export {
  ConstBuffer, MutableBuffer,
  constBuffer, mutableBuffer,
  type BufferKind,
} from './buffer'

// Capability check
export {
  conformsToConstBufferSequence, conformsToMutableBufferSequence, isMultiPassIterable,
  type ConstBufferSequence, type MutableBufferSequence,
  type IsBufferSequenceOf, type IsConstBufferSequenceOf, type IsMutableBufferSequenceOf,
} from './sequence'

// Begin-access
export { BufferPointer, bufferSequenceBegin } from './begin'
