// Capability Classifier
export {
  isConstBufferSequence, isMutableBufferSequence, firstNonConforming,
  type Decay,
  type IsConstBufferSequence, type IsMutableBufferSequence,
  type ConstBufferSequences, type MutableBufferSequences,
} from './classify'

// Element Type Selector
export {
  buffersType, selectBufferKind,
  type BuffersType, type StrictBuffersType, type BufferKindOf, type SelectOptions,
} from './select'

// Traversal Type Resolver
export { buffersBegin, type BuffersIteratorType } from './iterator'

// Runtime gates
export { checkBufferSequences, requireConstBufferSequence, requireMutableBufferSequence } from './gate'
export { BufferSequenceError } from './errors'

// Helpers
export { buffersFront, bufferBytes, buffersToArray } from './helpers'

// Logging
export { createLogger, defaultLogger, type Logger, type LogLevel, type LogSink } from './lib/logger'
