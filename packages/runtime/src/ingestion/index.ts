export {
  createInputLayer,
  parseRawMessage,
  normalizeMediaType,
  type InputLayer,
  type InputLayerOptions,
  type ReceiveResult,
} from './input-layer.js';
export {
  createInMemoryEnvelopeQueue,
  type EnvelopeQueue,
  type InMemoryEnvelopeQueue,
} from './queue.js';
export { technicalReply } from './replies.js';
