export {
  createRecorder,
  type Recorder,
  type RecorderOptions,
  type RecordInput,
  type RecordResult,
} from './recorder.js';
export { createMonotonicClock, type MonotonicClock } from './clock.js';
export {
  AGENT_TYPE_PATTERN,
  CASE_SESSION_PATTERN,
  isJsonObject,
  isJsonValue,
  assertNoIdentityLeaks,
  type LeakScanCandidate,
} from './validation.js';
