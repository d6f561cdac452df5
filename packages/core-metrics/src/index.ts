export * from './types.js';
export * from './constants.js';
export { isSystemTagName, parseSystemTags, SystemTagSet, TagsAndMeta } from './tags.js';
export { BufferedSampleSink, LoggerSampleSink, pushIfNotDone, Samples } from './sinks.js';
export { Trail, type TrailInit } from './trail.js';
export {
  DispatcherReentryError,
  expectedStatuses,
  MetricDispatcher,
  type FinishedRequest,
  type MetricDispatcherOptions,
  type RequestHead,
  type ResponseHead,
  type StatusRange,
  type UnfinishedRequest
} from './dispatcher.js';
export { CheckRegistry, checkStatus, type Check, type CheckContext } from './checks.js';
