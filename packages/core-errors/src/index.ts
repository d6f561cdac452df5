export {
  ERROR_CODES,
  ERROR_MESSAGES,
  HTTP_STATUS_CODE_BASE,
  errorCodeForStatus,
  type ErrorCode
} from './codes.js';
export {
  BlockedHostnameError,
  BlockedIpError,
  ClassifiedError,
  Http2ConnectionError,
  Http2GoAwayError,
  Http2StreamError,
  NetworkOperationError,
  RequestUrlError,
  renderError,
  systemErrorFields,
  unwrapError,
  type NetworkKind,
  type NetworkOperation,
  type SystemErrorFields
} from './errors.js';
export { HTTP2_ERROR_NAMES, http2ErrorName, http2SubcodeOffset, type Http2ErrorName } from './http2.js';
export { classifyError, failureKind, type ClassifyOptions, type ErrorClassification, type FailureKind } from './classify.js';
