export {
  TimestampValueSchema,
  type RewriteTimestampFieldInput,
  type RewriteTimestampFieldsInput,
  type TimestampRewriteResult,
  type TimestampValue
} from './contracts';
export {
  err,
  jsonTimestampErrorCodes,
  ok,
  type JsonTimestampError,
  type JsonTimestampErrorCode,
  type JsonTimestampFailure,
  type JsonTimestampResult,
  type JsonTimestampSuccess
} from './errors';
export {rewriteTimestampField, rewriteTimestampFields} from './rewrite';
export {formatTimestampObject, parseRfc3339Timestamp} from './rfc3339';

export const packageName = 'json-timestamp';
