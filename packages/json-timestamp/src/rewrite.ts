import type {
  RewriteTimestampFieldInput,
  RewriteTimestampFieldsInput,
  TimestampRewriteResult
} from './contracts';
import {formatTimestampObject, parseRfc3339Timestamp} from './rfc3339';

const QUOTE = 0x22;
const COLON = 0x3a;

const isWhitespace = (byte: number | undefined) =>
  byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d;

const skipWhitespace = (body: Buffer, position: number) => {
  let cursor = position;
  while (cursor < body.length && isWhitespace(body[cursor])) {
    cursor += 1;
  }
  return cursor;
};

/**
 * Returns the offset of the quote opening the value that follows a matched key,
 * or -1 when the value is not a quoted string.
 *
 * The key may have been quoted (`"creation_time": ...`) or bare
 * (`creation_time: ...`); a closing key quote directly after the match is consumed.
 */
const findQuotedValueStart = (body: Buffer, keyEnd: number) => {
  let cursor = keyEnd;
  if (body[cursor] === QUOTE) {
    cursor += 1;
  }

  cursor = skipWhitespace(body, cursor);
  if (body[cursor] === COLON) {
    cursor = skipWhitespace(body, cursor + 1);
  }

  return body[cursor] === QUOTE ? cursor : -1;
};

/**
 * Rewrites every quoted RFC3339 value of `keyName` into a
 * `{"seconds": <int>, "nanos": <int>}` object, leaving every other byte as is.
 *
 * Unquoted values and an unterminated final quote are left alone. A quoted value
 * that does not parse fails the whole call, and the original buffer is returned
 * even when earlier occurrences were already rewritten.
 */
export const rewriteTimestampField = ({body, keyName}: RewriteTimestampFieldInput): TimestampRewriteResult => {
  const key = Buffer.from(keyName, 'utf8');
  if (body.length === 0 || key.length === 0) {
    return {ok: true, body, rewrites: 0};
  }

  const segments: Buffer[] = [];
  let copiedUpTo = 0;
  let cursor = 0;
  let rewrites = 0;

  while (cursor < body.length) {
    const keyStart = body.indexOf(key, cursor);
    if (keyStart === -1) {
      break;
    }

    const keyEnd = keyStart + key.length;
    const valueStart = findQuotedValueStart(body, keyEnd);
    if (valueStart === -1) {
      cursor = keyEnd;
      continue;
    }

    const valueEnd = body.indexOf(QUOTE, valueStart + 1);
    if (valueEnd === -1) {
      break;
    }

    const candidate = body.subarray(valueStart + 1, valueEnd).toString('utf8');
    const parsed = parseRfc3339Timestamp(candidate);
    if (!parsed.ok) {
      return {
        ok: false,
        body,
        error: {
          code: 'timestamp_invalid',
          message: `Field ${keyName} at offset ${String(valueStart)}: ${parsed.error.message}`
        }
      };
    }

    segments.push(body.subarray(copiedUpTo, valueStart), Buffer.from(formatTimestampObject(parsed.value), 'utf8'));
    copiedUpTo = valueEnd + 1;
    cursor = copiedUpTo;
    rewrites += 1;
  }

  if (rewrites === 0) {
    return {ok: true, body, rewrites: 0};
  }

  segments.push(body.subarray(copiedUpTo));
  return {ok: true, body: Buffer.concat(segments), rewrites};
};

export const rewriteTimestampFields = ({body, keyNames}: RewriteTimestampFieldsInput): TimestampRewriteResult => {
  let current = body;
  let rewrites = 0;

  for (const keyName of keyNames) {
    const result = rewriteTimestampField({body: current, keyName});
    if (!result.ok) {
      return {ok: false, body, error: result.error};
    }

    current = result.body;
    rewrites += result.rewrites;
  }

  return {ok: true, body: current, rewrites};
};
