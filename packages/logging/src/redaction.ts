const DEFAULT_SENSITIVE_SUBSTRINGS = [
  'authorization',
  'cookie',
  'token',
  'secret',
  'password',
  'signature',
  'key_data',
  'private_key',
  'body'
] as const;

const REDACTED_VALUE = '[REDACTED]';
const MAX_DEPTH = 10;
const MAX_STRING_LENGTH = 2048;

type SanitizeState = {
  seen: WeakSet<object>;
  sensitiveKeys: ReadonlySet<string>;
};

const normalizeKey = (value: string) => value.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

const isSensitiveKey = (key: string, state: SanitizeState) => {
  const normalized = normalizeKey(key);
  return state.sensitiveKeys.has(normalized) || DEFAULT_SENSITIVE_SUBSTRINGS.some(entry => normalized.includes(entry));
};

const truncate = (value: string) =>
  value.length > MAX_STRING_LENGTH ? `${value.slice(0, MAX_STRING_LENGTH)}...[${String(value.length)} chars]` : value;

const sanitizeValue = (value: unknown, depth: number, state: SanitizeState): unknown => {
  if (depth > MAX_DEPTH) {
    return '[TRUNCATED]';
  }

  switch (typeof value) {
    case 'string':
      return truncate(value);
    case 'number':
    case 'boolean':
    case 'undefined':
      return value;
    case 'bigint':
      return value.toString();
    case 'symbol':
      return value.toString();
    case 'function':
      return '[FUNCTION]';
    default:
      break;
  }

  if (value === null || typeof value !== 'object') {
    return null;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Buffer.isBuffer(value)) {
    return `[BUFFER ${String(value.length)} bytes]`;
  }

  if (value instanceof Error) {
    return {
      name: value.name,
      message: truncate(value.message),
      ...('code' in value && typeof value.code === 'string' ? {code: value.code} : {}),
      ...(value.stack ? {stack: value.stack} : {})
    };
  }

  if (state.seen.has(value)) {
    return '[CIRCULAR]';
  }
  state.seen.add(value);

  if (Array.isArray(value)) {
    return value.map(item => sanitizeValue(item, depth + 1, state));
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, entryValue]) => [
      key,
      isSensitiveKey(key, state) ? REDACTED_VALUE : sanitizeValue(entryValue, depth + 1, state)
    ])
  );
};

/**
 * Produces a JSON-safe copy of `value` with sensitive keys masked, long strings
 * shortened and buffers summarized by size.
 */
export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown =>
  sanitizeValue(value, 0, {
    seen: new WeakSet<object>(),
    sensitiveKeys: new Set(extraSensitiveKeys.map(normalizeKey).filter(key => key.length > 0))
  });
