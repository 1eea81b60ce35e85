export const jsonTimestampErrorCodes = [
  'timestamp_format_invalid',
  'timestamp_date_invalid',
  'timestamp_invalid'
] as const;

export type JsonTimestampErrorCode = (typeof jsonTimestampErrorCodes)[number];

export type JsonTimestampError = {
  code: JsonTimestampErrorCode;
  message: string;
};

export type JsonTimestampSuccess<T> = {ok: true; value: T};
export type JsonTimestampFailure = {ok: false; error: JsonTimestampError};
export type JsonTimestampResult<T> = JsonTimestampSuccess<T> | JsonTimestampFailure;

export const ok = <T>(value: T): JsonTimestampSuccess<T> => ({ok: true, value});

export const err = (code: JsonTimestampErrorCode, message: string): JsonTimestampFailure => ({
  ok: false,
  error: {code, message}
});
