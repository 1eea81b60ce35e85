import {z} from 'zod';

import {TimestampValueSchema, type TimestampValue} from './contracts';
import {err, ok, type JsonTimestampResult} from './errors';

const NANOS_DIGITS = 9;

const Rfc3339Schema = z.iso.datetime({offset: true});

// Seconds and a colon-separated offset are mandatory here even where the ISO
// check alone would accept a shorter form.
const RFC3339_COMPONENTS_REGEX =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|([+-])(\d{2}):(\d{2}))$/u;

const toInt = (value: string | undefined) => (value === undefined ? 0 : Number.parseInt(value, 10));

const fractionToNanos = (fraction: string | undefined) => {
  if (!fraction) {
    return 0;
  }

  // Digits past nanosecond precision are truncated.
  return Number.parseInt(fraction.slice(0, NANOS_DIGITS).padEnd(NANOS_DIGITS, '0'), 10);
};

const toEpochSeconds = ({
  year,
  month,
  day,
  hour,
  minute,
  second
}: {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}) => {
  // setUTCFullYear keeps years 0-99 literal, Date.UTC would shift them to 19xx.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return date.getTime() / 1000;
};

export const parseRfc3339Timestamp = (value: string): JsonTimestampResult<TimestampValue> => {
  if (!Rfc3339Schema.safeParse(value).success) {
    return err('timestamp_format_invalid', `"${value}" is not an RFC3339 timestamp`);
  }

  const match = RFC3339_COMPONENTS_REGEX.exec(value);
  if (!match) {
    return err('timestamp_format_invalid', `"${value}" is not an RFC3339 timestamp`);
  }

  const [, year, month, day, hour, minute, second, fraction, zone, offsetSign, offsetHours, offsetMinutes] = match;
  const clock = {hour: toInt(hour), minute: toInt(minute), second: toInt(second)};
  if (
    clock.hour > 23 ||
    clock.minute > 59 ||
    clock.second > 59 ||
    toInt(offsetHours) > 23 ||
    toInt(offsetMinutes) > 59
  ) {
    return err('timestamp_format_invalid', `"${value}" has an out-of-range clock or offset`);
  }

  const localSeconds = toEpochSeconds({
    year: toInt(year),
    month: toInt(month),
    day: toInt(day),
    ...clock
  });
  if (localSeconds === null) {
    return err('timestamp_date_invalid', `"${value}" is not a calendar date`);
  }

  const offsetSeconds =
    zone === 'Z' ? 0 : (offsetSign === '-' ? -1 : 1) * (toInt(offsetHours) * 3600 + toInt(offsetMinutes) * 60);

  return ok(
    TimestampValueSchema.parse({
      seconds: localSeconds - offsetSeconds,
      nanos: fractionToNanos(fraction)
    })
  );
};

export const formatTimestampObject = ({seconds, nanos}: TimestampValue) =>
  `{"seconds": ${String(seconds)}, "nanos": ${String(nanos)}}`;
