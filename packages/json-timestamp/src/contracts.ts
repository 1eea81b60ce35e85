import {z} from 'zod';

import type {JsonTimestampError} from './errors';

export const TimestampValueSchema = z
  .object({
    seconds: z.number().int(),
    nanos: z.number().int().gte(0).lte(999_999_999)
  })
  .strict();

export type TimestampValue = z.infer<typeof TimestampValueSchema>;

export type RewriteTimestampFieldInput = {
  body: Buffer;
  keyName: string;
};

export type RewriteTimestampFieldsInput = {
  body: Buffer;
  keyNames: readonly string[];
};

/**
 * On failure `body` is the caller's original buffer, untouched.
 */
export type TimestampRewriteResult =
  | {ok: true; body: Buffer; rewrites: number}
  | {ok: false; body: Buffer; error: JsonTimestampError};
