import {z} from 'zod'

const BASE64_REGEX = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/u
const UNSIGNED_DIGITS_REGEX = /^\d+$/u

export const UINT64_MAX = 18_446_744_073_709_551_615n

/**
 * Request-side uint64. Accepts a bigint, an integer JSON number or a decimal
 * string, and always yields a bigint so the full 64-bit range survives.
 */
export const Uint64Schema = z
  .union([
    z.bigint(),
    z.number().int(),
    z.string().regex(UNSIGNED_DIGITS_REGEX, 'must be an unsigned integer')
  ])
  .transform(value => BigInt(value))
  .pipe(z.bigint().gte(0n).lte(UINT64_MAX))

// Response counters are written as JSON numbers.
export const CounterSchema = z.number().int().gte(0).lte(Number.MAX_SAFE_INTEGER)
export const PageSizeSchema = z.number().int().gte(0).lte(2_147_483_647)
export const BytesSchema = z.string().regex(BASE64_REGEX, 'must be base64 encoded')

export const TimestampSchema = z
  .object({
    seconds: z.number().int(),
    nanos: z.number().int().gte(0).lte(999_999_999)
  })
  .strict()

export const KeySchema = z
  .object({
    app_id: z.string().default(''),
    format: z.string().default(''),
    key_data: BytesSchema.default(''),
    creation_time: TimestampSchema.optional()
  })
  .strict()

export const SignedKeySchema = z
  .object({
    key: KeySchema,
    signature: BytesSchema.default('')
  })
  .strict()

export const GetEntryRequestSchema = z
  .object({
    user_id: z.string().default(''),
    epoch: Uint64Schema.default(0n),
    app_id: z.string().default('')
  })
  .strict()

export const HkpLookupRequestSchema = z
  .object({
    op: z.string().default(''),
    search: z.string().default(''),
    options: z.string().default('')
  })
  .strict()

export const ListEntryHistoryRequestSchema = z
  .object({
    user_id: z.string().default(''),
    start_epoch: Uint64Schema.default(0n),
    page_size: PageSizeSchema.default(0)
  })
  .strict()

export const UpdateEntryRequestSchema = z
  .object({
    user_id: z.string().default(''),
    signed_key: SignedKeySchema.optional()
  })
  .strict()

export const ListSEHRequestSchema = z
  .object({
    start_epoch: Uint64Schema.default(0n),
    page_size: PageSizeSchema.default(0)
  })
  .strict()

export const ListUpdateRequestSchema = z
  .object({
    start_commitment_timestamp: Uint64Schema.default(0n),
    page_size: PageSizeSchema.default(0)
  })
  .strict()

export const ListStepsRequestSchema = z
  .object({
    start_commitment_timestamp: Uint64Schema.default(0n),
    page_size: PageSizeSchema.default(0)
  })
  .strict()

export type Timestamp = z.infer<typeof TimestampSchema>
export type Key = z.infer<typeof KeySchema>
export type SignedKey = z.infer<typeof SignedKeySchema>
export type GetEntryRequest = z.infer<typeof GetEntryRequestSchema>
export type HkpLookupRequest = z.infer<typeof HkpLookupRequestSchema>
export type ListEntryHistoryRequest = z.infer<typeof ListEntryHistoryRequestSchema>
export type UpdateEntryRequest = z.infer<typeof UpdateEntryRequestSchema>
export type ListSEHRequest = z.infer<typeof ListSEHRequestSchema>
export type ListUpdateRequest = z.infer<typeof ListUpdateRequestSchema>
export type ListStepsRequest = z.infer<typeof ListStepsRequestSchema>
