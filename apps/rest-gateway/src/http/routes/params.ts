import {PageSizeSchema, Uint64Schema} from '@keyserver-rest/schemas'
import {z} from 'zod'

const UNSIGNED_DIGITS_REGEX = /^\d+$/u

const emptyAsAbsent = (value: unknown) => (value === '' ? undefined : value)

const unsignedDigits = () => z.string().regex(UNSIGNED_DIGITS_REGEX, 'must be an unsigned integer')

export const uint64QueryParam = z.preprocess(emptyAsAbsent, unsignedDigits().pipe(Uint64Schema).optional())

export const pageSizeQueryParam = z.preprocess(
  emptyAsAbsent,
  unsignedDigits()
    .transform(value => Number(value))
    .pipe(PageSizeSchema)
    .optional()
)

export const stringQueryParam = z.preprocess(emptyAsAbsent, z.string().optional())

export const USER_ID_VARIABLE = 'user_id'
