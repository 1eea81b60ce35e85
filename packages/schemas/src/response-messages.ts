import {z} from 'zod'

import {SignedKeySchema, TimestampSchema, CounterSchema} from './request-messages'

export const EntrySchema = z
  .object({
    user_id: z.string(),
    app_id: z.string(),
    epoch: CounterSchema,
    commitment_timestamp: CounterSchema,
    signed_key: SignedKeySchema
  })
  .strict()

export const GetEntryResponseSchema = EntrySchema

export const ListEntryHistoryResponseSchema = z
  .object({
    values: z.array(EntrySchema),
    next_epoch: CounterSchema
  })
  .strict()

export const UpdateEntryResponseSchema = z
  .object({
    user_id: z.string(),
    epoch: CounterSchema,
    commitment_timestamp: CounterSchema
  })
  .strict()

export const SignedEpochHeadSchema = z
  .object({
    epoch: CounterSchema,
    issue_time: TimestampSchema,
    root_hash: z.string().regex(/^[0-9a-f]{64}$/u)
  })
  .strict()

export const ListSEHResponseSchema = z
  .object({
    heads: z.array(SignedEpochHeadSchema),
    next_epoch: CounterSchema
  })
  .strict()

export const EntryUpdateSchema = z
  .object({
    commitment_timestamp: CounterSchema,
    epoch: CounterSchema,
    user_id: z.string(),
    app_id: z.string()
  })
  .strict()

export const ListUpdateResponseSchema = z
  .object({
    updates: z.array(EntryUpdateSchema),
    next_commitment_timestamp: CounterSchema
  })
  .strict()

export const StepSchema = z
  .object({
    commitment_timestamp: CounterSchema,
    epoch: CounterSchema,
    user_id: z.string(),
    entry_digest: z.string().regex(/^[0-9a-f]{64}$/u)
  })
  .strict()

export const ListStepsResponseSchema = z
  .object({
    steps: z.array(StepSchema),
    next_commitment_timestamp: CounterSchema
  })
  .strict()

export const HttpBodySchema = z
  .object({
    content_type: z.string().min(1),
    body: z.string()
  })
  .strict()

export type Entry = z.infer<typeof EntrySchema>
export type GetEntryResponse = z.infer<typeof GetEntryResponseSchema>
export type ListEntryHistoryResponse = z.infer<typeof ListEntryHistoryResponseSchema>
export type UpdateEntryResponse = z.infer<typeof UpdateEntryResponseSchema>
export type SignedEpochHead = z.infer<typeof SignedEpochHeadSchema>
export type ListSEHResponse = z.infer<typeof ListSEHResponseSchema>
export type EntryUpdate = z.infer<typeof EntryUpdateSchema>
export type ListUpdateResponse = z.infer<typeof ListUpdateResponseSchema>
export type Step = z.infer<typeof StepSchema>
export type ListStepsResponse = z.infer<typeof ListStepsResponseSchema>
export type HttpBody = z.infer<typeof HttpBodySchema>
