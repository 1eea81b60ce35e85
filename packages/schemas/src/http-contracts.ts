import {z} from 'zod'

export const ErrorResponseSchema = z
  .object({
    error: z.string().min(1),
    message: z.string(),
    correlation_id: z.string().min(1).max(128)
  })
  .strict()

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>

export const LogEventSchema = z
  .object({
    ts: z.iso.datetime({offset: true}),
    level: z.enum(['debug', 'info', 'warn', 'error', 'fatal']),
    service: z.string().min(1),
    env: z.string().min(1),
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128),
    request_id: z.string().min(1).max(128),
    user_id: z.string().min(1).optional(),
    route_kind: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown())
  })
  .strict()

export type LogEvent = z.infer<typeof LogEventSchema>
