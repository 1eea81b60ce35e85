import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

const ContextIdSchema = z.string().min(1).max(128);

export const LogContextSchema = z
  .object({
    correlation_id: ContextIdSchema.optional(),
    request_id: ContextIdSchema.optional(),
    user_id: z.string().min(1).optional(),
    route_kind: z.string().min(1).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const storage = new AsyncLocalStorage<LogContext>();

/**
 * Runs `operation` with a request-scoped context that every log line emitted
 * inside it (including across awaits) inherits.
 */
export const runWithLogContext = <T>(context: LogContext, operation: () => T): T =>
  storage.run(LogContextSchema.parse(context), operation);

export const getLogContext = (): LogContext | undefined => storage.getStore();

/** No-op outside of `runWithLogContext`. */
export const setLogContextFields = (fields: Partial<LogContext>): LogContext | undefined => {
  const current = storage.getStore();
  if (!current) {
    return undefined;
  }

  return Object.assign(current, LogContextSchema.partial().parse(fields));
};
