import type {Writable} from 'node:stream';

import {LogEventSchema, type LogEvent} from '@keyserver-rest/schemas';
import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {sanitizeForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EmittableLogLevelSchema = LogLevelSchema.exclude(['silent']);
type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
};

export const LogEventInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    user_id: z.string().min(1).optional(),
    route_kind: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

type LevelMethodInput = Omit<LogEventInput, 'level'>;
type ComponentMethodInput = Omit<LogEventInput, 'level' | 'component'>;

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: (input: LevelMethodInput) => void;
  info: (input: LevelMethodInput) => void;
  warn: (input: LevelMethodInput) => void;
  error: (input: LevelMethodInput) => void;
  fatal: (input: LevelMethodInput) => void;
};

export type ComponentLogger = {
  debug: (input: ComponentMethodInput) => void;
  info: (input: ComponentMethodInput) => void;
  warn: (input: ComponentMethodInput) => void;
  error: (input: ComponentMethodInput) => void;
  fatal: (input: ComponentMethodInput) => void;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Explicit input fields win over the ambient request context.
const resolveContextFields = ({input, context}: {input: LogEventInput; context: LogContext | undefined}) => {
  const merged = {
    user_id: input.user_id ?? context?.user_id,
    route_kind: input.route_kind ?? context?.route_kind,
    route: input.route ?? context?.route,
    method: input.method ?? context?.method
  };

  return Object.fromEntries(Object.entries(merged).filter(([, value]) => value !== undefined));
};

const buildEnvelope = ({
  input,
  options,
  context
}: {
  input: LogEventInput;
  options: StructuredLoggerOptions;
  context: LogContext | undefined;
}): LogEvent => {
  const metadata = sanitizeForLog({
    value: input.metadata ?? {},
    extraSensitiveKeys: options.extraSensitiveKeys
  });

  return LogEventSchema.parse({
    ts: (options.now ?? (() => new Date()))().toISOString(),
    level: input.level,
    service: options.service,
    env: options.env,
    event: input.event,
    component: input.component,
    correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
    request_id: input.request_id ?? context?.request_id ?? 'n/a',
    ...resolveContextFields({input, context}),
    ...(input.message ? {message: input.message} : {}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    ...(input.status_code !== undefined ? {status_code: input.status_code} : {}),
    metadata: isRecord(metadata) ? metadata : {}
  });
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const configuredLevel = LogLevelSchema.parse(options.level);
  const resolvedOptions: StructuredLoggerOptions = {
    ...options,
    service: z.string().min(1).parse(options.service),
    env: z.string().min(1).parse(options.env),
    extraSensitiveKeys: options.extraSensitiveKeys ?? []
  };
  const writer = options.writer ?? defaultWriter;

  const log = (rawInput: LogEventInput) => {
    const input = LogEventInputSchema.parse(rawInput);
    if (LEVEL_ORDER[input.level] < LEVEL_ORDER[configuredLevel]) {
      return;
    }

    const stream = input.level === 'error' || input.level === 'fatal' ? writer.stderr : writer.stdout;
    try {
      const envelope = buildEnvelope({input, options: resolvedOptions, context: getLogContext()});
      stream.write(`${JSON.stringify(envelope)}\n`);
    } catch {
      // A broken log sink must not fail the request being logged.
    }
  };

  return {
    log,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'})
  };
};

export const forComponent = (logger: StructuredLogger, component: string): ComponentLogger => ({
  debug: input => logger.debug({...input, component}),
  info: input => logger.info({...input, component}),
  warn: input => logger.warn({...input, component}),
  error: input => logger.error({...input, component}),
  fatal: input => logger.fatal({...input, component})
});

export const createNoopLogger = (): StructuredLogger => ({
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined
});
