import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {ErrorResponseSchema} from '@keyserver-rest/schemas'
import {z} from 'zod'

import {gatewayError} from './errors'

const DEFAULT_SECURITY_HEADERS: Record<string, string> = {
  'x-content-type-options': 'nosniff',
  'x-frame-options': 'DENY',
  'referrer-policy': 'no-referrer',
  'cross-origin-resource-policy': 'same-origin',
  'cache-control': 'no-store'
}

const isJsonContentType = (contentTypeHeader: string | undefined) => {
  if (!contentTypeHeader) {
    return false
  }

  return contentTypeHeader.toLowerCase().includes('application/json')
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

type ValidationIssue = {readonly path: readonly PropertyKey[]; readonly message: string}

const formatIssues = (issues: readonly ValidationIssue[]) =>
  issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ')

export const extractCorrelationId = (request: IncomingMessage) => {
  const header = request.headers['x-correlation-id']
  const value = Array.isArray(header) ? header[0] : header
  if (typeof value !== 'string') {
    return randomUUID()
  }

  const trimmed = value.trim()
  if (trimmed.length === 0 || trimmed.length > 128) {
    return randomUUID()
  }

  return trimmed
}

export const readBodyBuffer = async ({
  request,
  maxBodyBytes
}: {
  request: AsyncIterable<unknown>
  maxBodyBytes: number
}) => {
  const chunks: Buffer[] = []
  let size = 0

  for await (const chunk of request) {
    let bufferChunk: Buffer
    if (typeof chunk === 'string') {
      bufferChunk = Buffer.from(chunk, 'utf8')
    } else if (chunk instanceof Uint8Array) {
      bufferChunk = Buffer.from(chunk)
    } else {
      throw gatewayError('request_body_invalid', 'Request body contains an invalid chunk type')
    }

    size += bufferChunk.length
    if (size > maxBodyBytes) {
      throw gatewayError('request_body_too_large', `Request body exceeds ${String(maxBodyBytes)} bytes`)
    }

    chunks.push(bufferChunk)
  }

  return Buffer.concat(chunks)
}

const EMPTY_OBJECT_BODY_REGEX = /^\s*(?:\{\s*\})?\s*$/u

/**
 * Decodes a JSON request body on top of a message that already carries the
 * prototype defaults and any URL parameters. Fields present in the body win.
 * A body that is empty, blank or `{}` leaves the message as it is whatever
 * its Content-Type.
 */
export const decodeJsonMessage = <TMessage extends object>({
  raw,
  contentType,
  schema,
  message
}: {
  raw: Buffer
  contentType: string | undefined
  schema: z.ZodType<TMessage>
  message: TMessage
}): TMessage => {
  if (raw.length === 0) {
    return message
  }

  const text = raw.toString('utf8')
  if (EMPTY_OBJECT_BODY_REGEX.test(text)) {
    return message
  }

  if (!isJsonContentType(contentType)) {
    throw gatewayError('content_type_invalid', 'Content-Type must be application/json')
  }

  let parsedBody: unknown
  try {
    parsedBody = JSON.parse(text) as unknown
  } catch {
    throw gatewayError('request_body_invalid_json', 'Request body contains invalid JSON')
  }

  if (!isPlainObject(parsedBody)) {
    throw gatewayError('request_body_schema_invalid', 'Request body must be a JSON object')
  }

  const parsed = schema.safeParse({...message, ...parsedBody})
  if (!parsed.success) {
    throw gatewayError('request_body_schema_invalid', formatIssues(parsed.error.issues))
  }

  return parsed.data
}

export const parseQuery = <TSchema extends z.ZodType>({
  searchParams,
  schema
}: {
  searchParams: URLSearchParams
  schema: TSchema
}) => {
  const queryObject = Object.fromEntries(searchParams.entries())

  const parsed = schema.safeParse(queryObject)
  if (!parsed.success) {
    throw gatewayError('query_invalid', formatIssues(parsed.error.issues))
  }

  return parsed.data
}

const serialize = (value: unknown) => Buffer.from(JSON.stringify(value), 'utf8')

export const sendJson = ({
  response,
  status,
  correlationId,
  payload,
  headers
}: {
  response: ServerResponse
  status: number
  correlationId: string
  payload: unknown
  headers?: Record<string, string>
}) => {
  sendBody({
    response,
    status,
    correlationId,
    contentType: 'application/json; charset=utf-8',
    body: serialize(payload),
    headers
  })
}

export const sendBody = ({
  response,
  status,
  correlationId,
  contentType,
  body,
  headers
}: {
  response: ServerResponse
  status: number
  correlationId: string
  contentType: string
  body: Buffer | string
  headers?: Record<string, string>
}) => {
  const bytes = typeof body === 'string' ? Buffer.from(body, 'utf8') : body

  response.writeHead(status, {
    ...DEFAULT_SECURITY_HEADERS,
    'content-type': contentType,
    'content-length': String(bytes.length),
    'x-correlation-id': correlationId,
    ...(headers ?? {})
  })

  response.end(bytes)
}

export const sendError = ({
  response,
  status,
  error,
  message,
  correlationId
}: {
  response: ServerResponse
  status: number
  error: string
  message: string
  correlationId: string
}) => {
  const payload = ErrorResponseSchema.parse({
    error,
    message,
    correlation_id: correlationId
  })

  sendJson({
    response,
    status,
    payload,
    correlationId
  })
}
