import {randomUUID} from 'node:crypto'
import type {IncomingHttpHeaders} from 'node:http'

import {rewriteTimestampFields} from '@keyserver-rest/json-timestamp'
import {forComponent, runWithLogContext, setLogContextFields, type StructuredLogger} from '@keyserver-rest/logging'
import type {Request, Response} from 'express'

import {isBackendError, toAppError, type KeyServerBackend, type RequestContext} from '../backend'
import {gatewayError, isAppError} from '../errors'
import {decodeJsonMessage, extractCorrelationId, readBodyBuffer, sendBody, sendError, sendJson} from '../http'
import type {KeyServerRouteKind, RouteBinding, RouteResultMap} from './routes/types'
import {createRouteMatch, type RouteMatch} from './urlVariables'

export type DispatchRuntime = {
  backend: KeyServerBackend
  logger: StructuredLogger
  maxBodyBytes: number
  now: () => Date
}

export type DispatchRequest = AsyncIterable<unknown> & {
  headers: IncomingHttpHeaders
}

/**
 * Runs one request through a binding: prototype, URL parameters, timestamp
 * rewrite, body decode, then the backend call. Every step before the handler
 * throws an `AppError`, so the handler only ever sees a fully decoded message.
 */
export const dispatchRoute = async <K extends KeyServerRouteKind>({
  binding,
  request,
  match,
  searchParams,
  context,
  runtime
}: {
  binding: RouteBinding<K>
  request: DispatchRequest
  match: RouteMatch | undefined
  searchParams: URLSearchParams
  context: RequestContext
  runtime: Pick<DispatchRuntime, 'backend' | 'maxBodyBytes'>
}): Promise<RouteResultMap[K]> => {
  const message = binding.createMessage()
  binding.parseParameters({message, match, searchParams})

  const raw = await readBodyBuffer({request, maxBodyBytes: runtime.maxBodyBytes})
  const rewritten = rewriteTimestampFields({body: raw, keyNames: binding.timestampFields})
  if (!rewritten.ok) {
    throw gatewayError('timestamp_invalid', rewritten.error.message)
  }

  const decoded = decodeJsonMessage({
    raw: rewritten.body,
    contentType: request.headers['content-type'],
    schema: binding.schema,
    message
  })

  if ('user_id' in decoded && typeof decoded.user_id === 'string' && decoded.user_id.length > 0) {
    setLogContextFields({user_id: decoded.user_id})
  }

  try {
    return await binding.handler({backend: runtime.backend, context, message: decoded})
  } catch (error) {
    if (isBackendError(error)) {
      throw toAppError(error)
    }

    throw error
  }
}

export const createRouteHandler = <K extends KeyServerRouteKind>({
  binding,
  runtime
}: {
  binding: RouteBinding<K>
  runtime: DispatchRuntime
}) => {
  const logger = forComponent(runtime.logger, 'http.server')

  return (request: Request, response: Response) => {
    const correlationId = extractCorrelationId(request)
    const requestId = randomUUID()
    const startedAtMs = runtime.now().getTime()
    const method = request.method
    const url = new URL(request.originalUrl, 'http://localhost')
    const route = url.pathname

    return runWithLogContext(
      {
        correlation_id: correlationId,
        request_id: requestId,
        route_kind: binding.kind,
        route,
        method
      },
      async () => {
        let responseReasonCode: string | undefined

        logger.info({event: 'request.received', message: 'Request received'})

        try {
          const result = await dispatchRoute({
            binding,
            request,
            match: createRouteMatch(request.params),
            searchParams: url.searchParams,
            context: {correlationId, requestId, method, route},
            runtime
          })

          if (binding.present) {
            const presented = binding.present(result)
            sendBody({response, status: 200, correlationId, ...presented})
            return
          }

          sendJson({response, status: 200, correlationId, payload: result})
        } catch (error) {
          if (isAppError(error)) {
            responseReasonCode = error.code
            logger.warn({
              event: 'request.rejected',
              message: `Request rejected: ${error.code}`,
              reason_code: error.code
            })

            sendError({
              response,
              status: error.status,
              error: error.code,
              message: error.message,
              correlationId
            })
            return
          }

          const failure = gatewayError('internal_error', 'Unexpected internal error')
          responseReasonCode = failure.code
          logger.error({
            event: 'request.failed',
            message: failure.message,
            reason_code: failure.code,
            metadata: {
              error
            }
          })

          sendError({
            response,
            status: failure.status,
            error: failure.code,
            message: failure.message,
            correlationId
          })
        } finally {
          const durationMs = Math.max(0, runtime.now().getTime() - startedAtMs)
          const statusCode = response.statusCode
          const baseLog = {
            event: 'request.completed',
            message: 'Request completed',
            status_code: statusCode,
            duration_ms: durationMs,
            ...(responseReasonCode ? {reason_code: responseReasonCode} : {})
          }

          if (statusCode >= 500) {
            logger.error(baseLog)
          } else if (statusCode >= 400) {
            logger.warn(baseLog)
          } else {
            logger.info(baseLog)
          }
        }
      }
    )
  }
}
