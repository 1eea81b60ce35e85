import {forComponent, type ComponentLogger, type StructuredLogger} from '@keyserver-rest/logging'
import {Router, type NextFunction, type Request, type Response} from 'express'

import type {KeyServerBackend} from '../backend'
import type {ServiceConfig} from '../config'
import {gatewayError} from '../errors'
import {extractCorrelationId, sendError, sendJson} from '../http'
import type {DispatchRuntime} from './dispatch'
import {routeBindings, type RegisteredRoute} from './routes'
import {isUrlVariableDecodeFailure, urlVariableDecodeError} from './urlVariables'

const healthRoute = (request: Request, response: Response) => {
  sendJson({
    response,
    status: 200,
    correlationId: extractCorrelationId(request),
    payload: {status: 'ok'}
  })
}

const fallbackRoute = (request: Request, response: Response) => {
  const error = gatewayError('route_not_found', `Unsupported route ${request.method} ${request.path}`)
  sendError({
    response,
    status: error.status,
    error: error.code,
    message: error.message,
    correlationId: extractCorrelationId(request)
  })
}

const createDecodeFailureHandler =
  (logger: ComponentLogger) => (error: unknown, request: Request, response: Response, next: NextFunction) => {
    if (!isUrlVariableDecodeFailure(error)) {
      next(error)
      return
    }

    const failure = urlVariableDecodeError()
    logger.warn({
      event: 'request.rejected',
      message: `Request rejected: ${failure.code}`,
      reason_code: failure.code,
      metadata: {method: request.method, path: request.path}
    })

    sendError({
      response,
      status: failure.status,
      error: failure.code,
      message: failure.message,
      correlationId: extractCorrelationId(request)
    })
  }

export const createRestRouter = ({
  bindings = routeBindings,
  backend,
  logger,
  config,
  now = () => new Date()
}: {
  bindings?: readonly RegisteredRoute[]
  backend: KeyServerBackend
  logger: StructuredLogger
  config: Pick<ServiceConfig, 'maxBodyBytes' | 'hkpEnabled'>
  now?: () => Date
}) => {
  const runtime: DispatchRuntime = {backend, logger, maxBodyBytes: config.maxBodyBytes, now}
  const router = Router()
  const registered = new Set<string>()

  router.get('/healthz', healthRoute)

  for (const binding of bindings) {
    if (binding.kind === 'hkpLookup' && !config.hkpEnabled) {
      continue
    }

    const routeKey = `${binding.method} ${binding.path}`
    if (registered.has(routeKey)) {
      throw new Error(`Duplicate route binding for ${routeKey}`)
    }
    registered.add(routeKey)

    const handler = binding.createHandler(runtime)
    switch (binding.method) {
      case 'GET':
        router.get(binding.path, handler)
        break
      case 'PUT':
        router.put(binding.path, handler)
        break
    }
  }

  router.use(fallbackRoute)
  router.use(createDecodeFailureHandler(forComponent(logger, 'http.router')))

  return router
}
