import {createServer} from 'node:http'

import helmet from 'helmet'
import express from 'express'
import {createStructuredLogger, type StructuredLogger} from '@keyserver-rest/logging'

import type {KeyServerBackend} from './backend'
import type {ServiceConfig} from './config'
import {createRestRouter} from './http/router'
import type {RegisteredRoute} from './http/routes'
import {createGatewayRuntime} from './runtime'

export const appName = 'rest-gateway'

export const createRestGatewayApp = ({
  config,
  backend,
  logger,
  bindings,
  now
}: {
  config: ServiceConfig
  backend: KeyServerBackend
  logger?: StructuredLogger
  bindings?: readonly RegisteredRoute[]
  now?: () => Date
}) => {
  const resolvedLogger =
    logger ??
    createStructuredLogger({
      service: appName,
      env: config.nodeEnv,
      level: config.logging.level,
      extraSensitiveKeys: config.logging.redactExtraKeys
    })

  const expressApp = express()
  expressApp.disable('x-powered-by')
  expressApp.use(
    helmet({
      contentSecurityPolicy: false
    })
  )
  expressApp.use(
    createRestRouter({
      backend,
      logger: resolvedLogger,
      config,
      ...(bindings ? {bindings} : {}),
      ...(now ? {now} : {})
    })
  )

  const server = createServer(expressApp)
  const runtime = createGatewayRuntime({server, host: config.host, port: config.port})

  return {
    expressApp,
    server,
    logger: resolvedLogger,
    start: runtime.start,
    stop: runtime.stop
  }
}
