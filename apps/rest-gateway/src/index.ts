import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@keyserver-rest/logging'

import {appName, createRestGatewayApp} from './app'
import {loadConfig} from './config'
import {InMemoryKeyServerBackend} from './memoryBackend'

export * from './app'
export * from './backend'
export * from './config'
export * from './errors'
export * from './http'
export * from './http/dispatch'
export * from './http/router'
export * from './http/routes'
export * from './http/urlVariables'
export * from './memoryBackend'
export * from './runtime'

export const main = async (env: NodeJS.ProcessEnv = process.env) => {
  const config = loadConfig(env)
  const app = createRestGatewayApp({config, backend: new InMemoryKeyServerBackend()})

  await app.start()
  app.logger.info({
    event: 'process.started',
    component: 'process.entrypoint',
    message: `Listening on ${config.host}:${String(config.port)}`
  })

  const shutdown = async () => {
    await app.stop()
    process.exit(0)
  }

  process.on('SIGINT', () => {
    void shutdown()
  })
  process.on('SIGTERM', () => {
    void shutdown()
  })

  return app
}

const isMainModule = (() => {
  const currentFile = fileURLToPath(import.meta.url)
  const entryFile = process.argv[1]
  if (!entryFile) {
    return false
  }

  return currentFile === entryFile
})()

if (isMainModule) {
  void main().catch(error => {
    const env = process.env.NODE_ENV === 'production' ? 'production' : process.env.NODE_ENV === 'test' ? 'test' : 'development'
    const startupLogger = createStructuredLogger({
      service: appName,
      env,
      level: 'error'
    })
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'REST gateway startup failed',
      reason_code: 'startup_failed',
      metadata: {
        error
      }
    })
    process.exit(1)
  })
}
