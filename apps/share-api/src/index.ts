import 'reflect-metadata'

import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@share-gateway/logging'

import {createShareApiApp} from './app'
import {loadConfig, SERVICE_NAME} from './config'

export const appName = SERVICE_NAME

export * from './app'
export * from './config'
export * from './errors'
export * from './http'
export * from './operations'
export * from './runtime'

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const

const processEnvName = (nodeEnv: string | undefined) =>
  nodeEnv === 'production' || nodeEnv === 'test' ? nodeEnv : 'development'

const main = async () => {
  const config = loadConfig(process.env)
  const app = await createShareApiApp({config})
  const {logger} = app.runtime

  await app.start()
  logger.info({
    event: 'process.started',
    component: 'process.entrypoint',
    message: `Listening on ${config.host}:${config.port}`,
    metadata: {
      version: config.serviceVersion,
      authentication_configured: app.runtime.authenticationConfigured
    }
  })

  let stopping = false
  const shutdown = async (signal: string) => {
    if (stopping) {
      return
    }
    stopping = true

    logger.info({
      event: 'process.shutdown',
      component: 'process.entrypoint',
      message: `Received ${signal}, closing server`
    })
    await app.stop()
    process.exit(0)
  }

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, () => {
      void shutdown(signal)
    })
  }
}

const isEntrypoint = process.argv[1] === fileURLToPath(import.meta.url)

if (isEntrypoint) {
  main().catch((error: unknown) => {
    createStructuredLogger({
      service: appName,
      env: processEnvName(process.env.NODE_ENV),
      level: 'error'
    }).fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'Share API startup failed',
      reason_code: 'startup_failed',
      metadata: {
        error
      }
    })
    process.exit(1)
  })
}
