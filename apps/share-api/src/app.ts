import type {Server} from 'node:http'

import helmet from 'helmet'
import express from 'express'
import {NestFactory} from '@nestjs/core'
import {ExpressAdapter} from '@nestjs/platform-express'

import type {DnsResolver} from '@share-gateway/endpoint-guard'
import {createStructuredLogger, type StructuredLogger} from '@share-gateway/logging'
import type {FetchLike} from '@share-gateway/sharing-client'

import {SERVICE_NAME, type ServiceConfig} from './config'
import {ShareApiNestModule} from './nest/shareApiNestModule'
import {createShareApiRuntime} from './runtime'

export const createShareApiApp = async ({
  config,
  logger,
  fetchImpl,
  dnsResolver,
  now
}: {
  config: ServiceConfig
  logger?: StructuredLogger
  fetchImpl?: FetchLike
  dnsResolver?: DnsResolver
  now?: () => Date
}) => {
  const appLogger =
    logger ??
    createStructuredLogger({
      service: SERVICE_NAME,
      env: config.nodeEnv,
      level: config.logging.level,
      extraSensitiveKeys: config.logging.redactExtraKeys
    })

  const runtime = createShareApiRuntime({
    config,
    logger: appLogger,
    ...(fetchImpl ? {fetchImpl} : {}),
    ...(dnsResolver ? {dnsResolver} : {}),
    ...(now ? {now} : {})
  })

  const expressApp = express()
  expressApp.disable('x-powered-by')
  expressApp.use(
    helmet({
      contentSecurityPolicy: false
    })
  )

  const nestApp = await NestFactory.create(ShareApiNestModule.register({runtime}), new ExpressAdapter(expressApp), {
    bodyParser: false,
    logger: config.nodeEnv === 'test' ? false : ['error', 'warn', 'log']
  })

  if (config.corsAllowedOrigins.length > 0) {
    nestApp.enableCors({
      origin: config.corsAllowedOrigins
    })
  }

  await nestApp.init()

  const server: Server = nestApp.getHttpServer()

  const start = async () => {
    await nestApp.listen(config.port, config.host)
  }

  const stop = async () => {
    await nestApp.close()
  }

  return {
    server,
    start,
    stop,
    runtime
  }
}

export type ShareApiApp = Awaited<ReturnType<typeof createShareApiApp>>
