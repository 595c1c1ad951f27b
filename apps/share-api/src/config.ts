import {z} from 'zod'

import {DEFAULT_ALLOWED_HOST_SUFFIXES} from '@share-gateway/endpoint-guard'
import {LogLevelSchema, type LogLevel} from '@share-gateway/logging'
import {DEFAULT_TOKEN_SCOPE} from '@share-gateway/token-cache'

export const SERVICE_NAME = 'share-api'

const parseInteger = (value: unknown) => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}

const numberFromEnv = z.preprocess(parseInteger, z.number().int().positive())

const rangeFromEnv = ({min, max}: {min: number; max: number}) =>
  z.preprocess(parseInteger, z.number().int().min(min).max(max))

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const optionalUrl = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().url().optional())

const parseList = (raw: string | undefined) =>
  (raw ?? '')
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)

const parseCorsAllowedOrigins = ({
  raw,
  envVarName
}: {
  raw: string | undefined
  envVarName: string
}) => {
  const origins = parseList(raw)

  for (const origin of origins) {
    let parsed: URL
    try {
      parsed = new URL(origin)
    } catch {
      throw new Error(`${envVarName} contains an invalid URL origin: ${origin}`)
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`${envVarName} contains an unsupported origin protocol: ${origin}`)
    }
  }

  return origins
}

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    SHARE_API_HOST: z.string().default('0.0.0.0'),
    SHARE_API_PORT: rangeFromEnv({min: 1, max: 65_535}).default(8000),
    SHARE_API_MAX_BODY_BYTES: numberFromEnv.default(1024 * 1024),
    SHARE_API_SERVICE_VERSION: z.string().trim().min(1).default('0.1.0'),
    SHARE_API_ACCOUNT_ID: optionalString,
    SHARE_API_CLIENT_ID: optionalString,
    SHARE_API_CLIENT_SECRET: optionalString,
    SHARE_API_TOKEN_ENDPOINT: optionalUrl,
    SHARE_API_TOKEN_SCOPE: z.string().trim().min(1).default(DEFAULT_TOKEN_SCOPE),
    SHARE_API_TOKEN_REFRESH_BUFFER_SECONDS: numberFromEnv.default(300),
    SHARE_API_TOKEN_REQUEST_TIMEOUT_MS: rangeFromEnv({min: 100, max: 60_000}).default(10_000),
    SHARE_API_DNS_TIMEOUT_MS: rangeFromEnv({min: 100, max: 10_000}).default(2_000),
    SHARE_API_PROBE_TIMEOUT_MS: rangeFromEnv({min: 100, max: 30_000}).default(5_000),
    SHARE_API_ALLOWED_HOST_SUFFIXES: optionalString,
    SHARE_API_UPSTREAM_TIMEOUT_MS: rangeFromEnv({min: 100, max: 120_000}).default(30_000),
    SHARE_API_CORS_ALLOWED_ORIGINS: optionalString,
    SHARE_API_LOG_LEVEL: LogLevelSchema.optional(),
    SHARE_API_LOG_REDACT_EXTRA_KEYS: optionalString
  })
  .strict()

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  maxBodyBytes: number
  serviceVersion: string
  corsAllowedOrigins: string[]
  logging: {
    level: LogLevel
    redactExtraKeys: string[]
  }
  auth: {
    accountId?: string
    clientId?: string
    clientSecret?: string
    tokenEndpoint?: string
    scope: string
    refreshBufferSeconds: number
    requestTimeoutMs: number
  }
  endpointGuard: {
    allowedHostSuffixes: string[]
    dnsTimeoutMs: number
    probeTimeoutMs: number
  }
  upstream: {
    timeoutMs: number
  }
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  SHARE_API_HOST: env.SHARE_API_HOST,
  SHARE_API_PORT: env.SHARE_API_PORT,
  SHARE_API_MAX_BODY_BYTES: env.SHARE_API_MAX_BODY_BYTES,
  SHARE_API_SERVICE_VERSION: env.SHARE_API_SERVICE_VERSION,
  SHARE_API_ACCOUNT_ID: env.SHARE_API_ACCOUNT_ID,
  SHARE_API_CLIENT_ID: env.SHARE_API_CLIENT_ID,
  SHARE_API_CLIENT_SECRET: env.SHARE_API_CLIENT_SECRET,
  SHARE_API_TOKEN_ENDPOINT: env.SHARE_API_TOKEN_ENDPOINT,
  SHARE_API_TOKEN_SCOPE: env.SHARE_API_TOKEN_SCOPE,
  SHARE_API_TOKEN_REFRESH_BUFFER_SECONDS: env.SHARE_API_TOKEN_REFRESH_BUFFER_SECONDS,
  SHARE_API_TOKEN_REQUEST_TIMEOUT_MS: env.SHARE_API_TOKEN_REQUEST_TIMEOUT_MS,
  SHARE_API_DNS_TIMEOUT_MS: env.SHARE_API_DNS_TIMEOUT_MS,
  SHARE_API_PROBE_TIMEOUT_MS: env.SHARE_API_PROBE_TIMEOUT_MS,
  SHARE_API_ALLOWED_HOST_SUFFIXES: env.SHARE_API_ALLOWED_HOST_SUFFIXES,
  SHARE_API_UPSTREAM_TIMEOUT_MS: env.SHARE_API_UPSTREAM_TIMEOUT_MS,
  SHARE_API_CORS_ALLOWED_ORIGINS: env.SHARE_API_CORS_ALLOWED_ORIGINS,
  SHARE_API_LOG_LEVEL: env.SHARE_API_LOG_LEVEL,
  SHARE_API_LOG_REDACT_EXTRA_KEYS: env.SHARE_API_LOG_REDACT_EXTRA_KEYS
})

export const hasClientCredentials = (auth: ServiceConfig['auth']) =>
  Boolean(auth.accountId && auth.clientId && auth.clientSecret)

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))

  if (
    parsed.NODE_ENV === 'production' &&
    (!parsed.SHARE_API_ACCOUNT_ID || !parsed.SHARE_API_CLIENT_ID || !parsed.SHARE_API_CLIENT_SECRET)
  ) {
    throw new Error(
      'Production requires SHARE_API_ACCOUNT_ID, SHARE_API_CLIENT_ID and SHARE_API_CLIENT_SECRET'
    )
  }

  const allowedHostSuffixes = parseList(parsed.SHARE_API_ALLOWED_HOST_SUFFIXES)
  const loggingLevel = parsed.SHARE_API_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info')

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.SHARE_API_HOST,
    port: parsed.SHARE_API_PORT,
    maxBodyBytes: parsed.SHARE_API_MAX_BODY_BYTES,
    serviceVersion: parsed.SHARE_API_SERVICE_VERSION,
    corsAllowedOrigins: parseCorsAllowedOrigins({
      raw: parsed.SHARE_API_CORS_ALLOWED_ORIGINS,
      envVarName: 'SHARE_API_CORS_ALLOWED_ORIGINS'
    }),
    logging: {
      level: loggingLevel,
      redactExtraKeys: parseList(parsed.SHARE_API_LOG_REDACT_EXTRA_KEYS)
    },
    auth: {
      ...(parsed.SHARE_API_ACCOUNT_ID ? {accountId: parsed.SHARE_API_ACCOUNT_ID} : {}),
      ...(parsed.SHARE_API_CLIENT_ID ? {clientId: parsed.SHARE_API_CLIENT_ID} : {}),
      ...(parsed.SHARE_API_CLIENT_SECRET ? {clientSecret: parsed.SHARE_API_CLIENT_SECRET} : {}),
      ...(parsed.SHARE_API_TOKEN_ENDPOINT ? {tokenEndpoint: parsed.SHARE_API_TOKEN_ENDPOINT} : {}),
      scope: parsed.SHARE_API_TOKEN_SCOPE,
      refreshBufferSeconds: parsed.SHARE_API_TOKEN_REFRESH_BUFFER_SECONDS,
      requestTimeoutMs: parsed.SHARE_API_TOKEN_REQUEST_TIMEOUT_MS
    },
    endpointGuard: {
      allowedHostSuffixes:
        allowedHostSuffixes.length > 0 ? allowedHostSuffixes : [...DEFAULT_ALLOWED_HOST_SUFFIXES],
      dnsTimeoutMs: parsed.SHARE_API_DNS_TIMEOUT_MS,
      probeTimeoutMs: parsed.SHARE_API_PROBE_TIMEOUT_MS
    },
    upstream: {
      timeoutMs: parsed.SHARE_API_UPSTREAM_TIMEOUT_MS
    }
  }
}
