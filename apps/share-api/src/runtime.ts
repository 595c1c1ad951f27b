import {createEndpointValidator, type DnsResolver} from '@share-gateway/endpoint-guard'
import {createNoopLogger, type StructuredLogger} from '@share-gateway/logging'
import {createSharingClient, type FetchLike} from '@share-gateway/sharing-client'
import {
  createClientCredentialsAcquirer,
  createTokenCache,
  TokenAcquisitionError,
  type AcquireCredential
} from '@share-gateway/token-cache'

import {hasClientCredentials, type ServiceConfig} from './config'
import {createShareOperations, type ShareOperations} from './operations'

export type ShareApiRuntime = {
  config: ServiceConfig
  logger: StructuredLogger
  now: () => Date
  operations: ShareOperations
  authenticationConfigured: boolean
}

const missingCredentialsAcquirer: AcquireCredential = () =>
  Promise.reject(
    new TokenAcquisitionError({
      code: 'token_acquisition_failed',
      message: 'Client credentials are not configured'
    })
  )

const createAcquirer = ({config, fetchImpl}: {config: ServiceConfig; fetchImpl?: FetchLike}) => {
  const {accountId, clientId, clientSecret, tokenEndpoint, scope, requestTimeoutMs} = config.auth
  if (!accountId || !clientId || !clientSecret) {
    return missingCredentialsAcquirer
  }

  return createClientCredentialsAcquirer({
    config: {
      account_id: accountId,
      client_id: clientId,
      client_secret: clientSecret,
      scope,
      timeout_ms: requestTimeoutMs,
      ...(tokenEndpoint ? {token_endpoint: tokenEndpoint} : {})
    },
    ...(fetchImpl ? {fetchImpl} : {})
  })
}

export const createShareApiRuntime = ({
  config,
  logger = createNoopLogger(),
  fetchImpl,
  dnsResolver,
  now = () => new Date()
}: {
  config: ServiceConfig
  logger?: StructuredLogger
  fetchImpl?: FetchLike
  dnsResolver?: DnsResolver
  now?: () => Date
}): ShareApiRuntime => {
  const tokenCache = createTokenCache({
    acquire: createAcquirer({config, ...(fetchImpl ? {fetchImpl} : {})}),
    config: {refresh_buffer_ms: config.auth.refreshBufferSeconds * 1000},
    logger
  })

  const validateEndpoint = createEndpointValidator({
    config: {
      allowed_host_suffixes: config.endpointGuard.allowedHostSuffixes,
      dns_timeout_ms: config.endpointGuard.dnsTimeoutMs,
      probe_timeout_ms: config.endpointGuard.probeTimeoutMs
    },
    ...(dnsResolver ? {dns_resolver: dnsResolver} : {}),
    ...(fetchImpl ? {fetchImpl} : {}),
    logger
  })

  const operations = createShareOperations({
    tokenCache,
    validateEndpoint,
    createClient: ({destination, credential}) =>
      createSharingClient({
        destination,
        credential,
        timeoutMs: config.upstream.timeoutMs,
        ...(fetchImpl ? {fetchImpl} : {})
      }),
    logger,
    now
  })

  return {
    config,
    logger,
    now,
    operations,
    authenticationConfigured: hasClientCredentials(config.auth)
  }
}
