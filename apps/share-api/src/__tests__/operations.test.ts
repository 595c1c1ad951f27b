import {describe, expect, it, vi} from 'vitest'

import {err, ok, type Destination, type EndpointValidator} from '@share-gateway/endpoint-guard'
import type {StructuredLogger} from '@share-gateway/logging'
import {SharingApiError, type RecipientInfo, type SharingClient} from '@share-gateway/sharing-client'
import {
  createCredential,
  createTokenCache,
  TokenAcquisitionError,
  type Credential,
  type TokenCache
} from '@share-gateway/token-cache'

import {buildDataObjectUpdates, createShareOperations, mergeIps} from '../operations'

const WORKSPACE_URL = 'https://adb-1.1.azuredatabricks.net'
const NOW = new Date('2026-03-01T00:00:00.000Z')

const destination: Destination = {
  raw_address: WORKSPACE_URL,
  scheme: 'https',
  host: 'adb-1.1.azuredatabricks.net',
  port: 443,
  origin: WORKSPACE_URL,
  resolved_ips: ['203.0.113.10']
}

const credential = createCredential({
  bearer_value: 'test-token',
  issued_at: NOW,
  expires_at: new Date(NOW.getTime() + 3_600_000),
  scope: 'acct-1'
})

const makeTokenCache = (getCredential: TokenCache['getCredential'] = () => Promise.resolve(credential)) => {
  const invalidate = vi.fn()
  const tokenCache: TokenCache = {
    getCredential: vi.fn(getCredential),
    refresh: vi.fn(() => Promise.resolve(credential)),
    invalidate,
    peek: () => credential
  }
  return {tokenCache, invalidate}
}

const unexpected = () => Promise.reject(new Error('unexpected sharing client call'))

const makeClient = (overrides: Partial<SharingClient> = {}): SharingClient => ({
  listShares: vi.fn(unexpected),
  getShare: vi.fn(unexpected),
  createShare: vi.fn(unexpected),
  updateShare: vi.fn(unexpected),
  deleteShare: vi.fn(unexpected),
  listRecipients: vi.fn(unexpected),
  getRecipient: vi.fn(unexpected),
  createRecipient: vi.fn(unexpected),
  updateRecipient: vi.fn(unexpected),
  deleteRecipient: vi.fn(unexpected),
  rotateRecipientToken: vi.fn(unexpected),
  ...overrides
})

const makeLogger = () => {
  const warn = vi.fn()
  const logger: StructuredLogger = {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn,
    error: vi.fn(),
    fatal: vi.fn()
  }
  return {logger, warn}
}

const setup = ({
  client = makeClient(),
  validateEndpoint = vi.fn<EndpointValidator>(() => Promise.resolve(ok(destination))),
  getCredential
}: {
  client?: SharingClient
  validateEndpoint?: EndpointValidator
  getCredential?: TokenCache['getCredential']
} = {}) => {
  const {tokenCache, invalidate} = makeTokenCache(getCredential)
  const {logger, warn} = makeLogger()
  const createClient = vi.fn(() => client)
  const operations = createShareOperations({
    tokenCache,
    validateEndpoint,
    createClient,
    logger,
    now: () => NOW
  })
  return {operations, client, createClient, tokenCache, invalidate, validateEndpoint, warn}
}

const tokenRecipient = (ips?: string[]): RecipientInfo => ({
  name: 'partner',
  authentication_type: 'TOKEN',
  ...(ips ? {ip_access_list: {allowed_ip_addresses: ips}} : {})
})

describe('share operations', () => {
  it('runs validator, token cache and client in order and returns the value', async () => {
    const listShares = vi.fn(() => Promise.resolve([{name: 'sales'}]))
    const {operations, createClient, tokenCache} = setup({client: makeClient({listShares})})

    const result = await operations.listShares(WORKSPACE_URL, {prefix: 'sa', pageSize: 50})

    expect(result).toEqual({ok: true, value: [{name: 'sales'}]})
    expect(tokenCache.getCredential).toHaveBeenCalledWith(NOW)
    expect(createClient).toHaveBeenCalledWith({destination, credential})
    expect(listShares).toHaveBeenCalledWith({maxResults: 50, prefix: 'sa'})
  })

  it('reports an invalid endpoint without acquiring a token', async () => {
    const validateEndpoint = vi.fn<EndpointValidator>(() =>
      Promise.resolve(err('endpoint_host_not_allowed', 'Host example.com is not an allowed workspace host'))
    )
    const {operations, tokenCache, createClient} = setup({validateEndpoint})

    const result = await operations.getShare('https://example.com', 'sales')

    expect(result.ok).toBe(false)
    if (result.ok) {
      return
    }
    expect(result.outcome.kind).toBe('invalid_endpoint')
    expect(result.outcome.reason).toBe('endpoint_host_not_allowed')
    expect(tokenCache.getCredential).not.toHaveBeenCalled()
    expect(createClient).not.toHaveBeenCalled()
  })

  it('maps unreachable endpoints to endpoint_unreachable', async () => {
    const validateEndpoint = vi.fn<EndpointValidator>(() =>
      Promise.resolve(err('probe_timeout', 'Workspace probe timed out after 5000ms'))
    )
    const {operations} = setup({validateEndpoint})

    const result = await operations.listRecipients(WORKSPACE_URL)

    expect(result).toMatchObject({ok: false, outcome: {kind: 'endpoint_unreachable', reason: 'probe_timeout'}})
  })

  it('maps token acquisition failures to auth_acquisition_failed', async () => {
    const {operations, createClient} = setup({
      getCredential: () =>
        Promise.reject(
          new TokenAcquisitionError({code: 'token_endpoint_rejected', message: 'Token endpoint rejected', statusCode: 401})
        )
    })

    const result = await operations.getRecipient(WORKSPACE_URL, 'partner')

    expect(result).toMatchObject({
      ok: false,
      outcome: {kind: 'auth_acquisition_failed', reason: 'token_endpoint_rejected'}
    })
    expect(createClient).not.toHaveBeenCalled()
  })

  it('invalidates the token cache when the service reports unauthenticated', async () => {
    const getShare = vi.fn(() =>
      Promise.reject(new SharingApiError({statusCode: 401, errorCode: 'UNAUTHENTICATED', message: 'Invalid token'}))
    )
    const {operations, invalidate, warn} = setup({client: makeClient({getShare})})

    const result = await operations.getShare(WORKSPACE_URL, 'sales')

    expect(result).toMatchObject({ok: false, outcome: {kind: 'unauthenticated', message: 'Invalid token'}})
    expect(invalidate).toHaveBeenCalledTimes(1)
    expect(invalidate).toHaveBeenCalledWith(credential)
    expect(warn).toHaveBeenCalledWith({
      event: 'operation.failed',
      component: 'share.operations',
      message: 'Operation get_share failed: unauthenticated',
      reason_code: 'unauthenticated',
      metadata: {kind: 'unauthenticated', detail: 'Invalid token'}
    })
  })

  it('does not drop a fresh token when a stale request reports unauthenticated late', async () => {
    let issued = 0
    const acquire = vi.fn(async ({now}: {now: Date}) => {
      issued += 1
      return createCredential({
        bearer_value: `test-token-${issued}`,
        issued_at: now,
        expires_at: new Date(now.getTime() + 3_600_000),
        scope: 'acct-1'
      })
    })
    const tokenCache = createTokenCache({acquire})
    const rejected = () => new SharingApiError({statusCode: 401, errorCode: 'UNAUTHENTICATED', message: 'Invalid token'})

    let lateRejection: (reason: unknown) => void = () => undefined
    const late = new Promise<never>((_, reject) => {
      lateRejection = reject
    })
    let staleCalls = 0
    const getShare = vi.fn((credential: Credential) => {
      if (credential.bearer_value !== 'test-token-1') {
        return Promise.resolve({name: 'sales'})
      }
      staleCalls += 1
      return staleCalls === 1 ? Promise.reject(rejected()) : late
    })
    const operations = createShareOperations({
      tokenCache,
      validateEndpoint: () => Promise.resolve(ok(destination)),
      createClient: ({credential}) => makeClient({getShare: () => getShare(credential)}),
      now: () => NOW
    })

    const first = operations.getShare(WORKSPACE_URL, 'sales')
    const second = operations.getShare(WORKSPACE_URL, 'sales')
    expect(await first).toMatchObject({ok: false, outcome: {kind: 'unauthenticated'}})
    await vi.waitFor(() => {
      expect(getShare).toHaveBeenCalledTimes(2)
    })

    expect(await operations.getShare(WORKSPACE_URL, 'sales')).toEqual({ok: true, value: {name: 'sales'}})
    expect(tokenCache.peek()?.bearer_value).toBe('test-token-2')

    lateRejection(rejected())
    expect(await second).toMatchObject({ok: false, outcome: {kind: 'unauthenticated'}})

    expect(tokenCache.peek()?.bearer_value).toBe('test-token-2')
    expect(acquire).toHaveBeenCalledTimes(2)
  })

  it('keeps the cached token for other failures', async () => {
    const deleteShare = vi.fn(() =>
      Promise.reject(new SharingApiError({statusCode: 404, errorCode: 'RESOURCE_DOES_NOT_EXIST', message: 'missing'}))
    )
    const {operations, invalidate} = setup({client: makeClient({deleteShare})})

    const result = await operations.deleteShare(WORKSPACE_URL, 'sales')

    expect(result).toMatchObject({ok: false, outcome: {kind: 'not_found'}})
    expect(invalidate).not.toHaveBeenCalled()
  })

  it('creates shares with the description as comment', async () => {
    const createShare = vi.fn(() => Promise.resolve({name: 'sales', comment: 'Quarterly'}))
    const {operations} = setup({client: makeClient({createShare})})

    await operations.createShare(WORKSPACE_URL, {name: 'sales', description: 'Quarterly'})

    expect(createShare).toHaveBeenCalledWith({name: 'sales', comment: 'Quarterly'})
  })

  it('adds tables, views and schemas as ADD updates', async () => {
    const updateShare = vi.fn(() => Promise.resolve({name: 'sales'}))
    const {operations} = setup({client: makeClient({updateShare})})

    const result = await operations.addDataObjectsToShare(WORKSPACE_URL, 'sales', {
      tables: [' main.finance.orders '],
      views: ['main.finance.orders_v'],
      schemas: ['main.hr']
    })

    expect(result.ok).toBe(true)
    expect(updateShare).toHaveBeenCalledWith('sales', {
      updates: [
        {action: 'ADD', data_object: {name: 'main.finance.orders', data_object_type: 'TABLE'}},
        {action: 'ADD', data_object: {name: 'main.finance.orders_v', data_object_type: 'VIEW'}},
        {action: 'ADD', data_object: {name: 'main.hr', data_object_type: 'SCHEMA'}}
      ]
    })
  })

  it('rejects a schema requested together with its own tables before calling out', async () => {
    const {operations, validateEndpoint} = setup()

    const result = await operations.addDataObjectsToShare(WORKSPACE_URL, 'sales', {
      tables: ['main.finance.orders'],
      schemas: ['main.finance']
    })

    expect(result).toMatchObject({
      ok: false,
      outcome: {
        kind: 'bad_request',
        reason: 'data_objects_conflict',
        message: 'Cannot add schemas main.finance together with tables or views from the same schema'
      }
    })
    expect(validateEndpoint).not.toHaveBeenCalled()
  })

  it('rejects an empty data object request', async () => {
    const {operations} = setup()

    const result = await operations.addDataObjectsToShare(WORKSPACE_URL, 'sales', {tables: ['  ']})

    expect(result).toMatchObject({ok: false, outcome: {kind: 'bad_request', reason: 'data_objects_missing'}})
  })

  it('creates D2D recipients with DATABRICKS authentication', async () => {
    const createRecipient = vi.fn(() => Promise.resolve({name: 'partner'}))
    const {operations} = setup({client: makeClient({createRecipient})})

    await operations.createRecipientD2D(WORKSPACE_URL, 'partner', {
      recipient_identifier: 'azure:westeurope:metastore-1',
      description: 'Partner metastore'
    })

    expect(createRecipient).toHaveBeenCalledWith({
      name: 'partner',
      authentication_type: 'DATABRICKS',
      comment: 'Partner metastore',
      data_recipient_global_metastore_id: 'azure:westeurope:metastore-1'
    })
  })

  it('creates D2O recipients with trimmed IP addresses', async () => {
    const createRecipient = vi.fn(() => Promise.resolve({name: 'partner'}))
    const {operations} = setup({client: makeClient({createRecipient})})

    await operations.createRecipientD2O(WORKSPACE_URL, 'partner', {
      description: 'Open sharing',
      ip_access_list: [' 10.0.0.1 ', '', '192.168.1.0/24']
    })

    expect(createRecipient).toHaveBeenCalledWith({
      name: 'partner',
      authentication_type: 'TOKEN',
      comment: 'Open sharing',
      ip_access_list: {allowed_ip_addresses: ['10.0.0.1', '192.168.1.0/24']}
    })
  })

  it('rotates tokens with the requested expiry for the existing token', async () => {
    const rotateRecipientToken = vi.fn(() => Promise.resolve({name: 'partner'}))
    const {operations} = setup({client: makeClient({rotateRecipientToken})})

    await operations.rotateRecipientToken(WORKSPACE_URL, 'partner', {expire_in_seconds: 600})

    expect(rotateRecipientToken).toHaveBeenCalledWith('partner', {existing_token_expire_in_seconds: 600})
  })

  it('merges added IP addresses after the existing ones and re-reads the recipient', async () => {
    const updated = tokenRecipient(['10.0.0.1', '10.0.0.2', '10.0.0.3'])
    const getRecipient = vi
      .fn<SharingClient['getRecipient']>()
      .mockResolvedValueOnce(tokenRecipient(['10.0.0.1', '10.0.0.2']))
      .mockResolvedValueOnce(updated)
    const updateRecipient = vi.fn(() => Promise.resolve())
    const {operations} = setup({client: makeClient({getRecipient, updateRecipient})})

    const result = await operations.addRecipientIps(WORKSPACE_URL, 'partner', ['10.0.0.2', ' 10.0.0.3'])

    expect(updateRecipient).toHaveBeenCalledWith('partner', {
      ip_access_list: {allowed_ip_addresses: ['10.0.0.1', '10.0.0.2', '10.0.0.3']}
    })
    expect(result).toEqual({ok: true, value: updated})
  })

  it('refuses IP changes on recipients without token authentication', async () => {
    const getRecipient = vi.fn(() => Promise.resolve({name: 'partner', authentication_type: 'DATABRICKS'}))
    const updateRecipient = vi.fn(() => Promise.resolve())
    const {operations} = setup({client: makeClient({getRecipient, updateRecipient})})

    const result = await operations.addRecipientIps(WORKSPACE_URL, 'partner', ['10.0.0.1'])

    expect(result).toMatchObject({
      ok: false,
      outcome: {kind: 'bad_request', reason: 'recipient_auth_type_unsupported'}
    })
    expect(updateRecipient).not.toHaveBeenCalled()
  })

  it('revokes only the listed IP addresses', async () => {
    const getRecipient = vi.fn(() => Promise.resolve(tokenRecipient(['10.0.0.1', '10.0.0.2'])))
    const updateRecipient = vi.fn(() => Promise.resolve())
    const {operations} = setup({client: makeClient({getRecipient, updateRecipient})})

    const result = await operations.revokeRecipientIps(WORKSPACE_URL, 'partner', ['10.0.0.2', '10.9.9.9'])

    expect(result.ok).toBe(true)
    expect(updateRecipient).toHaveBeenCalledWith('partner', {
      ip_access_list: {allowed_ip_addresses: ['10.0.0.1']}
    })
  })

  it('rejects revocations when nothing matches or there is no list', async () => {
    const withList = setup({
      client: makeClient({getRecipient: vi.fn(() => Promise.resolve(tokenRecipient(['10.0.0.1'])))})
    })
    const withoutList = setup({
      client: makeClient({getRecipient: vi.fn(() => Promise.resolve(tokenRecipient()))})
    })

    const noMatch = await withList.operations.revokeRecipientIps(WORKSPACE_URL, 'partner', ['10.0.0.9'])
    const noList = await withoutList.operations.revokeRecipientIps(WORKSPACE_URL, 'partner', ['10.0.0.1'])

    expect(noMatch).toMatchObject({ok: false, outcome: {kind: 'bad_request', reason: 'ip_addresses_not_found'}})
    expect(noList).toMatchObject({ok: false, outcome: {kind: 'bad_request', reason: 'ip_access_list_empty'}})
  })

  it('rejects blank descriptions without calling the service', async () => {
    const {operations, validateEndpoint} = setup()

    const result = await operations.updateRecipientDescription(WORKSPACE_URL, 'partner', '   ')

    expect(result).toMatchObject({ok: false, outcome: {kind: 'bad_request', reason: 'description_invalid'}})
    expect(validateEndpoint).not.toHaveBeenCalled()
  })

  it('converts expiration days into epoch milliseconds from now', async () => {
    const getRecipient = vi.fn(() => Promise.resolve(tokenRecipient()))
    const updateRecipient = vi.fn(() => Promise.resolve())
    const {operations} = setup({client: makeClient({getRecipient, updateRecipient})})

    await operations.updateRecipientExpiration(WORKSPACE_URL, 'partner', {expiration_days: 30})

    expect(updateRecipient).toHaveBeenCalledWith('partner', {
      expiration_time: NOW.getTime() + 30 * 24 * 60 * 60 * 1000
    })
  })

  it('rejects negative expiration days', async () => {
    const {operations} = setup()

    const result = await operations.updateRecipientExpiration(WORKSPACE_URL, 'partner', {expiration_days: -1})

    expect(result).toMatchObject({ok: false, outcome: {kind: 'bad_request', reason: 'expiration_invalid'}})
  })
})

describe('operation helpers', () => {
  it('deduplicates merged IP addresses keeping first occurrence order', () => {
    expect(mergeIps({existing: ['b', 'a'], added: ['a', 'c', 'b']})).toEqual(['b', 'a', 'c'])
  })

  it('allows schemas alongside tables from other schemas', () => {
    expect(buildDataObjectUpdates({tables: ['main.sales.orders'], schemas: ['main.finance']})).toHaveLength(2)
  })
})
