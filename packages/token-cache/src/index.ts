export {
  buildDefaultTokenEndpoint,
  ClientCredentialsConfigSchema,
  createClientCredentialsAcquirer,
  DEFAULT_TOKEN_SCOPE,
  type ClientCredentialsConfig,
  type FetchLike
} from './clientCredentials';
export {createCredential, CredentialSchema, remainingLifetimeMs, type Credential} from './credential';
export {
  TokenAcquisitionError,
  tokenAcquisitionErrorCodes,
  toTokenAcquisitionError,
  type TokenAcquisitionErrorCode
} from './errors';
export {
  createTokenCache,
  DEFAULT_REFRESH_BUFFER_MS,
  TokenCacheConfigSchema,
  type AcquireCredential,
  type TokenCache,
  type TokenCacheConfig
} from './tokenCache';
