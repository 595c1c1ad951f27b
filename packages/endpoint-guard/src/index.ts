export {
  DEFAULT_ALLOWED_HOST_SUFFIXES,
  DestinationSchema,
  EndpointGuardConfigSchema,
  type Destination,
  type DnsResolver,
  type EndpointGuardConfig,
  type FetchLike,
  type ResolvedEndpointGuardConfig
} from './contracts';
export {
  endpointGuardErrorCodes,
  endpointGuardErrorKind,
  err,
  ok,
  type EndpointGuardError,
  type EndpointGuardErrorCode,
  type EndpointGuardErrorKind,
  type GuardFailure,
  type GuardResult,
  type GuardSuccess
} from './errors';
export {
  createEndpointValidator,
  validateEndpoint,
  type EndpointValidator,
  type EndpointValidatorOptions
} from './guard';
