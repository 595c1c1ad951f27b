export const endpointGuardErrorCodes = [
  'endpoint_url_invalid',
  'endpoint_userinfo_forbidden',
  'endpoint_fragment_forbidden',
  'endpoint_scheme_not_allowed',
  'endpoint_ip_literal_forbidden',
  'endpoint_host_not_allowed',
  'endpoint_port_not_allowed',
  'resolved_ip_denied',
  'dns_resolution_failed',
  'dns_resolution_empty',
  'probe_failed',
  'probe_timeout'
] as const;

export type EndpointGuardErrorCode = (typeof endpointGuardErrorCodes)[number];

export type EndpointGuardErrorKind = 'invalid_endpoint' | 'endpoint_unreachable';

const UNREACHABLE_CODES: ReadonlySet<EndpointGuardErrorCode> = new Set<EndpointGuardErrorCode>([
  'dns_resolution_failed',
  'dns_resolution_empty',
  'probe_failed',
  'probe_timeout'
]);

export const endpointGuardErrorKind = (code: EndpointGuardErrorCode): EndpointGuardErrorKind =>
  UNREACHABLE_CODES.has(code) ? 'endpoint_unreachable' : 'invalid_endpoint';

export type EndpointGuardError = {
  source: 'endpoint_guard';
  kind: EndpointGuardErrorKind;
  code: EndpointGuardErrorCode;
  message: string;
};

export type GuardSuccess<T> = {ok: true; value: T};
export type GuardFailure = {ok: false; error: EndpointGuardError};
export type GuardResult<T> = GuardSuccess<T> | GuardFailure;

export const ok = <T>(value: T): GuardSuccess<T> => ({ok: true, value});

export const err = (code: EndpointGuardErrorCode, message: string): GuardFailure => ({
  ok: false,
  error: {
    source: 'endpoint_guard',
    kind: endpointGuardErrorKind(code),
    code,
    message
  }
});
