import {z} from 'zod';

export const outcomeKinds = [
  'unauthenticated',
  'permission_denied',
  'not_found',
  'conflict',
  'bad_request',
  'upstream_unavailable',
  'auth_acquisition_failed',
  'invalid_endpoint',
  'endpoint_unreachable'
] as const;

export const OutcomeKindSchema = z.enum(outcomeKinds);
export type OutcomeKind = z.infer<typeof OutcomeKindSchema>;

export type OutcomeHttpStatus = 400 | 401 | 403 | 404 | 409 | 502 | 503;

export const outcomeHttpStatus: Readonly<Record<OutcomeKind, OutcomeHttpStatus>> = {
  bad_request: 400,
  invalid_endpoint: 400,
  unauthenticated: 401,
  permission_denied: 403,
  not_found: 404,
  conflict: 409,
  upstream_unavailable: 502,
  auth_acquisition_failed: 503,
  endpoint_unreachable: 503
};

export const defaultOutcomeMessages: Readonly<Record<OutcomeKind, string>> = {
  unauthenticated: 'The sharing service rejected the access credential',
  permission_denied: 'The service principal lacks permission for this operation',
  not_found: 'The requested object does not exist',
  conflict: 'The request conflicts with the current state of the object',
  bad_request: 'The request is invalid',
  upstream_unavailable: 'The sharing service is unavailable',
  auth_acquisition_failed: 'An access credential could not be acquired',
  invalid_endpoint: 'The workspace URL is not an allowed destination',
  endpoint_unreachable: 'The workspace is not reachable'
};
