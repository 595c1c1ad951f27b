import {z} from 'zod';

import {defaultOutcomeMessages, type OutcomeKind} from './kinds';

export type ClassifiedOutcome = {
  readonly kind: OutcomeKind;
  readonly message: string;
  /** Detailed code reported by the component that raised the signal. */
  readonly reason?: string;
  /** Diagnostics only. Never serialized to callers. */
  readonly signal: unknown;
};

const ComponentSignalSchema = z.object({
  source: z.enum(['token_cache', 'endpoint_guard', 'request_validation']),
  code: z.string().min(1).optional(),
  kind: z.string().optional(),
  message: z.string().optional()
});

const ServiceSignalSchema = z.object({
  error_code: z.string().min(1).optional(),
  status_code: z.number().int().optional(),
  message: z.string().optional()
});

const UpstreamSignalSchema = z.object({
  source: z.enum(['sharing_api', 'sharing_transport']),
  code: z.string().min(1).optional()
});

const SERVICE_ERROR_CODE_KINDS: Readonly<Record<string, OutcomeKind>> = {
  UNAUTHENTICATED: 'unauthenticated',
  PERMISSION_DENIED: 'permission_denied',
  RESOURCE_DOES_NOT_EXIST: 'not_found',
  NOT_FOUND: 'not_found',
  RESOURCE_ALREADY_EXISTS: 'conflict',
  ALREADY_EXISTS: 'conflict',
  RESOURCE_CONFLICT: 'conflict',
  INVALID_STATE: 'conflict',
  INVALID_PARAMETER_VALUE: 'bad_request',
  BAD_REQUEST: 'bad_request',
  MALFORMED_REQUEST: 'bad_request',
  INVALID_REQUEST: 'bad_request'
};

const HTTP_STATUS_KINDS: Readonly<Record<number, OutcomeKind>> = {
  400: 'bad_request',
  401: 'unauthenticated',
  403: 'permission_denied',
  404: 'not_found',
  409: 'conflict',
  422: 'bad_request'
};

const readMessage = (signal: unknown): string | undefined => {
  if (signal instanceof Error && signal.message.length > 0) {
    return signal.message;
  }
  const parsed = z.object({message: z.string().min(1)}).safeParse(signal);
  return parsed.success ? parsed.data.message : undefined;
};

const buildOutcome = ({
  kind,
  signal,
  reason
}: {
  kind: OutcomeKind;
  signal: unknown;
  reason?: string;
}): ClassifiedOutcome =>
  Object.freeze({
    kind,
    message: readMessage(signal) ?? defaultOutcomeMessages[kind],
    ...(reason ? {reason} : {}),
    signal
  });

const classifyComponentSignal = (signal: z.infer<typeof ComponentSignalSchema>): OutcomeKind => {
  switch (signal.source) {
    case 'token_cache':
      return 'auth_acquisition_failed';
    case 'endpoint_guard':
      return signal.kind === 'endpoint_unreachable' ? 'endpoint_unreachable' : 'invalid_endpoint';
    case 'request_validation':
      return 'bad_request';
  }
};

const lookupServiceErrorCode = (errorCode: string | undefined): OutcomeKind | undefined => {
  if (!errorCode) {
    return undefined;
  }
  const normalized = errorCode.trim().toUpperCase();
  return Object.hasOwn(SERVICE_ERROR_CODE_KINDS, normalized) ? SERVICE_ERROR_CODE_KINDS[normalized] : undefined;
};

const lookupHttpStatus = (statusCode: number | undefined): OutcomeKind | undefined => {
  if (statusCode === undefined) {
    return undefined;
  }
  return Object.hasOwn(HTTP_STATUS_KINDS, statusCode) ? HTTP_STATUS_KINDS[statusCode] : undefined;
};

/**
 * Maps any failure signal onto exactly one outcome kind.
 *
 * Component signals win over the service-reported `error_code`, which wins over the HTTP status.
 * Anything unrecognized is treated as an upstream failure.
 */
export const classifyFailure = (signal: unknown): ClassifiedOutcome => {
  const component = ComponentSignalSchema.safeParse(signal);
  if (component.success) {
    return buildOutcome({
      kind: classifyComponentSignal(component.data),
      signal,
      ...(component.data.code ? {reason: component.data.code} : {})
    });
  }

  const service = ServiceSignalSchema.safeParse(signal);
  if (service.success) {
    const kind = lookupServiceErrorCode(service.data.error_code) ?? lookupHttpStatus(service.data.status_code);
    if (kind) {
      return buildOutcome({kind, signal});
    }
  }

  const upstream = UpstreamSignalSchema.safeParse(signal);
  if (upstream.success) {
    return buildOutcome({
      kind: 'upstream_unavailable',
      signal,
      ...(upstream.data.code ? {reason: upstream.data.code} : {})
    });
  }

  return buildOutcome({kind: 'upstream_unavailable', signal});
};
