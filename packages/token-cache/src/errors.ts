export const tokenAcquisitionErrorCodes = [
  'token_request_failed',
  'token_request_timeout',
  'token_endpoint_rejected',
  'token_response_invalid',
  'token_lifetime_too_short',
  'token_acquisition_failed'
] as const;

export type TokenAcquisitionErrorCode = (typeof tokenAcquisitionErrorCodes)[number];

export class TokenAcquisitionError extends Error {
  public readonly source = 'token_cache' as const;
  public readonly code: TokenAcquisitionErrorCode;
  public readonly status_code?: number;

  public constructor({
    code,
    message,
    statusCode
  }: {
    code: TokenAcquisitionErrorCode;
    message: string;
    statusCode?: number;
  }) {
    super(message);
    this.name = 'TokenAcquisitionError';
    this.code = code;
    if (statusCode !== undefined) {
      this.status_code = statusCode;
    }
  }
}

export const toTokenAcquisitionError = (value: unknown): TokenAcquisitionError => {
  if (value instanceof TokenAcquisitionError) {
    return value;
  }

  if (value instanceof Error) {
    return new TokenAcquisitionError({code: 'token_acquisition_failed', message: value.message});
  }

  return new TokenAcquisitionError({
    code: 'token_acquisition_failed',
    message: 'Credential acquisition failed'
  });
};
