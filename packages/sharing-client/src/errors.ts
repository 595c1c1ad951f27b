export class SharingApiError extends Error {
  public readonly source = 'sharing_api' as const;
  public readonly status_code: number;
  public readonly error_code?: string;

  public constructor({
    statusCode,
    errorCode,
    message
  }: {
    statusCode: number;
    errorCode?: string;
    message: string;
  }) {
    super(message);
    this.name = 'SharingApiError';
    this.status_code = statusCode;
    if (errorCode) {
      this.error_code = errorCode;
    }
  }
}

export const sharingTransportErrorCodes = ['timeout', 'network_error', 'invalid_response'] as const;
export type SharingTransportErrorCode = (typeof sharingTransportErrorCodes)[number];

export class SharingTransportError extends Error {
  public readonly source = 'sharing_transport' as const;
  public readonly code: SharingTransportErrorCode;

  public constructor(code: SharingTransportErrorCode, message: string) {
    super(message);
    this.name = 'SharingTransportError';
    this.code = code;
  }
}
