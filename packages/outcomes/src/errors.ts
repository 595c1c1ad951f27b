export class RequestValidationError extends Error {
  public readonly source = 'request_validation' as const;
  public readonly code: string;

  public constructor(code: string, message: string) {
    super(message);
    this.name = 'RequestValidationError';
    this.code = code;
  }
}

export const requestValidationError = (code: string, message: string) =>
  new RequestValidationError(code, message);
