export type ApiErrorCode = 'NO_DOCUMENTS' | 'NO_ITEMS' | 'NO_MATCHES';

const STATUS_BY_CODE: Record<ApiErrorCode, number> = {
  NO_DOCUMENTS: 400,
  NO_ITEMS: 422,
  NO_MATCHES: 422,
};

/** Request-level failure; the global error handler turns it into `{ error: { code, message } }`. */
export class PackingSlipRequestError extends Error {
  readonly statusCode: number;
  readonly code: ApiErrorCode;

  constructor(code: ApiErrorCode, message: string) {
    super(message);
    this.name = 'PackingSlipRequestError';
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
  }
}
