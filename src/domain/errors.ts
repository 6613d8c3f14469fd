export const ErrorCode = {
  // Documents
  DOCUMENT_NOT_FOUND: 'DOCUMENT_NOT_FOUND',
  DOCUMENT_TOO_LARGE: 'DOCUMENT_TOO_LARGE',
  DOCUMENT_UNSUPPORTED_TYPE: 'DOCUMENT_UNSUPPORTED_TYPE',

  // OCR
  OCR_API_ERROR: 'OCR_API_ERROR',
  OCR_RATE_LIMITED: 'OCR_RATE_LIMITED',
  OCR_AUTH_ERROR: 'OCR_AUTH_ERROR',
  OCR_PARSE_FAILED: 'OCR_PARSE_FAILED',
  OCR_EMPTY: 'OCR_EMPTY',

  // LLM Extraction
  LLM_API_ERROR: 'LLM_API_ERROR',
  LLM_RATE_LIMITED: 'LLM_RATE_LIMITED',
  LLM_MALFORMED_RESPONSE: 'LLM_MALFORMED_RESPONSE',
  LLM_AUTH_ERROR: 'LLM_AUTH_ERROR',
  EXTRACTION_SCHEMA_MISMATCH: 'EXTRACTION_SCHEMA_MISMATCH',

  // Validation
  VALIDATION_INVALID_INPUT: 'VALIDATION_INVALID_INPUT',

  // Configuration
  CONFIG_INVALID: 'CONFIG_INVALID',
  PROVIDER_CONFIG_MISSING: 'PROVIDER_CONFIG_MISSING',

  // File Storage
  FILE_STORAGE_ERROR: 'FILE_STORAGE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function extractHttpStatus(cause: unknown): number | undefined {
  if (cause === null || typeof cause !== 'object') return undefined;
  if ('status' in cause && typeof cause.status === 'number') return cause.status;
  if ('statusCode' in cause && typeof cause.statusCode === 'number') return cause.statusCode;
  return undefined;
}
