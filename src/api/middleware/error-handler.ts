import type { Request, Response, NextFunction } from 'express';
import type { AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  error: { code: string; message: string; details?: string; retryable?: boolean } | null;
}

export function successResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data, error: null };
}

export function errorResponse(code: string, message: string, details?: string, retryable?: boolean): ApiResponse<null> {
  return { success: false, data: null, error: { code, message, details, retryable } };
}

function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    'retryable' in value
  );
}

/** Status for a body-parser failure (`entity.too.large`, `entity.parse.failed`), if that is what this is. */
function bodyParserStatus(value: unknown): number | undefined {
  if (typeof value !== 'object' || value === null || !('type' in value) || typeof value.type !== 'string') {
    return undefined;
  }
  if (!value.type.startsWith('entity.')) return undefined;
  return 'status' in value && typeof value.status === 'number' ? value.status : 400;
}

export function mapErrorCodeToStatus(code: string): number {
  switch (code) {
    case 'DOCUMENT_TOO_LARGE':
    case 'DOCUMENT_UNSUPPORTED_TYPE':
    case 'OCR_PARSE_FAILED':
    case 'OCR_EMPTY':
      return 400;

    case 'DOCUMENT_NOT_FOUND':
      return 404;

    case 'VALIDATION_INVALID_INPUT':
    case 'VALIDATION_ERROR':
      return 422;

    case 'OCR_API_ERROR':
    case 'OCR_RATE_LIMITED':
    case 'OCR_AUTH_ERROR':
    case 'LLM_API_ERROR':
    case 'LLM_RATE_LIMITED':
    case 'LLM_AUTH_ERROR':
    case 'LLM_MALFORMED_RESPONSE':
    case 'EXTRACTION_SCHEMA_MISMATCH':
    case 'PROVIDER_CONFIG_MISSING':
      return 503;

    default:
      return 500;
  }
}

export function sendAppError(res: Response, appError: AppError): void {
  const status = mapErrorCodeToStatus(appError.code);
  res.status(status).json(errorResponse(appError.code, appError.message, appError.details, appError.retryable));
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (isAppError(err)) {
    sendAppError(res, err);
    return;
  }

  const parserStatus = bodyParserStatus(err);
  if (parserStatus !== undefined) {
    const message = err instanceof Error ? err.message : 'Invalid request body';
    res.status(parserStatus).json(errorResponse('INVALID_REQUEST', message, undefined, false));
    return;
  }

  logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Unhandled error');
  res.status(500).json(errorResponse('INTERNAL_ERROR', 'An unexpected error occurred', undefined, false));
}
