import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { OcrResult } from '../../domain/types.js';

export interface OcrProvider {
  readonly name: string;
  analyze(document: Buffer, options?: AnalyzeOptions): Promise<Result<OcrResult, AppError>>;
}

export interface AnalyzeOptions {
  documentId?: string;
}

export const DEFAULT_MAX_DOCUMENT_BYTES = 10 * 1024 * 1024; // 10MB
