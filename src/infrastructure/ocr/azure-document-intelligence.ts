import DocumentIntelligence, {
  getLongRunningPoller,
  isUnexpected,
} from '@azure-rest/ai-document-intelligence';
import type { Logger } from 'pino';
import { z } from 'zod';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { OcrResult } from '../../domain/types.js';
import { logger } from '../logger.js';
import { DEFAULT_MAX_DOCUMENT_BYTES, type AnalyzeOptions, type OcrProvider } from './types.js';

const MODEL_ID = 'prebuilt-layout';

/** Raw status and body of a finished (or rejected) layout analysis. */
export interface LayoutResponse {
  status: string;
  body: unknown;
}

export interface LayoutAnalysisClient {
  analyzeLayout(base64Source: string): Promise<LayoutResponse>;
}

const analyzeResultSchema = z.object({
  status: z.string().optional(),
  analyzeResult: z.object({
    content: z.string().default(''),
    pages: z.array(z.unknown()).default([]),
  }),
});

const errorBodySchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});

export class AzureDocumentIntelligenceProvider implements OcrProvider {
  readonly name = 'azure-document-intelligence';
  private readonly client: LayoutAnalysisClient;
  private readonly maxBytes: number;

  constructor(client: LayoutAnalysisClient, maxBytes = DEFAULT_MAX_DOCUMENT_BYTES) {
    this.client = client;
    this.maxBytes = maxBytes;
  }

  async analyze(document: Buffer, options: AnalyzeOptions = {}): Promise<Result<OcrResult, AppError>> {
    const log = logger.child({ module: 'ocr-azure', documentId: options.documentId, step: 'ocr' });

    if (document.length > this.maxBytes) {
      log.error(
        { errorCode: ErrorCode.DOCUMENT_TOO_LARGE, retryable: false, sizeBytes: document.length },
        'Document exceeds size limit',
      );
      return err(
        createAppError(
          ErrorCode.DOCUMENT_TOO_LARGE,
          `Document size ${document.length} bytes exceeds ${this.maxBytes} byte limit`,
          false,
        ),
      );
    }

    const startTime = Date.now();
    let response: LayoutResponse;
    try {
      response = await this.client.analyzeLayout(document.toString('base64'));
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);
      log.error({ errorCode: ErrorCode.OCR_API_ERROR, retryable: true, details }, 'Layout analysis request failed');
      return err(createAppError(ErrorCode.OCR_API_ERROR, 'Document Intelligence request failed', true, details));
    }
    const latencyMs = Date.now() - startTime;

    const status = Number.parseInt(response.status, 10);
    if (!(status >= 200 && status < 300)) {
      return err(this.mapStatus(status, response.body, latencyMs, log));
    }

    const parsed = analyzeResultSchema.safeParse(response.body);
    if (!parsed.success || (parsed.data.status !== undefined && parsed.data.status !== 'succeeded')) {
      const details = parsed.success ? `Analysis finished with status ${parsed.data.status}` : parsed.error.message;
      log.error({ errorCode: ErrorCode.OCR_PARSE_FAILED, retryable: false, latencyMs, details }, 'Unexpected analysis result');
      return err(createAppError(ErrorCode.OCR_PARSE_FAILED, 'Document Intelligence returned no analysis result', false, details));
    }

    const { content, pages } = parsed.data.analyzeResult;
    if (content.trim().length === 0) {
      log.error({ errorCode: ErrorCode.OCR_EMPTY, retryable: false, pageCount: pages.length }, 'Document contains no text');
      return err(createAppError(ErrorCode.OCR_EMPTY, 'No text was recognized in the document', false));
    }

    log.info({ latencyMs, pageCount: pages.length, textLength: content.length }, 'Layout analysis completed');
    return ok({ content, pageCount: pages.length, provider: this.name });
  }

  private mapStatus(
    status: number,
    body: unknown,
    latencyMs: number,
    log: Logger,
  ): AppError {
    const errorBody = errorBodySchema.safeParse(body);
    const details = errorBody.success
      ? [errorBody.data.error.code, errorBody.data.error.message].filter(Boolean).join(': ')
      : undefined;
    const ctx = { status, latencyMs, details };

    if (status === 401 || status === 403) {
      log.error({ ...ctx, errorCode: ErrorCode.OCR_AUTH_ERROR, retryable: false }, 'Authentication failed');
      return createAppError(ErrorCode.OCR_AUTH_ERROR, 'Document Intelligence authentication failed', false, details);
    }
    if (status === 429) {
      log.warn({ ...ctx, errorCode: ErrorCode.OCR_RATE_LIMITED, retryable: true }, 'Rate limited');
      return createAppError(ErrorCode.OCR_RATE_LIMITED, 'Document Intelligence rate limited', true, details);
    }
    const retryable = Number.isNaN(status) || status >= 500;
    log.error({ ...ctx, errorCode: ErrorCode.OCR_API_ERROR, retryable }, 'Layout analysis rejected');
    return createAppError(ErrorCode.OCR_API_ERROR, `Document Intelligence returned ${status}`, retryable, details);
  }
}

export function createLayoutAnalysisClient(endpoint: string, key: string): LayoutAnalysisClient {
  const client = DocumentIntelligence(endpoint, { key });

  return {
    async analyzeLayout(base64Source) {
      const initial = await client
        .path('/documentModels/{modelId}:analyze', MODEL_ID)
        .post({ contentType: 'application/json', body: { base64Source } });

      if (isUnexpected(initial)) {
        return { status: initial.status, body: initial.body };
      }

      const final = await getLongRunningPoller(client, initial).pollUntilDone();
      return { status: final.status, body: final.body };
    },
  };
}
