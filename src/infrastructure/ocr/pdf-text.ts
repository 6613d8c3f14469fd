import { createRequire } from 'node:module';
import { join } from 'node:path';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { TextItem } from 'pdfjs-dist/types/src/display/api.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { OcrResult } from '../../domain/types.js';
import { logger } from '../logger.js';
import { DEFAULT_MAX_DOCUMENT_BYTES, type AnalyzeOptions, type OcrProvider } from './types.js';

const require = createRequire(import.meta.url);
const STANDARD_FONT_DATA_URL = join(
  require.resolve('pdfjs-dist/package.json'),
  '../standard_fonts/',
);

/**
 * Reads the embedded text layer of a PDF. Only digitally filled forms have
 * one; scans need the Document Intelligence provider.
 */
export class PdfTextProvider implements OcrProvider {
  readonly name = 'pdf-text';
  private readonly maxBytes: number;

  constructor(maxBytes = DEFAULT_MAX_DOCUMENT_BYTES) {
    this.maxBytes = maxBytes;
  }

  async analyze(document: Buffer, options: AnalyzeOptions = {}): Promise<Result<OcrResult, AppError>> {
    const log = logger.child({ module: 'ocr-pdf-text', documentId: options.documentId, step: 'ocr' });

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

    let pdf;
    try {
      pdf = await getDocument({
        data: new Uint8Array(document),
        standardFontDataUrl: STANDARD_FONT_DATA_URL,
      }).promise;
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);
      log.error({ errorCode: ErrorCode.OCR_PARSE_FAILED, retryable: false, details }, 'Failed to parse PDF');
      return err(createAppError(ErrorCode.OCR_PARSE_FAILED, 'Failed to parse PDF document', false, details));
    }

    const pageTexts: string[] = [];
    try {
      for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        const content = await page.getTextContent();
        pageTexts.push(
          content.items
            .filter((item): item is TextItem => 'str' in item)
            .map((item) => item.str)
            .join(' '),
        );
      }
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);
      log.error({ errorCode: ErrorCode.OCR_PARSE_FAILED, retryable: false, details }, 'Failed to read PDF text layer');
      return err(createAppError(ErrorCode.OCR_PARSE_FAILED, 'Failed to extract text from PDF', false, details));
    }

    const text = pageTexts.join('\n').trim();
    if (text.length === 0) {
      log.error({ errorCode: ErrorCode.OCR_EMPTY, retryable: false, pageCount: pdf.numPages }, 'PDF has no text layer');
      return err(createAppError(ErrorCode.OCR_EMPTY, 'PDF contains no extractable text', false));
    }

    log.info({ pageCount: pdf.numPages, textLength: text.length }, 'PDF text extracted');
    return ok({ content: text, pageCount: pdf.numPages, provider: this.name });
  }
}
