import { randomUUID } from 'node:crypto';
import { extname } from 'node:path';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { createDocumentLogger } from '../../infrastructure/logger.js';
import { writeOutputs } from '../../infrastructure/output-writer.js';
import { findCorrections } from '../corrections/index.js';
import { extractFormData } from '../extraction/index.js';
import { validateForm } from '../validation/index.js';
import type { ProcessDocumentInput, ProcessingDeps, ProcessingResult } from './types.js';

export type { ProcessDocumentInput, ProcessingDeps, ProcessingResult } from './types.js';

const SUPPORTED_EXTENSIONS = new Set(['.pdf']);

/** OCR, extraction, validation and (optionally) corrections and output files for one document. */
export async function processDocument(
  deps: ProcessingDeps,
  input: ProcessDocumentInput,
): Promise<Result<ProcessingResult, AppError>> {
  const documentId = input.documentId ?? randomUUID();
  const log = createDocumentLogger(documentId, input.filename, deps.llm.name);

  const extension = extname(input.filename).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.has(extension)) {
    log.error({ errorCode: ErrorCode.DOCUMENT_UNSUPPORTED_TYPE, retryable: false, extension }, 'Unsupported document type');
    return err(
      createAppError(
        ErrorCode.DOCUMENT_UNSUPPORTED_TYPE,
        `Only PDF files are supported, got ${extension || 'no extension'}`,
        false,
      ),
    );
  }

  log.info({ sizeBytes: input.document.length, step: 'started' }, 'Processing document');

  const ocrResult = await deps.ocr.analyze(input.document, { documentId });
  if (!ocrResult.ok) return ocrResult;
  const ocr = ocrResult.value;

  const extraction = await extractFormData(deps, ocr.content, { documentId, filename: input.filename });
  if (!extraction.ok) return extraction;
  const { form, rawExtraction, metadata } = extraction.value;

  const validation = validateForm(form, { documentId, currentYear: input.currentYear });
  if (!validation.ok) return validation;
  const report = validation.value;

  const corrections = input.includeCorrections ? findCorrections(rawExtraction, form) : undefined;

  const result: ProcessingResult = {
    documentId,
    filename: input.filename,
    ocrText: ocr.content,
    ocr: { provider: ocr.provider, pageCount: ocr.pageCount },
    form,
    rawExtraction,
    metadata,
    report,
    ...(corrections !== undefined && { corrections }),
  };

  if (input.outputDir !== undefined) {
    const written = await writeOutputs(
      input.outputDir,
      {
        filename: input.filename,
        ocrText: ocr.content,
        ocrProvider: ocr.provider,
        pageCount: ocr.pageCount,
        form,
        metadata,
        report,
        corrections,
        labels: input.labels,
      },
      documentId,
    );
    if (!written.ok) return written;
    result.outputs = written.value;
  }

  log.info(
    {
      step: 'completed',
      accuracyScore: report.accuracyScore,
      completenessScore: report.completenessScore,
      issueCount: report.issues.length,
      totalTokens: metadata.totalTokens,
    },
    'Document processed',
  );

  return ok(result);
}
