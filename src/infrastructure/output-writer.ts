import { mkdir, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import { toHebrewForm } from '../domain/schemas.js';
import type { ExtractionMetadata, FormRecord } from '../domain/types.js';
import type { FieldCorrection } from '../services/corrections/index.js';
import { toReportJson, type LabelStyle, type ValidationReport } from '../services/validation/index.js';
import { logger } from './logger.js';

const RULER_WIDTH = 70;

export interface ProcessingOutputs {
  filename: string;
  ocrText: string;
  ocrProvider: string;
  pageCount: number;
  form: FormRecord;
  metadata: ExtractionMetadata;
  report: ValidationReport;
  corrections?: FieldCorrection[];
  labels?: LabelStyle;
}

export interface WrittenOutputs {
  ocrTextPath: string;
  formDataPath: string;
  validationPath: string;
}

/** File stem with everything but letters, digits, `.`, `_` and `-` replaced. */
export function outputBaseName(filename: string): string {
  const stem = basename(filename, extname(filename));
  const safe = stem.replace(/[^\p{L}\p{N}._-]/gu, '_').replace(/^\.+/, '_');
  return safe.length > 0 ? safe : 'document';
}

function ocrTextFile(filename: string, ocrText: string): string {
  return [
    `FILE: ${filename}`,
    '='.repeat(RULER_WIDTH),
    '',
    'EXTRACTED TEXT:',
    '-'.repeat(RULER_WIDTH),
    ocrText,
  ].join('\n');
}

function validationFile(outputs: ProcessingOutputs): Record<string, unknown> {
  const { metadata } = outputs;
  return {
    file: outputs.filename,
    processing_metadata: {
      ocr_provider: outputs.ocrProvider,
      page_count: outputs.pageCount,
      llm_provider: metadata.provider,
      model: metadata.model,
      prompt_tokens: metadata.promptTokens,
      completion_tokens: metadata.completionTokens,
      total_tokens: metadata.totalTokens,
      temperature: metadata.temperature,
      latency_ms: metadata.latencyMs,
    },
    validation_report: toReportJson(outputs.report, outputs.labels),
    ...(outputs.corrections !== undefined && {
      auto_corrections: outputs.corrections.map((c) => ({
        field: c.field,
        raw_value: c.rawValue,
        normalized_value: c.normalizedValue,
        reason: c.reason,
      })),
    }),
  };
}

const toJson = (value: unknown) => `${JSON.stringify(value, null, 2)}\n`;

/**
 * Writes the OCR text, the Hebrew-keyed form and the validation report under
 * `outputDir/{ocr_text,extracted_json,validation_reports}`.
 */
export async function writeOutputs(
  outputDir: string,
  outputs: ProcessingOutputs,
  documentId?: string,
): Promise<Result<WrittenOutputs, AppError>> {
  const log = logger.child({ module: 'output-writer', documentId, step: 'writing_outputs' });
  const base = outputBaseName(outputs.filename);

  const paths: WrittenOutputs = {
    ocrTextPath: join(outputDir, 'ocr_text', `${base}_extracted.txt`),
    formDataPath: join(outputDir, 'extracted_json', `${base}_form_data.json`),
    validationPath: join(outputDir, 'validation_reports', `${base}_validation.json`),
  };

  try {
    await Promise.all(
      ['ocr_text', 'extracted_json', 'validation_reports'].map((dir) =>
        mkdir(join(outputDir, dir), { recursive: true }),
      ),
    );
    await writeFile(paths.ocrTextPath, ocrTextFile(outputs.filename, outputs.ocrText), 'utf-8');
    await writeFile(paths.formDataPath, toJson(toHebrewForm(outputs.form)), 'utf-8');
    await writeFile(paths.validationPath, toJson(validationFile(outputs)), 'utf-8');
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    log.error({ errorCode: ErrorCode.FILE_STORAGE_ERROR, retryable: true, details }, 'Failed to write outputs');
    return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, 'Failed to write processing outputs', true, details));
  }

  log.info({ outputDir, base }, 'Outputs written');
  return ok(paths);
}
