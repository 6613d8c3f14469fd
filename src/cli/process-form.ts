import { readFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import { formatAddress, formatDate } from '../domain/form.js';
import { processDocument, type ProcessingDeps, type ProcessingResult } from '../services/processing/index.js';
import { toReportJson, type LabelStyle } from '../services/validation/index.js';

export const USAGE = 'Usage: process-form <file.pdf> [--no-save] [--output-dir <dir>] [--labels hebrew|canonical] [--corrections]';

export interface CliOptions {
  file: string;
  save: boolean;
  outputDir?: string;
  labels: LabelStyle;
  corrections: boolean;
}

export function parseCliArgs(argv: string[]): Result<CliOptions, string> {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        'no-save': { type: 'boolean', default: false },
        'output-dir': { type: 'string' },
        labels: { type: 'string', default: 'canonical' },
        corrections: { type: 'boolean', default: false },
      },
    });
  } catch (cause) {
    return err(cause instanceof Error ? cause.message : String(cause));
  }

  const { values, positionals } = parsed;
  const [file] = positionals;
  if (file === undefined || positionals.length > 1) return err(USAGE);

  const labels = values.labels ?? 'canonical';
  if (labels !== 'canonical' && labels !== 'hebrew') {
    return err(`--labels must be hebrew or canonical, got ${labels}`);
  }

  return ok({
    file,
    save: !values['no-save'],
    outputDir: values['output-dir'],
    labels,
    corrections: values.corrections ?? false,
  });
}

/** The JSON printed for a processed document. */
export function renderResult(result: ProcessingResult, labels: LabelStyle): Record<string, unknown> {
  const { form } = result;
  return {
    file: result.filename,
    document_id: result.documentId,
    claimant: {
      name: [form.firstName, form.lastName].filter(Boolean).join(' '),
      id_number: form.idNumber,
      date_of_birth: formatDate(form.dateOfBirth),
      address: formatAddress(form.address),
      date_of_injury: formatDate(form.dateOfInjury),
    },
    processing_metadata: {
      ocr_provider: result.ocr.provider,
      page_count: result.ocr.pageCount,
      llm_provider: result.metadata.provider,
      model: result.metadata.model,
      total_tokens: result.metadata.totalTokens,
    },
    validation_report: toReportJson(result.report, labels),
    ...(result.corrections !== undefined && { auto_corrections: result.corrections }),
    ...(result.outputs !== undefined && { outputs: result.outputs }),
  };
}

export async function runProcessForm(
  options: CliOptions,
  deps: ProcessingDeps,
  defaultOutputDir: string,
): Promise<Result<Record<string, unknown>, AppError>> {
  const path = resolve(options.file);

  let document: Buffer;
  try {
    document = await readFile(path);
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    return err(createAppError(ErrorCode.DOCUMENT_NOT_FOUND, `Input file not found: ${options.file}`, false, details));
  }

  const result = await processDocument(deps, {
    document,
    filename: basename(path),
    outputDir: options.save ? (options.outputDir ?? defaultOutputDir) : undefined,
    includeCorrections: options.corrections,
    labels: options.labels,
  });
  if (!result.ok) return result;

  return ok(renderResult(result.value, options.labels));
}
