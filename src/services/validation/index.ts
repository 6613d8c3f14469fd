import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { formRecordSchema, formatIssues } from '../../domain/schemas.js';
import type { FormRecord } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { completenessPercentage, countFilledFields, listMissingFields } from './completeness.js';
import { checkFieldQuality } from './rules.js';
import { accuracyPercentage, buildSummary, freezeReport } from './report.js';
import type { ValidateOptions, ValidationReport } from './types.js';

export type {
  QualityIssue,
  ValidationReport,
  ValidationReportJson,
  ValidateOptions,
  LabelStyle,
} from './types.js';
export { toReportJson } from './report.js';
export { buildQualityRules, checkFieldQuality, OCR_FAILURE_MARKERS } from './rules.js';
export { countFilledFields, completenessPercentage, listMissingFields } from './completeness.js';

const log = logger.child({ module: 'validation' });

/**
 * Audits an extracted form and scores it.
 *
 * Format problems in the data are reported as issues, never as errors; the
 * only failure is a record that does not have the FormRecord shape. The
 * record is read, never written.
 */
export function validateForm(
  record: FormRecord,
  options: ValidateOptions = {},
): Result<ValidationReport, AppError> {
  const ctx = { documentId: options.documentId, step: 'validating' };

  const parsed = formRecordSchema.safeParse(record);
  if (!parsed.success) {
    const details = formatIssues(parsed.error);
    log.warn({ ...ctx, errorCode: ErrorCode.VALIDATION_INVALID_INPUT, retryable: false, details }, 'Rejected malformed form record');
    return err(
      createAppError(ErrorCode.VALIDATION_INVALID_INPUT, 'Form record does not match the expected shape', false, details),
    );
  }
  const form = parsed.data;

  const count = countFilledFields(form);
  const completenessScore = completenessPercentage(count);
  const missingFields = listMissingFields(form);

  const currentYear = options.currentYear ?? new Date().getFullYear();
  const issues = checkFieldQuality(form, currentYear);

  const accuracyScore = accuracyPercentage(count.filled, issues.length);

  const report = freezeReport({
    accuracyScore,
    completenessScore,
    issues,
    filledCount: count.filled,
    totalCount: count.total,
    missingFields,
    summary: buildSummary(count, issues.length, completenessScore, accuracyScore),
  });

  log.debug(
    { ...ctx, accuracyScore, completenessScore, issueCount: issues.length, filledCount: count.filled },
    'Validation completed',
  );

  return ok(report);
}
