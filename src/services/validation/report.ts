import { localizeFieldPath } from '../../domain/field-labels.js';
import type { FieldCount } from './completeness.js';
import type { LabelStyle, QualityIssue, ValidationReport, ValidationReportJson } from './types.js';

/** Share of filled units without a quality issue. Nothing filled means nothing inaccurate. */
export function accuracyPercentage(filled: number, issueCount: number): number {
  if (filled === 0) return 100;
  const score = ((filled - issueCount) / filled) * 100;
  return Math.max(0, Math.min(100, score));
}

export function buildSummary(count: FieldCount, issueCount: number, completeness: number, accuracy: number): string {
  const accurate = Math.max(0, count.filled - issueCount);
  return (
    `Validation passed. ${count.filled}/${count.total} fields filled (${completeness.toFixed(1)}%). ` +
    `${accurate}/${count.filled} data fields accurate (${accuracy.toFixed(1)}%). ` +
    `${issueCount} quality issue(s) detected.`
  );
}

export function freezeReport(report: ValidationReport): ValidationReport {
  return Object.freeze({
    ...report,
    issues: Object.freeze(report.issues.map((issue) => Object.freeze({ ...issue }))),
    missingFields: Object.freeze([...report.missingFields]),
  });
}

export function toReportJson(report: ValidationReport, labels: LabelStyle = 'canonical'): ValidationReportJson {
  const path = labels === 'hebrew' ? localizeFieldPath : (p: string) => p;
  return {
    accuracy_score: report.accuracyScore,
    completeness_score: report.completenessScore,
    corrections: report.issues.map((issue: QualityIssue) => ({
      field: path(issue.field),
      value: issue.value,
      reason: issue.reason,
    })),
    filled_count: report.filledCount,
    total_count: report.totalCount,
    missing_fields: report.missingFields.map(path),
    summary: report.summary,
  };
}
