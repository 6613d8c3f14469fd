export interface QualityIssue {
  readonly field: string;
  readonly value: string;
  readonly reason: string;
}

export interface ValidationReport {
  readonly accuracyScore: number;
  readonly completenessScore: number;
  readonly issues: readonly QualityIssue[];
  readonly filledCount: number;
  readonly totalCount: number;
  readonly missingFields: readonly string[];
  readonly summary: string;
}

export interface ValidateOptions {
  /** Upper bound for year fields is `currentYear + 1`. Defaults to the wall-clock year. */
  currentYear?: number;
  documentId?: string;
}

export type LabelStyle = 'canonical' | 'hebrew';

/** Serialized report, the shape written to validation output files. */
export interface ValidationReportJson {
  accuracy_score: number;
  completeness_score: number;
  corrections: Array<{ field: string; value: string; reason: string }>;
  filled_count: number;
  total_count: number;
  missing_fields: string[];
  summary: string;
}
