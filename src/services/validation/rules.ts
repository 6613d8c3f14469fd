import { DATE_FIELDS, DATE_PARTS, type DatePart, type FormRecord } from '../../domain/types.js';
import type { QualityIssue } from './types.js';

/** Checkbox tokens the OCR emits; seen in a name field they mean the handwriting was not read. */
export const OCR_FAILURE_MARKERS = [':selected:', ':unselected:'] as const;

export const MIN_YEAR = 1900;

/** Returns a failure reason, or null when the value passes. */
type Check = (normalized: string, value: string) => string | null;

export interface QualityRule {
  /** Dotted path of the checked field. */
  readonly field: string;
  select(record: FormRecord): string;
  /** Empty values always pass: they count against completeness, not accuracy. */
  evaluate(value: string): QualityIssue | null;
}

/** Any Unicode decimal digit, so Arabic-Indic or fullwidth numerals count as numeric. */
const DIGITS = /^\p{Nd}+$/u;
const DECIMAL_DIGIT = /\p{Nd}/u;

/** Rewrites decimal digits of any script as ASCII. Every Unicode digit run starts at zero and spans a multiple of ten. */
export function toAsciiDigits(value: string): string {
  return Array.from(value, (char) => {
    if (!DECIMAL_DIGIT.test(char)) return char;
    const codePoint = char.codePointAt(0) ?? 0;
    let offset = 0;
    while (DECIMAL_DIGIT.test(String.fromCodePoint(codePoint - offset - 1))) offset++;
    return String(offset % 10);
  }).join('');
}

const stripSpacesAndHyphens = (value: string) => value.replace(/[ -]/g, '');
const stripPhoneSeparators = (value: string) => value.replace(/[ \-()]/g, '');
const asIs = (value: string) => value;

function defineRule(
  field: string,
  select: (record: FormRecord) => string,
  normalize: (value: string) => string,
  checks: Check[],
): QualityRule {
  return {
    field,
    select,
    evaluate(value) {
      if (value === '') return null;

      const normalized = normalize(value);
      // At most one issue per field: the first failing check ends the chain.
      for (const check of checks) {
        const reason = check(normalized, value);
        if (reason !== null) return { field, value, reason };
      }
      return null;
    },
  };
}

const numeric =
  (reason: string): Check =>
  (normalized) =>
    DIGITS.test(normalized) ? null : reason;

const inRange =
  (min: number, max: number, reason: (value: string) => string): Check =>
  (normalized, value) => {
    const n = Number.parseInt(toAsciiDigits(normalized), 10);
    return n >= min && n <= max ? null : reason(value);
  };

function phoneRules(field: 'mobilePhone' | 'landlinePhone'): Check[] {
  const length: Check =
    field === 'mobilePhone'
      ? (n) => (n.startsWith('05') && n.length !== 10 ? `Mobile phone should be 10 digits, got ${n.length}` : null)
      : (n) => (!n.startsWith('05') && n.length !== 9 ? `Landline phone should be 9 digits, got ${n.length}` : null);

  return [
    numeric('Phone number contains non-numeric characters'),
    (n) => (n.startsWith('0') ? null : 'Israeli phone numbers should start with 0'),
    length,
  ];
}

function datePartChecks(part: DatePart, currentYear: number): Check[] {
  switch (part) {
    case 'day':
      return [numeric('Day must be numeric'), inRange(1, 31, (v) => `Day must be 1-31, got ${v}`)];
    case 'month':
      return [numeric('Month must be numeric'), inRange(1, 12, (v) => `Month must be 1-12, got ${v}`)];
    case 'year': {
      const bound = currentYear + 1;
      return [
        numeric('Year must be numeric'),
        inRange(MIN_YEAR, bound, (v) => `Year should be ${MIN_YEAR}-${bound}, got ${v}`),
      ];
    }
  }
}

/** The full rule set in evaluation order. */
export function buildQualityRules(currentYear: number): QualityRule[] {
  const rules: QualityRule[] = [
    defineRule('idNumber', (r) => r.idNumber, stripSpacesAndHyphens, [
      numeric('ID number contains non-numeric characters'),
      (n) => (n.length === 9 ? null : `ID number should be 9 digits, got ${n.length}`),
    ]),
    defineRule('lastName', (r) => r.lastName, asIs, [
      (n) =>
        OCR_FAILURE_MARKERS.some((marker) => n.includes(marker))
          ? 'OCR failed to read last name — detected marker instead of actual name'
          : null,
    ]),
    defineRule('mobilePhone', (r) => r.mobilePhone, stripPhoneSeparators, phoneRules('mobilePhone')),
    defineRule('landlinePhone', (r) => r.landlinePhone, stripPhoneSeparators, phoneRules('landlinePhone')),
  ];

  for (const dateField of DATE_FIELDS) {
    for (const part of DATE_PARTS) {
      rules.push(
        defineRule(`${dateField}.${part}`, (r) => r[dateField][part], asIs, datePartChecks(part, currentYear)),
      );
    }
  }

  rules.push(
    defineRule('address.postalCode', (r) => r.address.postalCode, stripSpacesAndHyphens, [
      numeric('Postal code must be numeric'),
      (n) => (n.length >= 5 && n.length <= 7 ? null : `Postal code should be 5-7 digits, got ${n.length}`),
    ]),
  );

  return rules;
}

export function checkFieldQuality(record: FormRecord, currentYear: number): QualityIssue[] {
  const issues: QualityIssue[] = [];
  for (const rule of buildQualityRules(currentYear)) {
    const issue = rule.evaluate(rule.select(record));
    if (issue) issues.push(issue);
  }
  return issues;
}
