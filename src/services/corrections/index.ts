import { FIELD_LABELS, remapKeys, subFieldLabels } from '../../domain/field-labels.js';
import type { FormRecord } from '../../domain/types.js';
import { leafFields } from '../validation/field-paths.js';

/** A value the schema boundary changed on its way from the model's JSON into the record. */
export interface FieldCorrection {
  field: string;
  rawValue: string;
  normalizedValue: string;
  reason: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringify(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}

function reasonFor(path: string): string {
  const [field] = path.split('.');
  switch (field) {
    case 'mobilePhone':
    case 'landlinePhone':
      return 'Phone number format normalized';
    case 'idNumber':
      return 'ID number format normalized';
    case 'dateOfBirth':
    case 'dateOfInjury':
    case 'formFillingDate':
    case 'formReceiptDateAtClinic':
      return 'Date format normalized';
    case 'address':
      return 'Address field normalized';
    default:
      return 'Field value normalized during extraction';
  }
}

function lookupRaw(raw: Record<string, unknown>, path: string): unknown {
  const [field, part] = path.split('.');
  const top = remapKeys(raw, FIELD_LABELS)[field];
  if (part === undefined) return top;

  const labels = subFieldLabels(field);
  if (!labels || !isRecord(top)) return undefined;
  return remapKeys(top, labels)[part];
}

/**
 * Lists every leaf whose raw value, stringified, differs from the normalized
 * record. Leaves absent from the raw JSON are not corrections.
 */
export function findCorrections(raw: Record<string, unknown>, record: FormRecord): FieldCorrection[] {
  const corrections: FieldCorrection[] = [];

  for (const leaf of leafFields(record)) {
    const rawValue = lookupRaw(raw, leaf.path);
    if (rawValue === undefined) continue;

    const rawText = stringify(rawValue);
    if (rawText !== leaf.value) {
      corrections.push({
        field: leaf.path,
        rawValue: rawText,
        normalizedValue: leaf.value,
        reason: reasonFor(leaf.path),
      });
    }
  }

  return corrections;
}
