import type { FormRecord } from '../../domain/types.js';
import { isUnitFilled, logicalUnits } from './field-paths.js';

export interface FieldCount {
  filled: number;
  total: number;
}

export function countFilledFields(record: FormRecord): FieldCount {
  const units = logicalUnits(record);
  return {
    filled: units.filter(isUnitFilled).length,
    total: units.length,
  };
}

export function completenessPercentage({ filled, total }: FieldCount): number {
  if (total === 0) return 0;
  return (filled / total) * 100;
}

/**
 * Dotted paths of empty fields. An entirely empty date or address is reported
 * once under its own path; a partly filled one reports each empty part.
 */
export function listMissingFields(record: FormRecord): string[] {
  const missing: string[] = [];

  for (const unit of logicalUnits(record)) {
    if (!isUnitFilled(unit)) {
      missing.push(unit.path);
    } else if (unit.kind !== 'scalar') {
      for (const part of unit.parts) {
        if (part.value === '') missing.push(part.path);
      }
    }
  }

  return missing;
}
