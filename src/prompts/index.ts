import { readFileSync } from 'node:fs';
import { createEmptyFormRecord } from '../domain/form.js';
import { toHebrewForm } from '../domain/schemas.js';

function readPrompt(name: string): string {
  return readFileSync(new URL(`./${name}`, import.meta.url), 'utf-8').trim();
}

export const SYSTEM_MESSAGE = readPrompt('system.md');

const EXTRACTION_TEMPLATE = readPrompt('extraction.md');

/** The empty record keyed by Hebrew labels: the structure the model must fill. */
export const EXTRACTION_SKELETON = JSON.stringify(toHebrewForm(createEmptyFormRecord()), null, 2);

export function buildExtractionPrompt(ocrText: string): string {
  // Replacer functions keep `$` sequences in the OCR text literal.
  return EXTRACTION_TEMPLATE.replace('{{json_schema}}', () => EXTRACTION_SKELETON).replace(
    '{{ocr_text}}',
    () => ocrText,
  );
}
