import { z } from 'zod';
import { ok, err, type Result } from './result.js';
import { createAppError, ErrorCode, type AppError } from './errors.js';
import {
  ADDRESS_PART_LABELS,
  DATE_PART_LABELS,
  FIELD_LABELS,
  MEDICAL_FIELD_LABELS,
  remapKeys,
  type FieldLabel,
} from './field-labels.js';
import { ADDRESS_PARTS, DATE_PARTS, MEDICAL_FIELDS, type FormRecord } from './types.js';

// Strict shape: what the validation engine accepts.

const dateValueSchema = z.object({
  day: z.string(),
  month: z.string(),
  year: z.string(),
});

const addressValueSchema = z.object({
  street: z.string(),
  houseNumber: z.string(),
  entrance: z.string(),
  apartment: z.string(),
  city: z.string(),
  postalCode: z.string(),
  poBox: z.string(),
});

const medicalBlockSchema = z.object({
  healthFundMember: z.string(),
  natureOfAccident: z.string(),
  medicalDiagnoses: z.string(),
});

export const formRecordSchema: z.ZodType<FormRecord> = z.object({
  lastName: z.string(),
  firstName: z.string(),
  idNumber: z.string(),
  gender: z.string(),
  dateOfBirth: dateValueSchema,
  address: addressValueSchema,
  landlinePhone: z.string(),
  mobilePhone: z.string(),
  jobType: z.string(),
  dateOfInjury: dateValueSchema,
  timeOfInjury: z.string(),
  accidentLocation: z.string(),
  accidentAddress: z.string(),
  accidentDescription: z.string(),
  injuredBodyPart: z.string(),
  signature: z.string(),
  formFillingDate: dateValueSchema,
  formReceiptDateAtClinic: dateValueSchema,
  medicalInstitutionFields: medicalBlockSchema,
});

// Tolerant shape: raw LLM output keyed by canonical, Hebrew or English labels.

const looseString = z
  .union([z.string(), z.number(), z.boolean(), z.null(), z.undefined()])
  .transform((value) => (value === null || value === undefined ? '' : String(value).trim()));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function aliased<T extends z.ZodRawShape>(shape: T, labels: Record<string, FieldLabel>) {
  return z.preprocess((value) => {
    if (value === null || value === undefined) return {};
    return isRecord(value) ? remapKeys(value, labels) : value;
  }, z.object(shape));
}

const looseDate = aliased(
  { day: looseString, month: looseString, year: looseString },
  DATE_PART_LABELS,
);

const looseAddress = aliased(
  {
    street: looseString,
    houseNumber: looseString,
    entrance: looseString,
    apartment: looseString,
    city: looseString,
    postalCode: looseString,
    poBox: looseString,
  },
  ADDRESS_PART_LABELS,
);

const looseMedicalBlock = aliased(
  { healthFundMember: looseString, natureOfAccident: looseString, medicalDiagnoses: looseString },
  MEDICAL_FIELD_LABELS,
);

const extractedFormSchema: z.ZodType<FormRecord, z.ZodTypeDef, unknown> = aliased(
  {
    lastName: looseString,
    firstName: looseString,
    idNumber: looseString,
    gender: looseString,
    dateOfBirth: looseDate,
    address: looseAddress,
    landlinePhone: looseString,
    mobilePhone: looseString,
    jobType: looseString,
    dateOfInjury: looseDate,
    timeOfInjury: looseString,
    accidentLocation: looseString,
    accidentAddress: looseString,
    accidentDescription: looseString,
    injuredBodyPart: looseString,
    signature: looseString,
    formFillingDate: looseDate,
    formReceiptDateAtClinic: looseDate,
    medicalInstitutionFields: looseMedicalBlock,
  },
  FIELD_LABELS,
);

/**
 * Maps raw LLM JSON onto a FormRecord: resolves label aliases, stringifies
 * numbers, trims strings and fills every absent value with `""`.
 */
export function normalizeExtractedForm(raw: unknown): Result<FormRecord, AppError> {
  if (!isRecord(raw)) {
    return err(
      createAppError(ErrorCode.EXTRACTION_SCHEMA_MISMATCH, 'Extracted data is not a JSON object', false),
    );
  }

  const parsed = extractedFormSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      createAppError(
        ErrorCode.EXTRACTION_SCHEMA_MISMATCH,
        'Extracted data does not match the Form 283 schema',
        false,
        formatIssues(parsed.error),
      ),
    );
  }
  return ok(parsed.data);
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}

function relabel<K extends string>(
  values: Record<K, string>,
  keys: readonly K[],
  labels: Record<K, FieldLabel>,
): Record<string, string> {
  return Object.fromEntries(keys.map((key) => [labels[key].hebrew, values[key]]));
}

/** Re-keys a record by the form's Hebrew labels, the layout written to output files. */
export function toHebrewForm(record: FormRecord): Record<string, unknown> {
  const date = (value: FormRecord['dateOfBirth']) => relabel(value, DATE_PARTS, DATE_PART_LABELS);
  const L = FIELD_LABELS;

  return {
    [L.lastName.hebrew]: record.lastName,
    [L.firstName.hebrew]: record.firstName,
    [L.idNumber.hebrew]: record.idNumber,
    [L.gender.hebrew]: record.gender,
    [L.dateOfBirth.hebrew]: date(record.dateOfBirth),
    [L.address.hebrew]: relabel(record.address, ADDRESS_PARTS, ADDRESS_PART_LABELS),
    [L.landlinePhone.hebrew]: record.landlinePhone,
    [L.mobilePhone.hebrew]: record.mobilePhone,
    [L.jobType.hebrew]: record.jobType,
    [L.dateOfInjury.hebrew]: date(record.dateOfInjury),
    [L.timeOfInjury.hebrew]: record.timeOfInjury,
    [L.accidentLocation.hebrew]: record.accidentLocation,
    [L.accidentAddress.hebrew]: record.accidentAddress,
    [L.accidentDescription.hebrew]: record.accidentDescription,
    [L.injuredBodyPart.hebrew]: record.injuredBodyPart,
    [L.signature.hebrew]: record.signature,
    [L.formFillingDate.hebrew]: date(record.formFillingDate),
    [L.formReceiptDateAtClinic.hebrew]: date(record.formReceiptDateAtClinic),
    [L.medicalInstitutionFields.hebrew]: relabel(
      record.medicalInstitutionFields,
      MEDICAL_FIELDS,
      MEDICAL_FIELD_LABELS,
    ),
  };
}

// Request bodies

export const validateFormInput = z.object({
  form: formRecordSchema,
  currentYear: z.number().int().min(1900).max(9999).optional(),
  labels: z.enum(['canonical', 'hebrew']).optional(),
});

export const processFormInput = z.object({
  fileBase64: z
    .string()
    .min(1, 'Document data is required')
    .regex(/^[A-Za-z0-9+/=\s]+$/, 'Document data must be base64 encoded'),
  filename: z.string().min(1).default('document.pdf'),
  labels: z.enum(['canonical', 'hebrew']).optional(),
  includeCorrections: z.boolean().optional(),
  save: z.boolean().optional(),
});

