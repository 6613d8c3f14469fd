export const SCALAR_FIELDS = [
  'lastName',
  'firstName',
  'idNumber',
  'gender',
  'landlinePhone',
  'mobilePhone',
  'jobType',
  'timeOfInjury',
  'accidentLocation',
  'accidentAddress',
  'accidentDescription',
  'injuredBodyPart',
  'signature',
] as const;

export type ScalarField = (typeof SCALAR_FIELDS)[number];

export const DATE_FIELDS = [
  'dateOfBirth',
  'dateOfInjury',
  'formFillingDate',
  'formReceiptDateAtClinic',
] as const;

export type DateField = (typeof DATE_FIELDS)[number];

export const DATE_PARTS = ['day', 'month', 'year'] as const;

export type DatePart = (typeof DATE_PARTS)[number];

export const ADDRESS_PARTS = [
  'street',
  'houseNumber',
  'entrance',
  'apartment',
  'city',
  'postalCode',
  'poBox',
] as const;

export type AddressPart = (typeof ADDRESS_PARTS)[number];

export const MEDICAL_FIELDS = ['healthFundMember', 'natureOfAccident', 'medicalDiagnoses'] as const;

export type MedicalField = (typeof MEDICAL_FIELDS)[number];

export type DateValue = Record<DatePart, string>;

export type AddressValue = Record<AddressPart, string>;

export type MedicalBlock = Record<MedicalField, string>;

/**
 * One Form 283 instance as extracted from a scanned document.
 *
 * Absent values are always `""`. The record is a passive container: nothing
 * downstream of the schema boundary trims, reformats or rewrites it.
 */
export type FormRecord = Record<ScalarField, string> &
  Record<DateField, DateValue> & {
    address: AddressValue;
    medicalInstitutionFields: MedicalBlock;
  };

export interface ExtractionMetadata {
  provider: string;
  model: string;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  temperature: number;
  latencyMs: number;
}

export interface OcrResult {
  content: string;
  pageCount: number;
  provider: string;
}
