import type { AddressPart, DatePart, FormRecord, MedicalField } from './types.js';

export interface FieldLabel {
  hebrew: string;
  english: string;
}

export const FIELD_LABELS: Record<keyof FormRecord, FieldLabel> = {
  lastName: { hebrew: 'שם משפחה', english: 'Last Name' },
  firstName: { hebrew: 'שם פרטי', english: 'First Name' },
  idNumber: { hebrew: 'מספר זהות', english: 'ID Number' },
  gender: { hebrew: 'מין', english: 'Gender' },
  dateOfBirth: { hebrew: 'תאריך לידה', english: 'Date of Birth' },
  address: { hebrew: 'כתובת', english: 'Address' },
  landlinePhone: { hebrew: 'טלפון קווי', english: 'Landline Phone' },
  mobilePhone: { hebrew: 'טלפון נייד', english: 'Mobile Phone' },
  jobType: { hebrew: 'סוג העבודה', english: 'Job Type' },
  dateOfInjury: { hebrew: 'תאריך הפגיעה', english: 'Date of Injury' },
  timeOfInjury: { hebrew: 'שעת הפגיעה', english: 'Time of Injury' },
  accidentLocation: { hebrew: 'מקום התאונה', english: 'Accident Location' },
  accidentAddress: { hebrew: 'כתובת מקום התאונה', english: 'Accident Address' },
  accidentDescription: { hebrew: 'תיאור התאונה', english: 'Accident Description' },
  injuredBodyPart: { hebrew: 'האיבר שנפגע', english: 'Injured Body Part' },
  signature: { hebrew: 'חתימה', english: 'Signature' },
  formFillingDate: { hebrew: 'תאריך מילוי הטופס', english: 'Form Filling Date' },
  formReceiptDateAtClinic: { hebrew: 'תאריך קבלת הטופס בקופה', english: 'Form Receipt Date' },
  medicalInstitutionFields: { hebrew: 'למילוי ע"י המוסד הרפואי', english: 'Medical Institution Fields' },
};

export const DATE_PART_LABELS: Record<DatePart, FieldLabel> = {
  day: { hebrew: 'יום', english: 'Day' },
  month: { hebrew: 'חודש', english: 'Month' },
  year: { hebrew: 'שנה', english: 'Year' },
};

export const ADDRESS_PART_LABELS: Record<AddressPart, FieldLabel> = {
  street: { hebrew: 'רחוב', english: 'Street' },
  houseNumber: { hebrew: 'מספר בית', english: 'House Number' },
  entrance: { hebrew: 'כניסה', english: 'Entrance' },
  apartment: { hebrew: 'דירה', english: 'Apartment' },
  city: { hebrew: 'ישוב', english: 'City' },
  postalCode: { hebrew: 'מיקוד', english: 'Postal Code' },
  poBox: { hebrew: 'תא דואר', english: 'PO Box' },
};

export const MEDICAL_FIELD_LABELS: Record<MedicalField, FieldLabel> = {
  healthFundMember: { hebrew: 'חבר בקופת חולים', english: 'Health Fund Member' },
  natureOfAccident: { hebrew: 'מהות התאונה', english: 'Nature of Accident' },
  medicalDiagnoses: { hebrew: 'אבחנות רפואיות', english: 'Medical Diagnoses' },
};

type LabelTable = Record<string, FieldLabel>;

const SUB_FIELD_LABELS: Record<string, LabelTable> = {
  dateOfBirth: DATE_PART_LABELS,
  dateOfInjury: DATE_PART_LABELS,
  formFillingDate: DATE_PART_LABELS,
  formReceiptDateAtClinic: DATE_PART_LABELS,
  address: ADDRESS_PART_LABELS,
  medicalInstitutionFields: MEDICAL_FIELD_LABELS,
};

/** Lowercased with whitespace, underscores and hyphens removed: "Last Name", "last_name" and "lastName" collide. */
function aliasKey(label: string): string {
  return label.toLowerCase().replace(/[\s_-]/g, '');
}

/**
 * Re-keys `raw` by canonical field name. Each canonical key accepts itself,
 * its Hebrew label or its English label in any casing; keys outside the
 * table are dropped. When several aliases are present the first in `raw`
 * order wins.
 */
export function remapKeys(raw: Record<string, unknown>, labels: LabelTable): Record<string, unknown> {
  const lookup = new Map<string, string>();
  for (const [canonical, label] of Object.entries(labels)) {
    lookup.set(aliasKey(canonical), canonical);
    lookup.set(aliasKey(label.hebrew), canonical);
    lookup.set(aliasKey(label.english), canonical);
  }

  const remapped: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    const canonical = lookup.get(aliasKey(key));
    if (canonical !== undefined && !(canonical in remapped)) {
      remapped[canonical] = value;
    }
  }
  return remapped;
}

export function subFieldLabels(field: string): LabelTable | undefined {
  return SUB_FIELD_LABELS[field];
}

/** `dateOfBirth.day` → `תאריך לידה.יום`. Unknown segments pass through unchanged. */
export function localizeFieldPath(path: string): string {
  const [field, ...rest] = path.split('.');
  const topLevel: LabelTable = FIELD_LABELS;
  const localized = [topLevel[field]?.hebrew ?? field];

  const subLabels = subFieldLabels(field);
  for (const segment of rest) {
    localized.push(subLabels?.[segment]?.hebrew ?? segment);
  }
  return localized.join('.');
}
