import {
  ADDRESS_PARTS,
  DATE_PARTS,
  MEDICAL_FIELDS,
  type AddressValue,
  type DateValue,
  type FormRecord,
  type ScalarField,
} from '../../domain/types.js';

export interface FieldLeaf {
  path: string;
  value: string;
}

/**
 * One unit of completeness. Dates and the address count once however many of
 * their parts are filled; medical fields are plain scalars under a dotted path.
 */
export type LogicalUnit =
  | ({ kind: 'scalar' } & FieldLeaf)
  | { kind: 'date'; path: string; parts: FieldLeaf[] }
  | { kind: 'address'; path: string; parts: FieldLeaf[] };

function scalar(record: FormRecord, field: ScalarField): LogicalUnit {
  return { kind: 'scalar', path: field, value: record[field] };
}

function date(path: string, value: DateValue): LogicalUnit {
  return {
    kind: 'date',
    path,
    parts: DATE_PARTS.map((part) => ({ path: `${path}.${part}`, value: value[part] })),
  };
}

function address(value: AddressValue): LogicalUnit {
  return {
    kind: 'address',
    path: 'address',
    parts: ADDRESS_PARTS.map((part) => ({ path: `address.${part}`, value: value[part] })),
  };
}

/** The form's logical units in layout order. */
export function logicalUnits(record: FormRecord): LogicalUnit[] {
  return [
    scalar(record, 'lastName'),
    scalar(record, 'firstName'),
    scalar(record, 'idNumber'),
    scalar(record, 'gender'),
    date('dateOfBirth', record.dateOfBirth),
    address(record.address),
    scalar(record, 'landlinePhone'),
    scalar(record, 'mobilePhone'),
    scalar(record, 'jobType'),
    date('dateOfInjury', record.dateOfInjury),
    scalar(record, 'timeOfInjury'),
    scalar(record, 'accidentLocation'),
    scalar(record, 'accidentAddress'),
    scalar(record, 'accidentDescription'),
    scalar(record, 'injuredBodyPart'),
    scalar(record, 'signature'),
    date('formFillingDate', record.formFillingDate),
    date('formReceiptDateAtClinic', record.formReceiptDateAtClinic),
    ...MEDICAL_FIELDS.map((field): LogicalUnit => ({
      kind: 'scalar',
      path: `medicalInstitutionFields.${field}`,
      value: record.medicalInstitutionFields[field],
    })),
  ];
}

export function unitLeaves(unit: LogicalUnit): FieldLeaf[] {
  return unit.kind === 'scalar' ? [{ path: unit.path, value: unit.value }] : unit.parts;
}

export function leafFields(record: FormRecord): FieldLeaf[] {
  return logicalUnits(record).flatMap(unitLeaves);
}

export function isUnitFilled(unit: LogicalUnit): boolean {
  return unitLeaves(unit).some((leaf) => leaf.value !== '');
}
